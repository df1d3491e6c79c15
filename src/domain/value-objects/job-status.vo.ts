/**
 * Job Status Value Object
 * Lifecycle of a usage job: RUNNING until it settles, exactly once, into
 * COMPLETED or ERROR.
 */
export enum JobStatus {
  RUNNING = 'running',
  COMPLETED = 'completed',
  ERROR = 'error',
}

export enum JobStep {
  FETCH = 'fetch',
  GENERATE = 'generate',
}

// Running to running is a progress update
const TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.RUNNING]: [JobStatus.RUNNING, JobStatus.COMPLETED, JobStatus.ERROR],
  [JobStatus.COMPLETED]: [],
  [JobStatus.ERROR]: [],
};

export class JobStatusVO {
  private constructor(private readonly _value: JobStatus) {}

  static running(): JobStatusVO {
    return new JobStatusVO(JobStatus.RUNNING);
  }

  static completed(): JobStatusVO {
    return new JobStatusVO(JobStatus.COMPLETED);
  }

  static error(): JobStatusVO {
    return new JobStatusVO(JobStatus.ERROR);
  }

  get value(): JobStatus {
    return this._value;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this._value].length === 0;
  }

  isCompleted(): boolean {
    return this._value === JobStatus.COMPLETED;
  }

  isError(): boolean {
    return this._value === JobStatus.ERROR;
  }

  canTransitionTo(newStatus: JobStatusVO): boolean {
    return TRANSITIONS[this._value].includes(newStatus._value);
  }

  toString(): string {
    return this._value;
  }
}
