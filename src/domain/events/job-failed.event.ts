import { DomainEvent, type JobEventPayload } from './base.event';
import type { JobStep } from '../value-objects/job-status.vo';

export type JobFailureReason = 'upstream_error' | 'no_data' | 'export_failed' | 'unexpected';

export interface JobFailedEventPayload extends JobEventPayload {
  /** Step the job was in when it failed */
  step: JobStep;
  errorMessage: string;
  failureReason: JobFailureReason;
}

export class JobFailedEvent extends DomainEvent<JobFailedEventPayload> {
  constructor(payload: JobFailedEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'job.failed';
  }

  get failureReason(): JobFailureReason {
    return this.payload.failureReason;
  }
}
