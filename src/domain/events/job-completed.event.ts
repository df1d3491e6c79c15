import { DomainEvent, type JobEventPayload } from './base.event';

export interface JobCompletedEventPayload extends JobEventPayload {
  sessionCount: number;
  totalPages: number;
  /** Export jobs only */
  filename?: string;
  durationMs: number;
}

export class JobCompletedEvent extends DomainEvent<JobCompletedEventPayload> {
  constructor(payload: JobCompletedEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'job.completed';
  }
}
