import { DomainEvent, type JobEventPayload } from './base.event';

export interface JobCreatedEventPayload extends JobEventPayload {
  year: number;
  month: number;
}

/** Registered, background work spawned. */
export class JobCreatedEvent extends DomainEvent<JobCreatedEventPayload> {
  constructor(payload: JobCreatedEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'job.created';
  }
}
