import { v4 as uuidv4 } from 'uuid';
import type { UsageJobKind } from '../entities/usage-job.entity';

export interface JobEventPayload {
  jobId: string;
  kind: UsageJobKind;
}

/**
 * Lifecycle event of a usage job. Subclasses only name themselves and type
 * their payload.
 */
export abstract class DomainEvent<TPayload extends JobEventPayload = JobEventPayload> {
  readonly occurredAt = new Date();
  readonly eventId: string = uuidv4();

  protected constructor(readonly payload: TPayload) {}

  abstract get eventName(): string;

  get jobId(): string {
    return this.payload.jobId;
  }

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventName: this.eventName,
      occurredAt: this.occurredAt.toISOString(),
      payload: this.payload,
    };
  }
}
