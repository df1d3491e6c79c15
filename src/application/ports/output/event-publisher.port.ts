import type { DomainEvent } from '../../../domain/events/base.event';

/**
 * Event Publisher Port (Driven Port)
 * Where job lifecycle events go. Nothing in the job flow waits on a
 * subscriber, so publishing must never fail the job that emitted the event.
 */
export interface EventPublisherPort {
  publish(event: DomainEvent): Promise<void>;

  /**
   * Fire and forget: failures are handled by the adapter.
   */
  publishAsync(event: DomainEvent): void;
}
