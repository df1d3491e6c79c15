export { DomainEvent, type JobEventPayload } from './base.event';
export { JobCreatedEvent, type JobCreatedEventPayload } from './job-created.event';
export { JobCompletedEvent, type JobCompletedEventPayload } from './job-completed.event';
export {
  JobFailedEvent,
  type JobFailedEventPayload,
  type JobFailureReason,
} from './job-failed.event';
