/**
 * Domain Layer Barrel Export
 *
 * The domain layer is the core of the application: entities, value objects,
 * errors and events, with no framework dependencies.
 */

// Entities
export {
  UsageJobEntity,
  type UsageJobEntityData,
  type UsageJobKind,
  type UsageJobRequest,
  type UsageJobResult,
  type UsageJobSnapshot,
} from './entities/usage-job.entity';

// Value Objects
export { JobStatusVO, JobStatus, JobStep } from './value-objects/job-status.vo';
export { TimeRangeVO, monthRange } from './value-objects/time-range.vo';
export {
  parseParticipantColumns,
  type ParticipantColumns,
} from './value-objects/participant-columns.vo';

// Errors
export * from './errors/usage-report.errors';

// Events
export * from './events';
