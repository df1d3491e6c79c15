/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type { SessionsApiPort, SessionsPageQuery } from './sessions-api.port';
export type { JobRegistryPort, JobMutator, JobListener } from './job-registry.port';
export type { ReportStoragePort } from './report-storage.port';
export type { EventPublisherPort } from './event-publisher.port';
export {
  SESSIONS_API_PORT,
  JOB_REGISTRY_PORT,
  REPORT_STORAGE_PORT,
  EVENT_PUBLISHER_PORT,
} from './tokens';
