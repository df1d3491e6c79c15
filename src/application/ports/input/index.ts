/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 * These are the interfaces that define the application's use cases
 */
export type {
  StartFetchJobPort,
  StartExportJobPort,
  StartFetchJobCommand,
  StartExportJobCommand,
  StartUsageJobResult,
} from './start-usage-job.port';
export type {
  GetFetchJobStatusPort,
  GetExportJobStatusPort,
  GetJobStatusQuery,
} from './get-job-status.port';
export type { DownloadExportPort, DownloadExportCommand, ReportFile } from './download-export.port';
export type {
  FetchSessionsPort,
  FetchSessionsQuery,
  FetchSessionsResult,
} from './fetch-sessions.port';
export type { GenerateReportPort, GenerateReportCommand } from './generate-report.port';
export type {
  StreamUsageJobPort,
  StreamUsageJobCommand,
  UsageJobEvent,
  UsageJobInitEvent,
  UsageJobProgressEvent,
  UsageJobCompleteEvent,
  UsageJobErrorEvent,
} from './stream-usage-job.port';
