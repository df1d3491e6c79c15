/**
 * Use Cases Barrel Export
 */
export { StartFetchJobUseCase } from './start-fetch-job.use-case';
export { StartExportJobUseCase } from './start-export-job.use-case';
export { GetFetchJobStatusUseCase } from './get-fetch-job-status.use-case';
export { GetExportJobStatusUseCase } from './get-export-job-status.use-case';
export { DownloadExportUseCase } from './download-export.use-case';
export { FetchSessionsUseCase } from './fetch-sessions.use-case';
export { GenerateReportUseCase } from './generate-report.use-case';
export { StreamUsageJobUseCase } from './stream-usage-job.use-case';
