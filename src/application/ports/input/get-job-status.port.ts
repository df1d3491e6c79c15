import type { UsageJobSnapshot } from '../../../domain/entities/usage-job.entity';

export interface GetJobStatusQuery {
  jobId: string;
}

/**
 * Get Fetch Job Status Port (Driving Port / Use Case Interface)
 * Read-once-destructive: a terminal snapshot (sessions or error) is removed
 * from the registry as it is delivered.
 */
export interface GetFetchJobStatusPort {
  execute(query: GetJobStatusQuery): Promise<UsageJobSnapshot>;
}

/**
 * Get Export Job Status Port (Driving Port / Use Case Interface)
 * A completed export stays registered until downloaded; an error snapshot is
 * removed as it is delivered.
 */
export interface GetExportJobStatusPort {
  execute(query: GetJobStatusQuery): Promise<UsageJobSnapshot>;
}
