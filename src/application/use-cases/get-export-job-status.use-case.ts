import { Inject, Injectable, Logger } from '@nestjs/common';
import type { GetExportJobStatusPort, GetJobStatusQuery } from '../ports/input/get-job-status.port';
import type { JobRegistryPort } from '../ports/output/job-registry.port';
import { JOB_REGISTRY_PORT } from '../ports/output/tokens';
import type { UsageJobSnapshot } from '../../domain/entities/usage-job.entity';
import { JobNotFoundError } from '../../domain/errors/usage-report.errors';

/**
 * Get Export Job Status Use Case
 * A completed export stays registered until its file is downloaded; a failed
 * one is removed as its error is returned.
 */
@Injectable()
export class GetExportJobStatusUseCase implements GetExportJobStatusPort {
  private readonly logger = new Logger(GetExportJobStatusUseCase.name);

  constructor(@Inject(JOB_REGISTRY_PORT) private readonly registry: JobRegistryPort) {}

  async execute(query: GetJobStatusQuery): Promise<UsageJobSnapshot> {
    const job = await this.registry.consume(
      query.jobId,
      (candidate) => candidate.kind === 'export' && candidate.isFailed(),
    );

    if (job.kind !== 'export') {
      throw new JobNotFoundError(query.jobId);
    }

    if (job.isFailed()) {
      this.logger.log(`Delivered failed export job ${job.jobId}`);
    }

    return job.toSnapshot();
  }
}
