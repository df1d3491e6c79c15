import { Inject, Injectable, Logger } from '@nestjs/common';
import type { GetFetchJobStatusPort, GetJobStatusQuery } from '../ports/input/get-job-status.port';
import type { JobRegistryPort } from '../ports/output/job-registry.port';
import { JOB_REGISTRY_PORT } from '../ports/output/tokens';
import type { UsageJobSnapshot } from '../../domain/entities/usage-job.entity';
import { JobNotFoundError } from '../../domain/errors/usage-report.errors';

/**
 * Get Fetch Job Status Use Case
 * A terminal fetch job is removed as its snapshot is returned, so the
 * sessions (or the error) are delivered exactly once.
 */
@Injectable()
export class GetFetchJobStatusUseCase implements GetFetchJobStatusPort {
  private readonly logger = new Logger(GetFetchJobStatusUseCase.name);

  constructor(@Inject(JOB_REGISTRY_PORT) private readonly registry: JobRegistryPort) {}

  async execute(query: GetJobStatusQuery): Promise<UsageJobSnapshot> {
    const job = await this.registry.consume(
      query.jobId,
      (candidate) => candidate.kind === 'fetch' && candidate.isTerminal(),
    );

    if (job.kind !== 'fetch') {
      throw new JobNotFoundError(query.jobId);
    }

    if (job.isTerminal()) {
      this.logger.log(`Delivered ${job.status.toString()} fetch job ${job.jobId}`);
    }

    return job.toSnapshot();
  }
}
