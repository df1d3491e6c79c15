import { Inject, Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import type { JobRegistryPort } from '../../application/ports/output/job-registry.port';
import { JOB_REGISTRY_PORT } from '../../application/ports/output/tokens';

/**
 * Reports how many jobs the registry holds. Jobs are never evicted, so a
 * steadily growing count points at clients that start jobs and never collect
 * them.
 */
@Injectable()
export class JobRegistryHealthIndicator extends HealthIndicator {
  constructor(@Inject(JOB_REGISTRY_PORT) private readonly registry: JobRegistryPort) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const activeJobs = await this.registry.size();
    return this.getStatus(key, true, { activeJobs });
  }
}
