import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import { JobRegistryHealthIndicator } from './indicators/job-registry.health';
import { ReportStorageHealthIndicator } from './indicators/report-storage.health';

const HEAP_LIMIT_BYTES = 500 * 1024 * 1024;

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly jobRegistryHealth: JobRegistryHealthIndicator,
    private readonly reportStorageHealth: ReportStorageHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.jobRegistryHealth.isHealthy('job_registry'),
      () => this.reportStorageHealth.isHealthy('report_storage'),
    ]);
  }

  @Get('live')
  @HealthCheck()
  liveness() {
    return this.health.check([() => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)]);
  }
}
