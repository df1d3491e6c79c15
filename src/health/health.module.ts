import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { JobRegistryHealthIndicator } from './indicators/job-registry.health';
import { ReportStorageHealthIndicator } from './indicators/report-storage.health';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

@Module({
  imports: [TerminusModule, InfrastructureModule],
  controllers: [HealthController],
  providers: [JobRegistryHealthIndicator, ReportStorageHealthIndicator],
})
export class HealthModule {}
