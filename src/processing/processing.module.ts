import { Module } from '@nestjs/common';
import { SharedModule } from '../shared/shared.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { SessionFetcherService } from './services/session-fetcher.service';
import { CsvExporterService } from './services/csv-exporter.service';
import { JobRunnerService } from './services/job-runner.service';

@Module({
  imports: [SharedModule, InfrastructureModule],
  providers: [SessionFetcherService, CsvExporterService, JobRunnerService],
  exports: [SessionFetcherService, CsvExporterService, JobRunnerService],
})
export class ProcessingModule {}
