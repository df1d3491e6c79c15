import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { ProcessingModule } from '../processing/processing.module';

// Use Cases
import {
  StartFetchJobUseCase,
  StartExportJobUseCase,
  GetFetchJobStatusUseCase,
  GetExportJobStatusUseCase,
  DownloadExportUseCase,
  FetchSessionsUseCase,
  GenerateReportUseCase,
  StreamUsageJobUseCase,
} from './use-cases';

const USE_CASES = [
  StartFetchJobUseCase,
  StartExportJobUseCase,
  GetFetchJobStatusUseCase,
  GetExportJobStatusUseCase,
  DownloadExportUseCase,
  FetchSessionsUseCase,
  GenerateReportUseCase,
  StreamUsageJobUseCase,
];

/**
 * Application Module
 * Contains all use cases
 *
 * Use cases depend on output ports (string tokens) only; InfrastructureModule
 * binds the adapters behind them.
 */
@Module({
  imports: [InfrastructureModule, ProcessingModule],
  providers: USE_CASES,
  exports: USE_CASES,
})
export class ApplicationModule {}
