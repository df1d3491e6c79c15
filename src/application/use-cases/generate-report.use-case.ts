import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ReportFile } from '../ports/input/download-export.port';
import type { GenerateReportCommand, GenerateReportPort } from '../ports/input/generate-report.port';
import type { ReportStoragePort } from '../ports/output/report-storage.port';
import { REPORT_STORAGE_PORT } from '../ports/output/tokens';
import { parseParticipantColumns } from '../../domain/value-objects/participant-columns.vo';
import { TimeRangeVO } from '../../domain/value-objects/time-range.vo';
import { CsvExporterService } from '../../processing/services/csv-exporter.service';
import { SessionFetcherService } from '../../processing/services/session-fetcher.service';
import { requireApiKey } from './usage-request';

/**
 * Generate Report Use Case
 * Fetch and export inside one request. The temp file never outlives the call.
 */
@Injectable()
export class GenerateReportUseCase implements GenerateReportPort {
  private readonly logger = new Logger(GenerateReportUseCase.name);

  constructor(
    private readonly fetcher: SessionFetcherService,
    private readonly exporter: CsvExporterService,
    @Inject(REPORT_STORAGE_PORT) private readonly storage: ReportStoragePort,
  ) {}

  async execute(command: GenerateReportCommand): Promise<ReportFile> {
    const apiKey = requireApiKey(command.apiKey);
    const range = TimeRangeVO.forMonth(command.year, command.month);
    const participantColumns = parseParticipantColumns(command.participantColumns);

    const sessions = await this.fetcher.fetchAll(apiKey, range);

    const filePath = await this.storage.allocate(range.reportFilename);
    try {
      const summary = await this.exporter.export(sessions, participantColumns, filePath);
      const content = await this.storage.read(filePath);

      this.logger.log(
        `Generated ${range.reportFilename}: ${summary.rows} rows, ${summary.participantColumns} participant columns`,
      );
      return { filename: range.reportFilename, content };
    } finally {
      await this.storage.remove(filePath).catch((error: unknown) => {
        this.logger.warn(
          `Could not remove report ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        );
      });
    }
  }
}
