import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  DownloadExportCommand,
  DownloadExportPort,
  ReportFile,
} from '../ports/input/download-export.port';
import type { JobRegistryPort } from '../ports/output/job-registry.port';
import type { ReportStoragePort } from '../ports/output/report-storage.port';
import { JOB_REGISTRY_PORT, REPORT_STORAGE_PORT } from '../ports/output/tokens';
import { JobNotFoundError, JobNotReadyError } from '../../domain/errors/usage-report.errors';

/**
 * Download Export Use Case
 * Removes a completed export from the registry and hands out its CSV, then
 * deletes the file. Of two concurrent downloads only one gets the file; the
 * other sees an unknown job.
 */
@Injectable()
export class DownloadExportUseCase implements DownloadExportPort {
  private readonly logger = new Logger(DownloadExportUseCase.name);

  constructor(
    @Inject(JOB_REGISTRY_PORT) private readonly registry: JobRegistryPort,
    @Inject(REPORT_STORAGE_PORT) private readonly storage: ReportStoragePort,
  ) {}

  async execute(command: DownloadExportCommand): Promise<ReportFile> {
    // Taken out of the registry in the same step it is checked
    const job = await this.registry.consume(
      command.jobId,
      (candidate) => candidate.kind === 'export' && candidate.isCompleted(),
    );

    if (job.kind !== 'export') {
      throw new JobNotFoundError(command.jobId);
    }
    if (!job.isCompleted() || job.result?.type !== 'file') {
      throw new JobNotReadyError(command.jobId, job.status.toString());
    }

    const { filePath, filename } = job.result;
    try {
      const content = await this.storage.read(filePath);
      this.logger.log(`Delivered ${filename} for export job ${command.jobId} (${content.length} bytes)`);
      return { filename, content };
    } finally {
      await this.storage.remove(filePath).catch((error: unknown) => {
        this.logger.warn(
          `Could not remove report ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        );
      });
    }
  }
}
