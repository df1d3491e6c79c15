import { Injectable, Logger } from '@nestjs/common';
import type {
  StartExportJobCommand,
  StartExportJobPort,
  StartUsageJobResult,
} from '../ports/input/start-usage-job.port';
import { parseParticipantColumns } from '../../domain/value-objects/participant-columns.vo';
import { TimeRangeVO } from '../../domain/value-objects/time-range.vo';
import { JobRunnerService } from '../../processing/services/job-runner.service';
import { requireApiKey } from './usage-request';

/**
 * Start Export Job Use Case
 * Same as a fetch job, followed by a CSV export once every page is in
 */
@Injectable()
export class StartExportJobUseCase implements StartExportJobPort {
  private readonly logger = new Logger(StartExportJobUseCase.name);

  constructor(private readonly jobRunner: JobRunnerService) {}

  async execute(command: StartExportJobCommand): Promise<StartUsageJobResult> {
    const apiKey = requireApiKey(command.apiKey);
    const range = TimeRangeVO.forMonth(command.year, command.month);
    const participantColumns = parseParticipantColumns(command.participantColumns);

    const job = await this.jobRunner.startExportJob(apiKey, range, participantColumns);

    this.logger.log(
      `Started export job ${job.jobId} for ${range.year}-${range.month} (participant columns: ${participantColumns})`,
    );
    return { jobId: job.jobId };
  }
}
