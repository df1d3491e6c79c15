import { Injectable, Logger } from '@nestjs/common';
import type {
  StartFetchJobCommand,
  StartFetchJobPort,
  StartUsageJobResult,
} from '../ports/input/start-usage-job.port';
import { TimeRangeVO } from '../../domain/value-objects/time-range.vo';
import { JobRunnerService } from '../../processing/services/job-runner.service';
import { requireApiKey } from './usage-request';

/**
 * Start Fetch Job Use Case
 * Validates the month, registers a background fetch and hands back its id
 */
@Injectable()
export class StartFetchJobUseCase implements StartFetchJobPort {
  private readonly logger = new Logger(StartFetchJobUseCase.name);

  constructor(private readonly jobRunner: JobRunnerService) {}

  async execute(command: StartFetchJobCommand): Promise<StartUsageJobResult> {
    const apiKey = requireApiKey(command.apiKey);
    const range = TimeRangeVO.forMonth(command.year, command.month);

    const job = await this.jobRunner.startFetchJob(apiKey, range);

    this.logger.log(`Started fetch job ${job.jobId} for ${range.year}-${range.month}`);
    return { jobId: job.jobId };
  }
}
