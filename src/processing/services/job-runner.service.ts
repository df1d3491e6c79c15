import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type { EventPublisherPort } from '../../application/ports/output/event-publisher.port';
import type { JobRegistryPort } from '../../application/ports/output/job-registry.port';
import type { ReportStoragePort } from '../../application/ports/output/report-storage.port';
import {
  EVENT_PUBLISHER_PORT,
  JOB_REGISTRY_PORT,
  REPORT_STORAGE_PORT,
} from '../../application/ports/output/tokens';
import {
  UsageJobEntity,
  type UsageJobKind,
  type UsageJobResult,
} from '../../domain/entities/usage-job.entity';
import { NoDataError, UpstreamError } from '../../domain/errors/usage-report.errors';
import { JobCompletedEvent } from '../../domain/events/job-completed.event';
import { JobCreatedEvent } from '../../domain/events/job-created.event';
import { JobFailedEvent, type JobFailureReason } from '../../domain/events/job-failed.event';
import type { ParticipantColumns } from '../../domain/value-objects/participant-columns.vo';
import type { TimeRangeVO } from '../../domain/value-objects/time-range.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { CsvExporterService } from './csv-exporter.service';
import { SessionFetcherService } from './session-fetcher.service';

interface RunOutcome {
  result: UsageJobResult;
  sessionCount: number;
}

/**
 * Owns the background half of a usage job: registers it, then fetches (and
 * for exports, writes the CSV) while recording progress in the registry.
 *
 * `start*` resolves once the job is registered; the work itself is detached
 * and every outcome, failures included, ends up in the registry.
 */
@Injectable()
export class JobRunnerService {
  constructor(
    @Inject(JOB_REGISTRY_PORT) private readonly registry: JobRegistryPort,
    @Inject(REPORT_STORAGE_PORT) private readonly storage: ReportStoragePort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly fetcher: SessionFetcherService,
    private readonly exporter: CsvExporterService,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(JobRunnerService.name);
  }

  async startFetchJob(apiKey: string, range: TimeRangeVO, jobId: string = uuidv4()): Promise<UsageJobEntity> {
    const job = await this.register(jobId, 'fetch', range);

    this.spawn(job, () => this.runFetch(jobId, apiKey, range));

    return job;
  }

  async startExportJob(
    apiKey: string,
    range: TimeRangeVO,
    participantColumns: ParticipantColumns,
    jobId: string = uuidv4(),
  ): Promise<UsageJobEntity> {
    const job = await this.register(jobId, 'export', range, participantColumns);

    this.spawn(job, () => this.runExport(jobId, apiKey, range, participantColumns));

    return job;
  }

  private async register(
    jobId: string,
    kind: UsageJobKind,
    range: TimeRangeVO,
    participantColumns?: ParticipantColumns,
  ): Promise<UsageJobEntity> {
    const job = await this.registry.create(
      UsageJobEntity.create({
        jobId,
        kind,
        request: { year: range.year, month: range.month, participantColumns },
      }),
    );

    this.eventPublisher.publishAsync(
      new JobCreatedEvent({ jobId, kind, year: range.year, month: range.month }),
    );

    return job;
  }

  private spawn(job: UsageJobEntity, work: () => Promise<RunOutcome>): void {
    const jobLogger = this.logger.withJobId(job.jobId);

    this.execute(job, work, jobLogger).catch((error: unknown) => {
      jobLogger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Could not record the outcome of job',
      );
    });
  }

  private async execute(
    job: UsageJobEntity,
    work: () => Promise<RunOutcome>,
    jobLogger: PinoLoggerService,
  ): Promise<void> {
    const startedAt = Date.now();
    jobLogger.info({ kind: job.kind, ...job.request }, 'Usage job started');

    let outcome: RunOutcome;
    try {
      outcome = await work();
    } catch (error) {
      await this.fail(job, error, jobLogger);
      return;
    }

    let completed: UsageJobEntity;
    try {
      completed = await this.registry.update(job.jobId, (current) =>
        current.transitionToCompleted(outcome.result),
      );
    } catch (error) {
      if (outcome.result.type === 'file') {
        await this.discardReport(job.jobId, outcome.result.filePath);
      }
      throw error;
    }

    const durationMs = Date.now() - startedAt;
    jobLogger.info(
      { kind: job.kind, sessions: outcome.sessionCount, durationMs },
      'Usage job completed',
    );

    this.eventPublisher.publishAsync(
      new JobCompletedEvent({
        jobId: job.jobId,
        kind: job.kind,
        sessionCount: outcome.sessionCount,
        totalPages: completed.totalPages,
        filename: outcome.result.type === 'file' ? outcome.result.filename : undefined,
        durationMs,
      }),
    );
  }

  private async fail(job: UsageJobEntity, error: unknown, jobLogger: PinoLoggerService): Promise<void> {
    const errorMessage = error instanceof Error ? error.message : String(error);

    const failed = await this.registry.update(job.jobId, (current) =>
      current.transitionToFailed(errorMessage),
    );

    jobLogger.warn({ kind: job.kind, step: failed.step, errorMessage }, 'Usage job failed');

    this.eventPublisher.publishAsync(
      new JobFailedEvent({
        jobId: job.jobId,
        kind: job.kind,
        step: failed.step,
        errorMessage,
        failureReason: this.failureReason(job.kind, error),
      }),
    );
  }

  private failureReason(kind: UsageJobKind, error: unknown): JobFailureReason {
    if (error instanceof UpstreamError) {
      return 'upstream_error';
    }
    if (error instanceof NoDataError) {
      return 'no_data';
    }
    return kind === 'export' ? 'export_failed' : 'unexpected';
  }

  private async runFetch(jobId: string, apiKey: string, range: TimeRangeVO): Promise<RunOutcome> {
    const sessions = await this.fetcher.fetchAll(apiKey, range, (currentPage, totalPages) =>
      this.registry.update(jobId, (job) => job.withFetchProgress(currentPage, totalPages)),
    );

    return { result: { type: 'sessions', sessions }, sessionCount: sessions.length };
  }

  private async runExport(
    jobId: string,
    apiKey: string,
    range: TimeRangeVO,
    participantColumns: ParticipantColumns,
  ): Promise<RunOutcome> {
    const sessions = await this.fetcher.fetchAll(apiKey, range, (currentPage, totalPages) =>
      this.registry.update(jobId, (job) => job.withFetchProgress(currentPage, totalPages)),
    );

    await this.registry.update(jobId, (job) => job.transitionToGenerate(sessions.length));

    const filePath = await this.storage.allocate(range.reportFilename);
    try {
      await this.exporter.export(sessions, participantColumns, filePath, (rowsWritten) =>
        this.registry.update(jobId, (job) => job.withGenerateProgress(rowsWritten)),
      );
    } catch (error) {
      await this.discardReport(jobId, filePath);
      throw error;
    }

    return {
      result: { type: 'file', filePath, filename: range.reportFilename },
      sessionCount: sessions.length,
    };
  }

  private async discardReport(jobId: string, filePath: string): Promise<void> {
    await this.storage.remove(filePath).catch((error: unknown) => {
      this.logger.warn(
        { jobId, filePath, error: error instanceof Error ? error.message : String(error) },
        'Could not remove report',
      );
    });
  }
}
