import { Inject, Injectable, Logger } from '@nestjs/common';
import { Observable, type Subscriber } from 'rxjs';
import { v4 as uuidv4 } from 'uuid';
import type {
  StreamUsageJobCommand,
  StreamUsageJobPort,
  UsageJobErrorEvent,
  UsageJobEvent,
} from '../ports/input/stream-usage-job.port';
import type { JobRegistryPort } from '../ports/output/job-registry.port';
import { JOB_REGISTRY_PORT } from '../ports/output/tokens';
import type { UsageJobEntity } from '../../domain/entities/usage-job.entity';
import { UsageReportError } from '../../domain/errors/usage-report.errors';
import { parseParticipantColumns } from '../../domain/value-objects/participant-columns.vo';
import { TimeRangeVO } from '../../domain/value-objects/time-range.vo';
import { JobRunnerService } from '../../processing/services/job-runner.service';
import { requireApiKey } from './usage-request';

function toErrorEvent(error: unknown, jobId?: string): UsageJobErrorEvent {
  if (error instanceof UsageReportError) {
    return { type: 'error', jobId, code: error.code, message: error.message };
  }
  return {
    type: 'error',
    jobId,
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Stream Usage Job Use Case
 *
 * Starts a job like its polling counterpart and pushes every version the
 * registry records as a typed event:
 *
 * - `init` once, before any work starts
 * - `progress` for each running version
 * - `complete` or `error` exactly once, then the stream completes
 *
 * Failures never error the Observable; they arrive as the terminal `error`
 * event. A streamed fetch job (or a failed job) is removed once its terminal
 * event is sent. A completed export stays registered so its file can be
 * downloaded through the regular download endpoint. Unsubscribing stops the
 * events but not the job.
 */
@Injectable()
export class StreamUsageJobUseCase implements StreamUsageJobPort {
  private readonly logger = new Logger(StreamUsageJobUseCase.name);

  constructor(
    private readonly jobRunner: JobRunnerService,
    @Inject(JOB_REGISTRY_PORT) private readonly registry: JobRegistryPort,
  ) {}

  execute(command: StreamUsageJobCommand): Observable<UsageJobEvent> {
    return new Observable<UsageJobEvent>((subscriber) => {
      let apiKey: string;
      let range: TimeRangeVO;
      let participantColumns: ReturnType<typeof parseParticipantColumns>;
      try {
        apiKey = requireApiKey(command.apiKey);
        range = TimeRangeVO.forMonth(command.year, command.month);
        participantColumns = parseParticipantColumns(command.participantColumns);
      } catch (error) {
        subscriber.next(toErrorEvent(error));
        subscriber.complete();
        return undefined;
      }

      const jobId = uuidv4();
      let settled = false;

      const finish = (event: UsageJobEvent): void => {
        if (settled) {
          return;
        }
        settled = true;
        unsubscribe();
        subscriber.next(event);
        subscriber.complete();
      };

      subscriber.next({
        type: 'init',
        jobId,
        kind: command.kind,
        year: range.year,
        month: range.month,
      });

      const unsubscribe = this.registry.subscribe(jobId, (job) => {
        if (!settled) {
          this.onJobVersion(job, subscriber, finish);
        }
      });

      const started =
        command.kind === 'fetch'
          ? this.jobRunner.startFetchJob(apiKey, range, jobId)
          : this.jobRunner.startExportJob(apiKey, range, participantColumns, jobId);

      started.catch((error: unknown) => {
        this.logger.error(
          `Could not start streamed ${command.kind} job ${jobId}: ${error instanceof Error ? error.message : String(error)}`,
        );
        finish(toErrorEvent(error, jobId));
      });

      return () => {
        settled = true;
        unsubscribe();
      };
    });
  }

  private onJobVersion(
    job: UsageJobEntity,
    subscriber: Subscriber<UsageJobEvent>,
    finish: (event: UsageJobEvent) => void,
  ): void {
    if (!job.isTerminal()) {
      subscriber.next({
        type: 'progress',
        jobId: job.jobId,
        step: job.step,
        progress: job.progress,
        currentPage: job.currentPage,
        totalPages: job.totalPages,
        ...(job.kind === 'export' && { rowsWritten: job.rowsWritten, totalRows: job.totalRows }),
      });
      return;
    }

    // Called from inside the registry's critical section: removal is queued behind it
    if (job.isFailed() || job.kind === 'fetch') {
      this.registry.delete(job.jobId).catch((error: unknown) => {
        this.logger.warn(
          `Could not remove streamed job ${job.jobId}: ${error instanceof Error ? error.message : String(error)}`,
        );
      });
    }

    const snapshot = job.toSnapshot();
    if (job.isFailed() || !snapshot.result) {
      finish({
        type: 'error',
        jobId: job.jobId,
        code: 'JOB_FAILED',
        message: snapshot.error ?? 'Job ended without a result',
      });
      return;
    }

    finish({ type: 'complete', jobId: job.jobId, kind: job.kind, result: snapshot.result });
  }
}
