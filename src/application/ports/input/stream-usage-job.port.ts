import type { Observable } from 'rxjs';
import type { UsageJobKind, UsageJobSnapshot } from '../../../domain/entities/usage-job.entity';
import type { JobStep } from '../../../domain/value-objects/job-status.vo';

export interface StreamUsageJobCommand {
  kind: UsageJobKind;
  apiKey: string;
  year: number;
  month: number;
  participantColumns?: string | number;
}

export interface UsageJobInitEvent {
  type: 'init';
  jobId: string;
  kind: UsageJobKind;
  year: number;
  month: number;
}

export interface UsageJobProgressEvent {
  type: 'progress';
  jobId: string;
  step: JobStep;
  progress: number;
  currentPage: number;
  totalPages: number;
  rowsWritten?: number;
  totalRows?: number;
}

export interface UsageJobCompleteEvent {
  type: 'complete';
  jobId: string;
  kind: UsageJobKind;
  result: NonNullable<UsageJobSnapshot['result']>;
}

export interface UsageJobErrorEvent {
  type: 'error';
  jobId?: string;
  code: string;
  message: string;
}

/**
 * `complete` and `error` are terminal: nothing follows them.
 */
export type UsageJobEvent =
  | UsageJobInitEvent
  | UsageJobProgressEvent
  | UsageJobCompleteEvent
  | UsageJobErrorEvent;

/**
 * Stream Usage Job Port (Driving Port / Use Case Interface)
 * Runs a usage job and pushes its progress instead of being polled
 */
export interface StreamUsageJobPort {
  execute(command: StreamUsageJobCommand): Observable<UsageJobEvent>;
}
