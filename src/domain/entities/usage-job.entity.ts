import { castDraft, produce } from 'immer';
import { JobStatusVO, JobStatus, JobStep } from '../value-objects/job-status.vo';
import type { ParticipantColumns } from '../value-objects/participant-columns.vo';
import type { SessionRecord } from '../../shared/interfaces/session-record.interface';

/**
 * Usage Job Entity - Aggregate Root
 * One background fetch (optionally followed by a CSV export) of a month of
 * session usage.
 *
 * Same shape as the other entities: a readonly data interface, pure namespace
 * functions that return new instances through Immer, and `create` attaching
 * the functions as methods.
 *
 * Progress never decreases and only reaches 100 on completion. Fetch jobs map
 * pages onto 0-99; export jobs map pages onto 0-50 and written rows onto
 * 50-99.
 */

export type UsageJobKind = 'fetch' | 'export';

export type UsageJobResult =
  | { readonly type: 'sessions'; readonly sessions: ReadonlyArray<SessionRecord> }
  | { readonly type: 'file'; readonly filePath: string; readonly filename: string };

export interface UsageJobRequest {
  readonly year: number;
  readonly month: number;
  readonly participantColumns?: ParticipantColumns;
}

export interface UsageJobEntityData {
  readonly jobId: string;
  readonly kind: UsageJobKind;
  readonly status: JobStatusVO;
  readonly step: JobStep;
  readonly progress: number;
  readonly currentPage: number;
  readonly totalPages: number;
  readonly rowsWritten: number;
  readonly totalRows: number;
  readonly request: UsageJobRequest;
  readonly result?: UsageJobResult;
  readonly errorMessage?: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * What status queries hand out: plain JSON, never the temp file path.
 */
export interface UsageJobSnapshot {
  jobId: string;
  kind: UsageJobKind;
  status: JobStatus;
  step: JobStep;
  progress: number;
  currentPage: number;
  totalPages: number;
  rowsWritten?: number;
  totalRows?: number;
  result?:
    | { type: 'sessions'; count: number; sessions: ReadonlyArray<SessionRecord> }
    | { type: 'file'; filename: string };
  error?: string;
  createdAt: string;
  updatedAt: string;
}

export interface UsageJobEntity extends UsageJobEntityData {
  // Query methods
  isTerminal(): boolean;
  isCompleted(): boolean;
  isFailed(): boolean;
  hasFile(): boolean;

  // Mutation methods (return new instances)
  withFetchProgress(currentPage: number, totalPages: number): UsageJobEntity;
  transitionToGenerate(totalRows: number): UsageJobEntity;
  withGenerateProgress(rowsWritten: number): UsageJobEntity;
  transitionToCompleted(result: UsageJobResult): UsageJobEntity;
  transitionToFailed(errorMessage: string): UsageJobEntity;

  toSnapshot(): UsageJobSnapshot;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace UsageJobEntity {
  const MAX_RUNNING_PROGRESS = 99;
  const EXPORT_FETCH_SHARE = 50;

  export interface CreateProps {
    jobId: string;
    kind: UsageJobKind;
    request: UsageJobRequest;
    createdAt?: Date;
  }

  /**
   * New job in `running` state at the fetch step.
   */
  export function create(props: CreateProps): UsageJobEntity {
    validate(props);

    const now = props.createdAt ?? new Date();
    const data: UsageJobEntityData = {
      jobId: props.jobId,
      kind: props.kind,
      status: JobStatusVO.running(),
      step: JobStep.FETCH,
      progress: 0,
      currentPage: 0,
      totalPages: 0,
      rowsWritten: 0,
      totalRows: 0,
      request: { ...props.request },
      createdAt: now,
      updatedAt: now,
    };

    return attachMethods(data);
  }

  function attachMethods(data: UsageJobEntityData): UsageJobEntity {
    return {
      ...data,

      isTerminal: () => isTerminal(data),
      isCompleted: () => data.status.isCompleted(),
      isFailed: () => data.status.isError(),
      hasFile: () => hasFile(data),

      withFetchProgress: (currentPage: number, totalPages: number) =>
        withFetchProgress(data, currentPage, totalPages),
      transitionToGenerate: (totalRows: number) => transitionToGenerate(data, totalRows),
      withGenerateProgress: (rowsWritten: number) => withGenerateProgress(data, rowsWritten),
      transitionToCompleted: (result: UsageJobResult) => transitionToCompleted(data, result),
      transitionToFailed: (errorMessage: string) => transitionToFailed(data, errorMessage),

      toSnapshot: () => toSnapshot(data),
    };
  }

  function validate(props: CreateProps): void {
    if (!props.jobId || props.jobId.trim().length === 0) {
      throw new Error('Job ID is required');
    }
    if (props.kind !== 'fetch' && props.kind !== 'export') {
      throw new Error(`Unknown job kind: ${String(props.kind)}`);
    }
  }

  function assertTransition(job: UsageJobEntityData, next: JobStatusVO, action: string): void {
    if (!job.status.canTransitionTo(next)) {
      throw new Error(`Cannot ${action}: job ${job.jobId} is already ${job.status.toString()}`);
    }
  }

  // ===== Queries =====

  export function isTerminal(job: UsageJobEntityData): boolean {
    return job.status.isTerminal();
  }

  export function hasFile(job: UsageJobEntityData): boolean {
    return job.result?.type === 'file';
  }

  export function fetchPercentage(kind: UsageJobKind, currentPage: number, totalPages: number): number {
    if (totalPages <= 0) {
      return 0;
    }
    const ratio = Math.min(Math.max(currentPage, 0), totalPages) / totalPages;
    const share = kind === 'fetch' ? 100 : EXPORT_FETCH_SHARE;
    return Math.min(Math.floor(ratio * share), MAX_RUNNING_PROGRESS);
  }

  export function generatePercentage(rowsWritten: number, totalRows: number): number {
    if (totalRows <= 0) {
      return MAX_RUNNING_PROGRESS;
    }
    const ratio = Math.min(Math.max(rowsWritten, 0), totalRows) / totalRows;
    return Math.min(
      EXPORT_FETCH_SHARE + Math.floor(ratio * (100 - EXPORT_FETCH_SHARE)),
      MAX_RUNNING_PROGRESS,
    );
  }

  // ===== State Mutations (Return new instances via Immer) =====

  export function withFetchProgress(
    job: UsageJobEntityData,
    currentPage: number,
    totalPages: number,
  ): UsageJobEntity {
    assertTransition(job, JobStatusVO.running(), 'record fetch progress');
    if (job.step !== JobStep.FETCH) {
      throw new Error(`Job ${job.jobId} already left the fetch step`);
    }

    const updated = produce(job, (draft) => {
      draft.currentPage = currentPage;
      draft.totalPages = totalPages;
      draft.progress = Math.max(draft.progress, fetchPercentage(job.kind, currentPage, totalPages));
      draft.updatedAt = new Date();
    });
    return attachMethods(updated);
  }

  export function transitionToGenerate(job: UsageJobEntityData, totalRows: number): UsageJobEntity {
    assertTransition(job, JobStatusVO.running(), 'start generating');
    if (job.kind !== 'export') {
      throw new Error(`Job ${job.jobId} is a fetch job and has no generate step`);
    }

    const updated = produce(job, (draft) => {
      draft.step = JobStep.GENERATE;
      draft.totalRows = totalRows;
      draft.rowsWritten = 0;
      draft.progress = Math.max(draft.progress, EXPORT_FETCH_SHARE);
      draft.updatedAt = new Date();
    });
    return attachMethods(updated);
  }

  export function withGenerateProgress(job: UsageJobEntityData, rowsWritten: number): UsageJobEntity {
    assertTransition(job, JobStatusVO.running(), 'record export progress');
    if (job.step !== JobStep.GENERATE) {
      throw new Error(`Job ${job.jobId} is not generating a report`);
    }

    const updated = produce(job, (draft) => {
      draft.rowsWritten = Math.max(draft.rowsWritten, rowsWritten);
      draft.progress = Math.max(draft.progress, generatePercentage(rowsWritten, job.totalRows));
      draft.updatedAt = new Date();
    });
    return attachMethods(updated);
  }

  export function transitionToCompleted(
    job: UsageJobEntityData,
    result: UsageJobResult,
  ): UsageJobEntity {
    assertTransition(job, JobStatusVO.completed(), 'complete');
    if (job.kind === 'fetch' && result.type !== 'sessions') {
      throw new Error(`Fetch job ${job.jobId} must complete with sessions`);
    }
    if (job.kind === 'export' && result.type !== 'file') {
      throw new Error(`Export job ${job.jobId} must complete with a file`);
    }

    const updated = produce(job, (draft) => {
      draft.status = JobStatusVO.completed();
      draft.progress = 100;
      draft.result = castDraft(result);
      draft.updatedAt = new Date();
    });
    return attachMethods(updated);
  }

  export function transitionToFailed(job: UsageJobEntityData, errorMessage: string): UsageJobEntity {
    assertTransition(job, JobStatusVO.error(), 'fail');

    const updated = produce(job, (draft) => {
      draft.status = JobStatusVO.error();
      draft.errorMessage = errorMessage;
      draft.result = undefined;
      draft.updatedAt = new Date();
    });
    return attachMethods(updated);
  }

  // ===== Serialization =====

  export function toSnapshot(job: UsageJobEntityData): UsageJobSnapshot {
    const snapshot: UsageJobSnapshot = {
      jobId: job.jobId,
      kind: job.kind,
      status: job.status.value,
      step: job.step,
      progress: job.progress,
      currentPage: job.currentPage,
      totalPages: job.totalPages,
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
    };

    if (job.kind === 'export') {
      snapshot.rowsWritten = job.rowsWritten;
      snapshot.totalRows = job.totalRows;
    }

    if (job.result?.type === 'sessions') {
      snapshot.result = {
        type: 'sessions',
        count: job.result.sessions.length,
        sessions: job.result.sessions,
      };
    } else if (job.result?.type === 'file') {
      snapshot.result = { type: 'file', filename: job.result.filename };
    }

    if (job.errorMessage !== undefined) {
      snapshot.error = job.errorMessage;
    }

    return snapshot;
  }
}
