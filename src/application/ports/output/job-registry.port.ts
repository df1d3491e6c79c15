import type { UsageJobEntity } from '../../../domain/entities/usage-job.entity';

export type JobMutator = (job: UsageJobEntity) => UsageJobEntity;

export type JobListener = (job: UsageJobEntity) => void;

/**
 * Job Registry Port (Driven Port)
 * The single owner of every usage job. Each call runs as one critical
 * section over the whole table; callers only ever see immutable snapshots.
 */
export interface JobRegistryPort {
  /**
   * Register a new job. Rejects if the id is already taken.
   */
  create(job: UsageJobEntity): Promise<UsageJobEntity>;

  /**
   * Replace a job with the mutator's result, atomically.
   * Rejects with `JobNotFoundError` if the job is unknown.
   */
  update(jobId: string, mutator: JobMutator): Promise<UsageJobEntity>;

  /**
   * Rejects with `JobNotFoundError` if the job is unknown.
   */
  get(jobId: string): Promise<UsageJobEntity>;

  /**
   * Read-once-destructive delivery: returns the job and, when
   * `isDeliverable` holds, removes it in the same critical section.
   */
  consume(jobId: string, isDeliverable: (job: UsageJobEntity) => boolean): Promise<UsageJobEntity>;

  /**
   * Resolves `false` when there was nothing to delete.
   */
  delete(jobId: string): Promise<boolean>;

  size(): Promise<number>;

  /**
   * Receive every new version of a job (creation included), in order.
   * Returns the unsubscribe function.
   */
  subscribe(jobId: string, listener: JobListener): () => void;
}
