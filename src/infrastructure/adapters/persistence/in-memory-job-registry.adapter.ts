import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter } from 'events';
import type {
  JobListener,
  JobMutator,
  JobRegistryPort,
} from '../../../application/ports/output/job-registry.port';
import type { UsageJobEntity } from '../../../domain/entities/usage-job.entity';
import { JobNotFoundError } from '../../../domain/errors/usage-report.errors';
import { ExclusiveLock } from '../../../shared/concurrency/exclusive-lock';

/**
 * In-Memory Job Registry Adapter
 * Implements JobRegistryPort with a process-local map.
 *
 * Every operation holds one lock over the whole map, and subscribers are
 * notified from inside it, so each listener sees a job's versions in the
 * order they were written. Jobs are lost on restart.
 */
@Injectable()
export class InMemoryJobRegistryAdapter implements JobRegistryPort {
  private readonly logger = new Logger(InMemoryJobRegistryAdapter.name);
  private readonly jobs = new Map<string, UsageJobEntity>();
  private readonly lock = new ExclusiveLock();
  private readonly changes = new EventEmitter();

  constructor() {
    this.changes.setMaxListeners(0);
  }

  async create(job: UsageJobEntity): Promise<UsageJobEntity> {
    return this.lock.runExclusive(() => {
      if (this.jobs.has(job.jobId)) {
        throw new Error(`Job ${job.jobId} already exists`);
      }
      this.jobs.set(job.jobId, job);
      this.logger.debug(`Registered ${job.kind} job ${job.jobId}`);
      this.notify(job);
      return job;
    });
  }

  async update(jobId: string, mutator: JobMutator): Promise<UsageJobEntity> {
    return this.lock.runExclusive(() => {
      const updated = mutator(this.require(jobId));
      this.jobs.set(jobId, updated);
      this.notify(updated);
      return updated;
    });
  }

  async get(jobId: string): Promise<UsageJobEntity> {
    return this.lock.runExclusive(() => this.require(jobId));
  }

  async consume(
    jobId: string,
    isDeliverable: (job: UsageJobEntity) => boolean,
  ): Promise<UsageJobEntity> {
    return this.lock.runExclusive(() => {
      const job = this.require(jobId);
      if (isDeliverable(job)) {
        this.jobs.delete(jobId);
        this.logger.debug(`Delivered and removed job ${jobId}`);
      }
      return job;
    });
  }

  async delete(jobId: string): Promise<boolean> {
    return this.lock.runExclusive(() => this.jobs.delete(jobId));
  }

  async size(): Promise<number> {
    return this.lock.runExclusive(() => this.jobs.size);
  }

  subscribe(jobId: string, listener: JobListener): () => void {
    const handler = (job: UsageJobEntity): void => {
      try {
        listener(job);
      } catch (error) {
        this.logger.error(
          `Listener for job ${jobId} failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    };

    this.changes.on(jobId, handler);
    return () => {
      this.changes.off(jobId, handler);
    };
  }

  private require(jobId: string): UsageJobEntity {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  private notify(job: UsageJobEntity): void {
    this.changes.emit(job.jobId, job);
  }
}
