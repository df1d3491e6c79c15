import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryJobRegistryAdapter } from '../../../src/infrastructure/adapters/persistence/in-memory-job-registry.adapter';
import { UsageJobEntity } from '../../../src/domain/entities/usage-job.entity';
import { JobNotFoundError } from '../../../src/domain/errors/usage-report.errors';

const createJob = (jobId: string) =>
  UsageJobEntity.create({ jobId, kind: 'fetch', request: { year: 2024, month: 3 } });

describe('InMemoryJobRegistryAdapter', () => {
  let registry: InMemoryJobRegistryAdapter;

  beforeEach(() => {
    registry = new InMemoryJobRegistryAdapter();
  });

  describe('create and get', () => {
    it('should store a job under its id', async () => {
      const job = createJob('job-1');

      await registry.create(job);

      expect(await registry.get('job-1')).toBe(job);
      expect(await registry.size()).toBe(1);
    });

    it('should refuse a duplicate id', async () => {
      await registry.create(createJob('job-1'));

      await expect(registry.create(createJob('job-1'))).rejects.toThrow('Job job-1 already exists');
    });

    it('should reject unknown ids with JobNotFoundError', async () => {
      await expect(registry.get('missing')).rejects.toBeInstanceOf(JobNotFoundError);
      await expect(registry.update('missing', (job) => job)).rejects.toBeInstanceOf(JobNotFoundError);
      await expect(registry.consume('missing', () => true)).rejects.toBeInstanceOf(JobNotFoundError);
    });
  });

  describe('update', () => {
    it('should replace the job with the mutator result', async () => {
      await registry.create(createJob('job-1'));

      const updated = await registry.update('job-1', (job) => job.withFetchProgress(1, 4));

      expect(updated.progress).toBe(25);
      expect((await registry.get('job-1')).progress).toBe(25);
    });

    it('should keep the stored job when the mutator throws', async () => {
      await registry.create(createJob('job-1'));
      await registry.update('job-1', (job) => job.transitionToFailed('boom'));

      await expect(registry.update('job-1', (job) => job.withFetchProgress(1, 1))).rejects.toThrow(
        'Cannot record fetch progress: job job-1 is already error',
      );
      expect((await registry.get('job-1')).errorMessage).toBe('boom');
    });
  });

  describe('consume', () => {
    it('should remove the job only when it is deliverable', async () => {
      await registry.create(createJob('job-1'));

      const running = await registry.consume('job-1', (job) => job.isTerminal());
      expect(running.isTerminal()).toBe(false);
      expect(await registry.size()).toBe(1);

      await registry.update('job-1', (job) => job.transitionToCompleted({ type: 'sessions', sessions: [] }));
      const completed = await registry.consume('job-1', (job) => job.isTerminal());

      expect(completed.isCompleted()).toBe(true);
      expect(await registry.size()).toBe(0);
      await expect(registry.consume('job-1', (job) => job.isTerminal())).rejects.toBeInstanceOf(
        JobNotFoundError,
      );
    });

    it('should deliver a terminal job to exactly one of many concurrent readers', async () => {
      await registry.create(createJob('job-1'));
      await registry.update('job-1', (job) => job.transitionToCompleted({ type: 'sessions', sessions: [] }));

      const outcomes = await Promise.allSettled(
        Array.from({ length: 20 }, () => registry.consume('job-1', (job) => job.isTerminal())),
      );

      expect(outcomes.filter((outcome) => outcome.status === 'fulfilled')).toHaveLength(1);
      expect(outcomes.filter((outcome) => outcome.status === 'rejected')).toHaveLength(19);
    });
  });

  describe('delete', () => {
    it('should tell whether anything was removed', async () => {
      await registry.create(createJob('job-1'));

      expect(await registry.delete('job-1')).toBe(true);
      expect(await registry.delete('job-1')).toBe(false);
    });
  });

  describe('subscribe', () => {
    it('should deliver every version of the job in write order', async () => {
      const seen: number[] = [];
      const unsubscribe = registry.subscribe('job-1', (job) => seen.push(job.progress));

      await registry.create(createJob('job-1'));
      await Promise.all([
        registry.update('job-1', (job) => job.withFetchProgress(1, 4)),
        registry.update('job-1', (job) => job.withFetchProgress(2, 4)),
        registry.update('job-1', (job) => job.withFetchProgress(3, 4)),
      ]);
      unsubscribe();
      await registry.update('job-1', (job) => job.withFetchProgress(4, 4));

      expect(seen).toEqual([0, 25, 50, 75]);
    });

    it('should not hear about other jobs', async () => {
      const seen: string[] = [];
      registry.subscribe('job-1', (job) => seen.push(job.jobId));

      await registry.create(createJob('job-2'));

      expect(seen).toEqual([]);
    });

    it('should keep updating when a listener throws', async () => {
      registry.subscribe('job-1', () => {
        throw new Error('listener failure');
      });

      await expect(registry.create(createJob('job-1'))).resolves.toBeDefined();
      await expect(registry.update('job-1', (job) => job.withFetchProgress(1, 2))).resolves.toBeDefined();
    });
  });

  describe('under concurrent load', () => {
    it('should never lose an update or corrupt the table', async () => {
      const jobIds = Array.from({ length: 25 }, (_, index) => `job-${index}`);
      const pagesPerJob = 40;

      await Promise.all(jobIds.map((jobId) => registry.create(createJob(jobId))));

      // Every job gets all of its page updates, interleaved with reads of every other job
      await Promise.all(
        jobIds.flatMap((jobId) => [
          ...Array.from({ length: pagesPerJob }, (_, page) =>
            registry.update(jobId, (job) =>
              job.withFetchProgress(Math.max(job.currentPage, page + 1), pagesPerJob),
            ),
          ),
          ...jobIds.map((otherId) => registry.get(otherId)),
          registry.size(),
        ]),
      );

      expect(await registry.size()).toBe(jobIds.length);
      for (const jobId of jobIds) {
        const job = await registry.get(jobId);
        expect(job.currentPage).toBe(pagesPerJob);
        expect(job.progress).toBe(99);
      }

      const delivered = await Promise.all(
        jobIds.map((jobId) =>
          registry
            .update(jobId, (job) => job.transitionToCompleted({ type: 'sessions', sessions: [] }))
            .then(() => registry.consume(jobId, (job) => job.isTerminal())),
        ),
      );

      expect(delivered.every((job) => job.progress === 100)).toBe(true);
      expect(await registry.size()).toBe(0);
    });

    it('should count every increment made through read-modify-write mutators', async () => {
      await registry.create(createJob('counter'));

      await Promise.all(
        Array.from({ length: 200 }, () =>
          registry.update('counter', (job) => job.withFetchProgress(job.currentPage + 1, 200)),
        ),
      );

      expect((await registry.get('counter')).currentPage).toBe(200);
    });
  });
});
