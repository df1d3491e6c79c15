import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir } from 'fs/promises';
import { DownloadExportUseCase } from '../../../src/application/use-cases/download-export.use-case';
import { JobNotFoundError, JobNotReadyError } from '../../../src/domain/errors/usage-report.errors';
import { TimeRangeVO } from '../../../src/domain/value-objects/time-range.vo';
import { InMemorySessionsApiAdapter } from '../../in-memory-adapters';
import { buildParticipant, buildSession } from '../helpers/mock-factories';
import { createUsageHarness, type UsageHarness } from '../helpers/usage-harness';

describe('DownloadExportUseCase', () => {
  const range = TimeRangeVO.forMonth(2024, 3);
  let harness: UsageHarness;
  let useCase: DownloadExportUseCase;

  beforeEach(async () => {
    harness = await createUsageHarness(
      InMemorySessionsApiAdapter.withPages([
        [buildSession('s1', [buildParticipant('p1', 'Alice', [{ start: 5, end: 9 }])])],
      ]),
    );
    useCase = new DownloadExportUseCase(harness.registry, harness.storage);
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  const completeExport = async (jobId: string) => {
    await harness.runner.startExportJob('test-key', range, 'auto', jobId);
    return harness.settle(jobId);
  };

  it('should hand out the CSV of a completed export', async () => {
    await completeExport('job-1');

    const report = await useCase.execute({ jobId: 'job-1' });

    expect(report.filename).toBe('usage_2024_3.csv');
    expect(report.content.toString('utf-8')).toBe(
      'session_id,room_id,session_start_time,session_end_time,status,number_of_participants,' +
        'participant1_id,participant1_name,participant1_first_start,participant1_last_end\r\n' +
        's1,room-s1,2024-03-01T10:00:00.000Z,2024-03-01T11:00:00.000Z,completed,1,p1,Alice,5,9\r\n',
    );
  });

  it('should forget the job and delete the file after a download', async () => {
    await completeExport('job-1');

    await useCase.execute({ jobId: 'job-1' });

    expect(await harness.registry.size()).toBe(0);
    expect(await readdir(harness.tempDir)).toEqual([]);
    await expect(useCase.execute({ jobId: 'job-1' })).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it('should give the file to only one of two concurrent downloads', async () => {
    await completeExport('job-1');

    const results = await Promise.allSettled([
      useCase.execute({ jobId: 'job-1' }),
      useCase.execute({ jobId: 'job-1' }),
    ]);

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected',
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(JobNotFoundError);
  });

  it('should refuse a running export and keep it registered', async () => {
    const release = harness.sessionsApi.holdPage(1);
    await harness.runner.startExportJob('test-key', range, 'auto', 'job-1');

    await expect(useCase.execute({ jobId: 'job-1' })).rejects.toThrow(
      new JobNotReadyError('job-1', 'running'),
    );
    expect(await harness.registry.size()).toBe(1);

    release();
    await harness.settle('job-1');
  });

  it('should refuse a failed export', async () => {
    harness.sessionsApi.failPage(1, 500, 'boom');
    await harness.runner.startExportJob('test-key', range, 'auto', 'job-1');
    await harness.settle('job-1');

    await expect(useCase.execute({ jobId: 'job-1' })).rejects.toThrow(
      'Job job-1 is error, export is not available for download',
    );
  });

  it('should treat fetch jobs and unknown ids as missing', async () => {
    await harness.runner.startFetchJob('test-key', range, 'job-1');
    await harness.settle('job-1');

    await expect(useCase.execute({ jobId: 'job-1' })).rejects.toBeInstanceOf(JobNotFoundError);
    await expect(useCase.execute({ jobId: 'nope' })).rejects.toBeInstanceOf(JobNotFoundError);
    expect(await harness.registry.size()).toBe(1);
  });
});
