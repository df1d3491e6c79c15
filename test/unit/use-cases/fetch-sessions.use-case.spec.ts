import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FetchSessionsUseCase } from '../../../src/application/use-cases/fetch-sessions.use-case';
import { InvalidInputError, NoDataError, UpstreamError } from '../../../src/domain/errors/usage-report.errors';
import { InMemorySessionsApiAdapter } from '../../in-memory-adapters';
import { buildSessions } from '../helpers/mock-factories';
import { createUsageHarness, type UsageHarness } from '../helpers/usage-harness';

describe('FetchSessionsUseCase', () => {
  let harness: UsageHarness;
  let useCase: FetchSessionsUseCase;

  const useApi = async (sessionsApi: InMemorySessionsApiAdapter) => {
    harness = await createUsageHarness(sessionsApi);
    useCase = new FetchSessionsUseCase(harness.fetcher);
  };

  afterEach(async () => {
    await harness.cleanup();
  });

  describe('with two pages of sessions', () => {
    beforeEach(async () => {
      await useApi(InMemorySessionsApiAdapter.withPages([buildSessions(2), buildSessions(1, 'late')]));
    });

    it('should return every session with its count', async () => {
      const result = await useCase.execute({ apiKey: 'test-key', year: 2024, month: 3 });

      expect(result.count).toBe(3);
      expect(result.sessions.map((session) => session.id)).toEqual([
        'session-1',
        'session-2',
        'late-1',
      ]);
    });

    it('should query the month boundaries', async () => {
      await useCase.execute({ apiKey: 'test-key', year: 2024, month: 2 });

      expect(harness.sessionsApi.requests[0].query).toMatchObject({
        page: 1,
        startDate: Date.UTC(2024, 1, 1),
        endDate: Date.UTC(2024, 2, 1) - 1000,
      });
    });

    it('should reject bad input before calling upstream', async () => {
      await expect(useCase.execute({ apiKey: '', year: 2024, month: 3 })).rejects.toBeInstanceOf(
        InvalidInputError,
      );
      await expect(useCase.execute({ apiKey: 'test-key', year: 24, month: 3 })).rejects.toThrow(
        'Year must be a 4-digit integer, got 24',
      );
      expect(harness.sessionsApi.requests).toHaveLength(0);
    });
  });

  it('should report an empty month as no data', async () => {
    await useApi(InMemorySessionsApiAdapter.withPages([[]]));

    await expect(useCase.execute({ apiKey: 'test-key', year: 2024, month: 3 })).rejects.toBeInstanceOf(
      NoDataError,
    );
  });

  it('should pass upstream failures through', async () => {
    await useApi(new InMemorySessionsApiAdapter().failPage(1, 403, 'forbidden'));

    const error = await useCase.execute({ apiKey: 'test-key', year: 2024, month: 3 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ httpStatus: 403, body: 'forbidden' });
  });
});
