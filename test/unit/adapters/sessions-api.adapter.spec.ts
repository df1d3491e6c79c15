import { describe, it, expect, beforeEach, vi, type MockInstance } from 'vitest';
import { SessionsApiAdapter } from '../../../src/infrastructure/adapters/http/sessions-api.adapter';
import { HttpClientService, type HttpResponse } from '../../../src/shared/http/http-client.service';
import { UpstreamError } from '../../../src/domain/errors/usage-report.errors';
import { createSilentLogger, createTestConfigService } from '../helpers/mock-factories';

const jsonResponse = (statusCode: number, body: unknown): HttpResponse => ({
  statusCode,
  headers: { 'content-type': 'application/json' },
  body,
  text: JSON.stringify(body),
});

const textResponse = (statusCode: number, text: string): HttpResponse => ({
  statusCode,
  headers: { 'content-type': 'text/plain' },
  body: text,
  text,
});

describe('SessionsApiAdapter', () => {
  const query = { page: 2, perPage: 20, startDate: 1709251200000, endDate: 1711929599000 };
  let httpClient: HttpClientService;
  let get: MockInstance<HttpClientService['get']>;
  let adapter: SessionsApiAdapter;

  beforeEach(() => {
    httpClient = new HttpClientService(createSilentLogger());
    get = vi.spyOn(httpClient, 'get');
    adapter = new SessionsApiAdapter(httpClient, createTestConfigService(), createSilentLogger());
  });

  it('should send the key and page query', async () => {
    get.mockResolvedValue(jsonResponse(200, { data: [], pageInfo: { currentPage: 2, lastPage: 2 } }));

    await adapter.fetchPage('test-key', query);

    expect(get).toHaveBeenCalledWith('https://sessions.example.test/v2/sessions/', {
      headers: { Authorization: 'test-key', Accept: 'application/json' },
      query: { page: 2, perPage: 20, startDate: 1709251200000, endDate: 1711929599000 },
      timeout: 1000,
    });
  });

  it('should return the records and page info', async () => {
    get.mockResolvedValue(
      jsonResponse(200, {
        data: [{ id: 's1', roomId: 'r1', extra: { nested: true } }],
        pageInfo: { currentPage: 2, lastPage: 5, perPage: 20 },
      }),
    );

    const page = await adapter.fetchPage('test-key', query);

    expect(page).toEqual({
      data: [{ id: 's1', roomId: 'r1', extra: { nested: true } }],
      pageInfo: { currentPage: 2, lastPage: 5 },
    });
  });

  it('should default missing data and page info', async () => {
    get.mockResolvedValue(jsonResponse(200, {}));

    expect(await adapter.fetchPage('test-key', query)).toEqual({
      data: [],
      pageInfo: { currentPage: 1, lastPage: 1 },
    });
  });

  it('should default each missing page field on its own and drop non-object records', async () => {
    get.mockResolvedValue(jsonResponse(200, { data: [{ id: 'a' }, 'junk', null], pageInfo: { currentPage: '3' } }));

    expect(await adapter.fetchPage('test-key', query)).toEqual({
      data: [{ id: 'a' }],
      pageInfo: { currentPage: 3, lastPage: 1 },
    });
  });

  it('should raise UpstreamError with the raw body on an error status', async () => {
    get.mockResolvedValue(textResponse(403, 'Forbidden: invalid token'));

    const failure = adapter.fetchPage('test-key', query);

    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toMatchObject({
      statusCode: 403,
      body: 'Forbidden: invalid token',
      httpStatus: 403,
      message: 'Sessions API returned status 403: Forbidden: invalid token',
    });
  });

  it('should answer a non-error, non-2xx status as a bad gateway', async () => {
    get.mockResolvedValue(textResponse(302, ''));

    await expect(adapter.fetchPage('test-key', query)).rejects.toMatchObject({
      statusCode: 302,
      httpStatus: 502,
    });
  });

  it('should reject a success body that is not a JSON object', async () => {
    get.mockResolvedValue(textResponse(200, 'not json'));

    await expect(adapter.fetchPage('test-key', query)).rejects.toThrow(
      'Sessions API returned an unexpected payload for page 2',
    );
  });

  it('should let transport failures through', async () => {
    get.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(adapter.fetchPage('test-key', query)).rejects.toThrow('connect ECONNREFUSED');
  });
});
