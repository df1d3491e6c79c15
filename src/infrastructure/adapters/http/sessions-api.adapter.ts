import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import type { SessionsApiPort, SessionsPageQuery } from '../../../application/ports/output/sessions-api.port';
import type { AppConfig } from '../../../config/configuration';
import { UpstreamError } from '../../../domain/errors/usage-report.errors';
import { HttpClientService } from '../../../shared/http/http-client.service';
import {
  isRecord,
  type SessionRecord,
  type SessionsPage,
} from '../../../shared/interfaces/session-record.interface';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

const pageNumber = z.coerce.number().int().min(1).catch(1);

const pageEnvelopeSchema = z.object({
  data: z.array(z.unknown()).catch([]),
  pageInfo: z
    .object({
      currentPage: pageNumber,
      lastPage: pageNumber,
    })
    .catch({ currentPage: 1, lastPage: 1 }),
});

/**
 * Sessions API Adapter
 * Implements SessionsApiPort against the VideoSDK `GET /v2/sessions/`
 * endpoint over the shared undici client.
 *
 * The API key goes out verbatim in `Authorization` and is never logged.
 */
@Injectable()
export class SessionsApiAdapter implements SessionsApiPort {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpClient: HttpClientService,
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    const sessionsApiConfig = this.configService.getOrThrow('sessionsApi', { infer: true });
    this.url = sessionsApiConfig.url;
    this.timeoutMs = sessionsApiConfig.timeoutMs;
    this.logger.setContext(SessionsApiAdapter.name);
  }

  async fetchPage(apiKey: string, query: SessionsPageQuery): Promise<SessionsPage> {
    const response = await this.httpClient.get(this.url, {
      headers: {
        Authorization: apiKey,
        Accept: 'application/json',
      },
      query: {
        page: query.page,
        perPage: query.perPage,
        startDate: query.startDate,
        endDate: query.endDate,
      },
      timeout: this.timeoutMs,
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      this.logger.warn(
        { page: query.page, statusCode: response.statusCode },
        'Sessions API answered with an error status',
      );
      throw new UpstreamError(response.statusCode, response.text);
    }

    if (!isRecord(response.body)) {
      throw new Error(`Sessions API returned an unexpected payload for page ${query.page}`);
    }

    const envelope = pageEnvelopeSchema.parse(response.body);
    const data: SessionRecord[] = envelope.data.filter(isRecord);

    return {
      data,
      pageInfo: envelope.pageInfo,
    };
  }
}
