import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/configuration';
import type { SessionsApiPort } from '../../application/ports/output/sessions-api.port';
import { SESSIONS_API_PORT } from '../../application/ports/output/tokens';
import { NoDataError } from '../../domain/errors/usage-report.errors';
import type { TimeRangeVO } from '../../domain/value-objects/time-range.vo';
import type { SessionRecord } from '../../shared/interfaces/session-record.interface';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export interface FetchedPage {
  records: SessionRecord[];
  currentPage: number;
  /** `lastPage` of the first response, kept for the whole fetch. */
  totalPages: number;
}

export type PageProgressObserver = (
  currentPage: number,
  totalPages: number,
) => void | Promise<unknown>;

/**
 * Walks the sessions API page by page for one month.
 *
 * Every call owns its own page counter and accumulator, so any number of
 * fetches can run side by side. There is no retry: the first non-2xx page
 * rejects the whole fetch and nothing already fetched is returned.
 */
@Injectable()
export class SessionFetcherService {
  private readonly pageSize: number;
  private readonly pageDelayMs: number;

  constructor(
    @Inject(SESSIONS_API_PORT) private readonly sessionsApi: SessionsApiPort,
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    const sessionsApiConfig = this.configService.getOrThrow('sessionsApi', { infer: true });

    this.pageSize = sessionsApiConfig.pageSize;
    this.pageDelayMs = sessionsApiConfig.pageDelayMs;

    this.logger.setContext(SessionFetcherService.name);
  }

  /**
   * Yields pages in order until `currentPage >= lastPage`, sleeping between
   * two requests.
   */
  async *pages(apiKey: string, range: TimeRangeVO): AsyncGenerator<FetchedPage> {
    let page = 1;
    let totalPages: number | undefined;

    while (true) {
      const response = await this.sessionsApi.fetchPage(apiKey, {
        page,
        perPage: this.pageSize,
        startDate: range.startMs,
        endDate: range.endMs,
      });

      const { currentPage, lastPage } = response.pageInfo;
      totalPages ??= lastPage;

      this.logger.debug(
        { page, currentPage, lastPage, records: response.data.length },
        'Fetched sessions page',
      );

      yield { records: response.data, currentPage, totalPages };

      if (currentPage >= lastPage) {
        return;
      }

      page += 1;
      await this.delay(this.pageDelayMs);
    }
  }

  /**
   * Every session of the month, in page order.
   * Rejects with `NoDataError` when the month has no sessions at all.
   */
  async fetchAll(
    apiKey: string,
    range: TimeRangeVO,
    onProgress?: PageProgressObserver,
  ): Promise<SessionRecord[]> {
    const sessions: SessionRecord[] = [];
    let pages = 0;

    for await (const page of this.pages(apiKey, range)) {
      sessions.push(...page.records);
      pages += 1;

      if (onProgress) {
        await onProgress(page.currentPage, page.totalPages);
      }
    }

    if (sessions.length === 0) {
      throw new NoDataError();
    }

    this.logger.info(
      { year: range.year, month: range.month, pages, sessions: sessions.length },
      'Fetched all sessions for month',
    );

    return sessions;
  }

  private delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
