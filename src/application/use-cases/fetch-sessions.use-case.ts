import { Injectable, Logger } from '@nestjs/common';
import type {
  FetchSessionsPort,
  FetchSessionsQuery,
  FetchSessionsResult,
} from '../ports/input/fetch-sessions.port';
import { TimeRangeVO } from '../../domain/value-objects/time-range.vo';
import { SessionFetcherService } from '../../processing/services/session-fetcher.service';
import { requireApiKey } from './usage-request';

@Injectable()
export class FetchSessionsUseCase implements FetchSessionsPort {
  private readonly logger = new Logger(FetchSessionsUseCase.name);

  constructor(private readonly fetcher: SessionFetcherService) {}

  async execute(query: FetchSessionsQuery): Promise<FetchSessionsResult> {
    const apiKey = requireApiKey(query.apiKey);
    const range = TimeRangeVO.forMonth(query.year, query.month);

    const sessions = await this.fetcher.fetchAll(apiKey, range);

    this.logger.log(`Fetched ${sessions.length} sessions for ${range.year}-${range.month}`);
    return { count: sessions.length, sessions };
  }
}
