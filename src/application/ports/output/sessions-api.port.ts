import type { SessionsPage } from '../../../shared/interfaces/session-record.interface';

/**
 * Query for one page of sessions. `startDate` and `endDate` are inclusive
 * epoch milliseconds.
 */
export interface SessionsPageQuery {
  page: number;
  perPage: number;
  startDate: number;
  endDate: number;
}

/**
 * Sessions API Port (Driven Port)
 * Interface for the upstream video-conferencing sessions endpoint
 */
export interface SessionsApiPort {
  /**
   * Fetch one page. Rejects with `UpstreamError` on a non-2xx answer.
   * Missing `pageInfo` fields default to 1 and missing `data` to `[]`.
   */
  fetchPage(apiKey: string, query: SessionsPageQuery): Promise<SessionsPage>;
}
