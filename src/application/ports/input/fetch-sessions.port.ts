import type { SessionRecord } from '../../../shared/interfaces/session-record.interface';

export interface FetchSessionsQuery {
  apiKey: string;
  year: number;
  month: number;
}

export interface FetchSessionsResult {
  count: number;
  sessions: SessionRecord[];
}

/**
 * Fetch Sessions Port (Driving Port / Use Case Interface)
 * Synchronous fetch: the caller waits for every page
 */
export interface FetchSessionsPort {
  execute(query: FetchSessionsQuery): Promise<FetchSessionsResult>;
}
