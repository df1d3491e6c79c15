import type {
  SessionsApiPort,
  SessionsPageQuery,
} from '../../src/application/ports/output/sessions-api.port';
import { UpstreamError } from '../../src/domain/errors/usage-report.errors';
import type {
  SessionRecord,
  SessionsPage,
} from '../../src/shared/interfaces/session-record.interface';

export interface RecordedSessionsRequest {
  apiKey: string;
  query: SessionsPageQuery;
}

/**
 * In-Memory Sessions API Adapter
 * Serves scripted pages by page number. A page can be scripted to fail with
 * an upstream status, or held until the test releases it.
 */
export class InMemorySessionsApiAdapter implements SessionsApiPort {
  readonly requests: RecordedSessionsRequest[] = [];
  private readonly pages = new Map<number, SessionsPage | Error>();
  private readonly gates = new Map<number, Promise<void>>();

  /**
   * Scripts `pages.length` pages, each reporting `lastPage = pages.length`.
   */
  static withPages(pages: SessionRecord[][]): InMemorySessionsApiAdapter {
    const adapter = new InMemorySessionsApiAdapter();
    pages.forEach((data, index) => {
      adapter.setPage(index + 1, data, pages.length);
    });
    return adapter;
  }

  setPage(page: number, data: SessionRecord[], lastPage: number, currentPage = page): this {
    this.pages.set(page, { data, pageInfo: { currentPage, lastPage } });
    return this;
  }

  failPage(page: number, statusCode: number, body: string): this {
    this.pages.set(page, new UpstreamError(statusCode, body));
    return this;
  }

  /**
   * Holds `page` until the returned function is called.
   */
  holdPage(page: number): () => void {
    let release: () => void = () => undefined;
    this.gates.set(
      page,
      new Promise<void>((resolve) => {
        release = resolve;
      }),
    );
    return () => release();
  }

  get requestedPages(): number[] {
    return this.requests.map((request) => request.query.page);
  }

  async fetchPage(apiKey: string, query: SessionsPageQuery): Promise<SessionsPage> {
    this.requests.push({ apiKey, query: { ...query } });

    const gate = this.gates.get(query.page);
    if (gate) {
      await gate;
    }

    const scripted = this.pages.get(query.page);
    if (scripted === undefined) {
      throw new UpstreamError(404, `{"error":"page ${query.page} not scripted"}`);
    }
    if (scripted instanceof Error) {
      throw scripted;
    }

    return { data: [...scripted.data], pageInfo: { ...scripted.pageInfo } };
  }
}
