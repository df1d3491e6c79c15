import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Pool } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';

export type QueryValue = string | number | boolean | undefined;

export interface HttpGetOptions {
  headers?: Record<string, string>;
  /** Appended to the URL's own query string; `undefined` values are skipped. */
  query?: Record<string, QueryValue>;
  timeout?: number;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  /** Parsed JSON when the payload is JSON, otherwise the raw text. */
  body: unknown;
  text: string;
}

/**
 * GET client on one undici pool per origin. Every status comes back to the
 * caller; only transport failures reject, and nothing is retried.
 */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly pools: Map<string, Pool> = new Map();
  private readonly defaultTimeout = 30000;

  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(HttpClientService.name);
  }

  private getPool(origin: string): Pool {
    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connections: 10,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }

  async get(url: string, options: HttpGetOptions = {}): Promise<HttpResponse> {
    const target = new URL(url);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        target.searchParams.set(key, String(value));
      }
    }
    const timeout = options.timeout ?? this.defaultTimeout;

    try {
      const response = await this.getPool(target.origin).request({
        path: target.pathname + target.search,
        method: 'GET',
        headers: options.headers,
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });

      const text = await response.body.text();

      return {
        statusCode: response.statusCode,
        headers: response.headers,
        body: this.parseBody(text),
        text,
      };
    } catch (error) {
      this.logger.warn(
        {
          url: target.origin + target.pathname,
          error: error instanceof Error ? error.message : String(error),
        },
        'HTTP request failed',
      );
      throw error;
    }
  }

  private parseBody(text: string): unknown {
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }

  async onModuleDestroy(): Promise<void> {
    await Promise.all(Array.from(this.pools.values()).map((pool) => pool.close()));
    this.pools.clear();
  }
}
