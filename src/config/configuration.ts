/**
 * Application configuration.
 *
 * Environment variables are validated by the zod schema in `validation.schema.ts`
 * and folded into a typed {@link AppConfig}, read through
 * `ConfigService<AppConfig>` with `{ infer: true }`:
 *
 * ```typescript
 * const { pageSize } = this.configService.getOrThrow('sessionsApi', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, type EnvConfig } from './validation.schema';

export interface AppConfig {
  nodeEnv: string;
  port: number;
  host: string;
  logLevel: string;
  corsOrigin: string;
  /**
   * Upstream sessions endpoint.
   *
   * `pageSize` is sent as `perPage`; `pageDelayMs` is the pause between two
   * consecutive page requests and is the only rate limiting applied upstream.
   * Requests are never retried.
   */
  sessionsApi: {
    url: string;
    pageSize: number;
    pageDelayMs: number;
    timeoutMs: number;
  };
  reports: {
    tempDir: string;
  };
}

export default (): AppConfig => {
  const env: EnvConfig = validateEnv(process.env);

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    corsOrigin: env.CORS_ORIGIN,
    sessionsApi: {
      url: env.SESSIONS_API_URL,
      pageSize: env.SESSIONS_API_PAGE_SIZE,
      pageDelayMs: env.SESSIONS_API_PAGE_DELAY_MS,
      timeoutMs: env.SESSIONS_API_TIMEOUT_MS,
    },
    reports: {
      tempDir: env.REPORT_TEMP_DIR,
    },
  };
};
