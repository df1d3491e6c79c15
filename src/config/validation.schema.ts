import { z } from 'zod';

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default('*'),

  // Sessions API
  SESSIONS_API_URL: z.string().url().default('https://api.videosdk.live/v2/sessions/'),
  SESSIONS_API_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(20),
  SESSIONS_API_PAGE_DELAY_MS: z.coerce.number().int().min(0).default(200),
  SESSIONS_API_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),

  // Reports
  REPORT_TEMP_DIR: z.string().default('/tmp/usage-reports'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
