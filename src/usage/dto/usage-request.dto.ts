import { z } from 'zod';
import { InvalidInputError } from '../../domain/errors/usage-report.errors';

const year = z.coerce.number({ invalid_type_error: 'year must be a number' }).int();
const month = z.coerce.number({ invalid_type_error: 'month must be a number' }).int();
const apiKey = z.string({ required_error: 'is required' }).trim().min(1, 'is required');
const participantColumns = z.union([z.string(), z.number()]).optional();

/** `GET /fetch` */
export const fetchSessionsQuerySchema = z.object({
  api_key: apiKey,
  year,
  month,
});

/** `GET /generate-csv` and the SSE routes */
export const usageReportQuerySchema = fetchSessionsQuerySchema.extend({
  participant_columns: participantColumns,
});

/** `POST /jobs/fetch` */
export const startFetchJobBodySchema = z.object({
  apiKey,
  year,
  month,
});

/** `POST /jobs/export` */
export const startExportJobBodySchema = startFetchJobBodySchema.extend({
  participantColumns,
});

/**
 * Validates request input, throwing `InvalidInputError` with one
 * `path: message` line per issue.
 */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input ?? {});

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new InvalidInputError('Request validation failed', issues);
  }

  return result.data;
}
