import { InvalidInputError } from '../../domain/errors/usage-report.errors';

export function requireApiKey(apiKey: string | undefined): string {
  const trimmed = apiKey?.trim();
  if (!trimmed) {
    throw new InvalidInputError('api_key is required');
  }
  return trimmed;
}
