import { InvalidInputError } from '../errors/usage-report.errors';

/**
 * Number of participant column groups requested for a CSV export.
 * `'auto'` (and `0`) size the table to the largest session.
 */
export type ParticipantColumns = 'auto' | number;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Normalizes user input. Empty or `auto` means auto-detect, integers below
 * zero clamp to zero, anything non-numeric is rejected.
 */
export function parseParticipantColumns(input: unknown): ParticipantColumns {
  if (input === undefined || input === null) {
    return 'auto';
  }

  if (typeof input === 'number') {
    if (!Number.isSafeInteger(input)) {
      throw new InvalidInputError(`participant_columns must be an integer, got ${input}`);
    }
    return Math.max(input, 0);
  }

  if (typeof input === 'string') {
    const trimmed = input.trim();
    if (trimmed === '' || trimmed.toLowerCase() === 'auto') {
      return 'auto';
    }
    if (INTEGER_PATTERN.test(trimmed)) {
      return parseParticipantColumns(Number(trimmed));
    }
  }

  throw new InvalidInputError(
    `participant_columns must be "auto" or an integer, got ${JSON.stringify(input)}`,
  );
}
