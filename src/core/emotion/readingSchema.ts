import { z } from 'zod';
import type { Reading } from './types.js';
import { InvalidReadingError, InvalidValenceError } from '../../utils/errors.js';

// Document stores hand back valence as either a number or a numeric string
const valenceSchema = z
  .union([z.number(), z.string().trim().min(1).transform((value) => Number(value))])
  .pipe(z.number().finite());

// Numbers stay numbers; ISO strings become Dates
const timeSchema = z.union([
  z.number().finite(),
  z.date(),
  z.string().trim().min(1).pipe(z.coerce.date()),
]);

export const readingSchema = z.object({
  time: timeSchema,
  valence: valenceSchema,
});

export type RawReading = z.input<typeof readingSchema>;

/**
 * Validate untrusted readings. Valence problems raise InvalidValenceError;
 * anything else malformed raises InvalidReadingError.
 */
export function parseReadings(raw: unknown): Reading[] {
  const result = z.array(readingSchema).safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  const valenceIssue = result.error.issues.find((issue) => issue.path.includes('valence'));
  if (valenceIssue) {
    const [index] = valenceIssue.path;
    const offending = Array.isArray(raw) && typeof index === 'number' ? valenceOf(raw[index]) : undefined;
    throw new InvalidValenceError(offending, `Invalid valence in readings:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }
  throw new InvalidReadingError(`Invalid readings:\n${issues.join('\n')}`, { cause: result.error });
}

function valenceOf(entry: unknown): unknown {
  if (typeof entry === 'object' && entry !== null && 'valence' in entry) {
    return entry.valence;
  }
  return undefined;
}
