/**
 * Input validation for scheduler requests.
 */

import { z } from 'zod';
import { InvalidStateError } from '../errors';
import { ALGORITHMS, type Algorithm, type MemoryStrength } from '../models';
import type { ReviewMetadata } from './types';

const algorithmSchema = z.enum(ALGORITHMS);

const metadataSchema = z
  .object({
    sessionId: z.string().min(1).nullish(),
    timeTakenSeconds: z.number().finite().nonnegative().nullish(),
    confidence: z.number().finite().min(0).max(1).nullish(),
  })
  .strict();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * @throws {InvalidStateError} If the value is not a known algorithm
 */
export function parseAlgorithm(value: unknown): Algorithm {
  const result = algorithmSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidStateError(
      `Invalid algorithm: ${JSON.stringify(value) ?? 'undefined'}. Expected one of ${ALGORITHMS.join(', ')}`,
      { field: 'algorithm', received: value }
    );
  }
  return result.data;
}

export interface ParsedMetadata {
  sessionId: string | null;
  timeTakenSeconds: number | null;
  confidence: number | null;
}

/**
 * @throws {InvalidStateError} On a negative time, a confidence outside [0, 1] or unknown fields
 */
export function parseMetadata(metadata: ReviewMetadata | undefined): ParsedMetadata {
  const result = metadataSchema.safeParse(metadata ?? {});
  if (!result.success) {
    throw new InvalidStateError(`Invalid review metadata: ${describeIssues(result.error)}`, {
      issues: result.error.issues,
    });
  }
  return {
    sessionId: result.data.sessionId ?? null,
    timeTakenSeconds: result.data.timeTakenSeconds ?? null,
    confidence: result.data.confidence ?? null,
  };
}

/**
 * @throws {InvalidStateError} If the id is empty or not a string
 */
export function requireId(field: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidStateError(`${field} must be a non-empty string`, { field, received: value });
  }
  return value;
}

/**
 * @throws {InvalidStateError} If the value is not a valid Date
 */
export function requireDate(field: string, value: unknown): Date {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new InvalidStateError(`${field} must be a valid date`, { field, received: String(value) });
  }
  return value;
}

/**
 * @throws {InvalidStateError} If the strength's interval exceeds the ceiling
 */
export function requireIntervalWithin(strength: MemoryStrength, maxIntervalDays: number): MemoryStrength {
  if (strength.intervalDays > maxIntervalDays) {
    throw new InvalidStateError(
      `intervalDays must not exceed ${maxIntervalDays}, received ${strength.intervalDays}`,
      { field: 'intervalDays', value: strength.intervalDays, maxIntervalDays }
    );
  }
  return strength;
}
