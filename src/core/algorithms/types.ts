/**
 * Algorithm Strategy Contract
 *
 * Every scheduling algorithm is a strategy object with a single pure `apply`
 * method. Strategies hold only their immutable configuration, so one instance
 * can serve any number of concurrent reviews.
 */

import { z } from 'zod';
import { InvalidDifficultyError } from '../errors';
import { DIFFICULTIES, type Difficulty, type MemoryStrength } from '../models';

/**
 * Output of a single algorithm application.
 */
export interface AlgorithmResult {
  /** The new memorisation state; lastReview is the review time */
  strength: MemoryStrength;

  /** When the item should next be presented */
  nextDue: Date;

  /**
   * Whether the item is (still) a leech after this review. Surfaced here so
   * callers can act on it without inspecting the strength.
   */
  isLeech: boolean;
}

export interface AlgorithmStrategy {
  /** Short name used in logs */
  readonly name: string;

  /**
   * Computes the state that follows `current` after a review rated
   * `difficulty`.
   *
   * @param reviewedAt - Time of the review (defaults to now)
   * @throws {InvalidDifficultyError} If difficulty is missing or unknown
   */
  apply(current: MemoryStrength, difficulty: Difficulty, reviewedAt?: Date): AlgorithmResult;
}

/** Options every built-in strategy understands */
export interface BaseAlgorithmConfig {
  /** Ceiling for any computed interval, in days */
  maxIntervalDays: number;
  /** Extra multiplier applied on EASY (stability growth, Anki and Custom intervals) */
  easyBonus: number;
}

export const DEFAULT_MAX_INTERVAL_DAYS = 3650;
export const DEFAULT_EASY_BONUS = 1.3;

const difficultySchema = z.enum(DIFFICULTIES);

/**
 * Validates a difficulty coming from outside the type system (CLI input,
 * JSON payloads, untyped callers).
 *
 * @throws {InvalidDifficultyError} If the value is not AGAIN, HARD, GOOD or EASY
 */
export function parseDifficulty(value: unknown): Difficulty {
  const result = difficultySchema.safeParse(value);
  if (!result.success) {
    throw new InvalidDifficultyError(value);
  }
  return result.data;
}
