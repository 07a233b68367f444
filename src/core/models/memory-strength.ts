/**
 * MemoryStrength Domain Type
 *
 * A MemoryStrength is the memorisation state of one item for one user. It is
 * owned by the scheduler and only changes through an algorithm strategy; the
 * strategies never mutate it in place but return a fresh value.
 *
 * The core SM2 fields (ease, interval, repetitions) sit next to the
 * forgetting-curve estimate (stability, retention) and a little bookkeeping
 * that the Anki-style and Leitner strategies need between reviews.
 */

import { InvalidStateError } from '../errors';

/** Lowest ease factor any algorithm may produce */
export const MIN_EASE_FACTOR = 1.3;

/** Ease factor given to new items and held by the Leitner strategy */
export const DEFAULT_EASE_FACTOR = 2.5;

/** Shortest interval, in days */
export const MIN_INTERVAL_DAYS = 1;

export interface MemoryStrength {
  /**
   * Multiplier controlling how quickly intervals grow after a successful
   * recall. Never below 1.3, no upper bound.
   */
  easeFactor: number;

  /** Whole days until the next review (at least 1) */
  intervalDays: number;

  /** Consecutive successful reviews since the last lapse */
  repetitions: number;

  /** Estimated probability of recall at the due time (0-1) */
  retentionRate: number;

  /** Forgetting-curve stability, strictly positive */
  stability: number;

  /** When the item was last reviewed, or null if never */
  lastReview: Date | null;

  /** AGAIN reviews after the item was first learned */
  lapses: number;

  /** AGAIN reviews since the last GOOD or EASY */
  consecutiveFailures: number;

  /**
   * Index into the Anki learning (or relearning) steps.
   * Null once the item has graduated to day-based intervals.
   */
  learningStep: number | null;

  /** Current Leitner box, 1-based */
  leitnerBox: number;

  /** Set when the item keeps failing; cleared by GOOD or EASY */
  isLeech: boolean;
}

export type MemoryStrengthInput = Partial<MemoryStrength>;

/**
 * Default strength for an item entering scheduling for the first time.
 */
export const DEFAULT_MEMORY_STRENGTH: Readonly<MemoryStrength> = Object.freeze({
  easeFactor: DEFAULT_EASE_FACTOR,
  intervalDays: MIN_INTERVAL_DAYS,
  repetitions: 0,
  retentionRate: 0.9,
  stability: 1.0,
  lastReview: null,
  lapses: 0,
  consecutiveFailures: 0,
  learningStep: null,
  leitnerBox: 1,
  isLeech: false,
});

function requireFinite(field: string, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidStateError(`${field} must be a finite number, received ${String(value)}`, { field, value });
  }
  if (value < 0) {
    throw new InvalidStateError(`${field} must not be negative, received ${value}`, { field, value });
  }
}

function requireCount(field: string, value: number): void {
  requireFinite(field, value);
  if (!Number.isInteger(value)) {
    throw new InvalidStateError(`${field} must be a whole number, received ${value}`, { field, value });
  }
}

/**
 * Builds a validated MemoryStrength from defaults and the given overrides.
 *
 * - NaN, infinite or negative numbers fail with InvalidStateError
 * - easeFactor below 1.3 is raised to 1.3
 * - intervalDays is floored and raised to at least 1
 * - retentionRate must lie in [0, 1]; stability must be greater than 0
 *
 * @throws {InvalidStateError} If any field is malformed
 */
export function createMemoryStrength(input: MemoryStrengthInput = {}): MemoryStrength {
  const merged: MemoryStrength = { ...DEFAULT_MEMORY_STRENGTH, ...input };

  requireFinite('easeFactor', merged.easeFactor);
  requireFinite('intervalDays', merged.intervalDays);
  requireCount('repetitions', merged.repetitions);
  requireFinite('retentionRate', merged.retentionRate);
  requireFinite('stability', merged.stability);
  requireCount('lapses', merged.lapses);
  requireCount('consecutiveFailures', merged.consecutiveFailures);
  requireCount('leitnerBox', merged.leitnerBox);

  if (merged.retentionRate > 1) {
    throw new InvalidStateError(`retentionRate must be within [0, 1], received ${merged.retentionRate}`, {
      field: 'retentionRate',
      value: merged.retentionRate,
    });
  }
  if (merged.stability === 0) {
    throw new InvalidStateError('stability must be greater than 0', { field: 'stability', value: 0 });
  }
  if (merged.leitnerBox < 1) {
    throw new InvalidStateError('leitnerBox must be at least 1', { field: 'leitnerBox', value: merged.leitnerBox });
  }
  if (merged.learningStep !== null) {
    requireCount('learningStep', merged.learningStep);
  }
  if (merged.lastReview !== null && Number.isNaN(merged.lastReview.getTime())) {
    throw new InvalidStateError('lastReview must be a valid date', { field: 'lastReview' });
  }

  return {
    ...merged,
    easeFactor: Math.max(MIN_EASE_FACTOR, merged.easeFactor),
    intervalDays: Math.max(MIN_INTERVAL_DAYS, Math.floor(merged.intervalDays)),
  };
}

/**
 * Lowers an ease factor, never going below 1.3.
 */
export function lowerEase(easeFactor: number, delta: number): number {
  return Math.max(MIN_EASE_FACTOR, easeFactor - delta);
}

/**
 * Floors an interval and keeps it within [1, maxIntervalDays].
 * Non-finite products (overflowing multiplications) land on the ceiling.
 */
export function clampInterval(days: number, maxIntervalDays: number): number {
  if (!Number.isFinite(days)) {
    return maxIntervalDays;
  }
  return Math.min(maxIntervalDays, Math.max(MIN_INTERVAL_DAYS, Math.floor(days)));
}
