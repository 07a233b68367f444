/**
 * Forgetting Curve
 *
 * Exponential decay model shared by all strategies:
 *
 *   R(t) = exp(-t / (stability * intervalDays))
 *
 * where t is the number of days since the last review. Evaluated at the due
 * time (t = intervalDays) this reduces to exp(-1 / stability), which is what
 * gets stored as `retentionRate`.
 */

import type { Difficulty } from '../models';

/** Stability never decays below this value */
export const MIN_STABILITY = 0.1;

/** Growth applied to stability on HARD */
export const HARD_STABILITY_FACTOR = 1.2;

/** Decay applied to stability on AGAIN */
export const AGAIN_STABILITY_FACTOR = 0.5;

/**
 * Stability after a review.
 *
 * GOOD multiplies by the ease factor, EASY by ease times the easy bonus,
 * HARD by 1.2 and AGAIN halves it.
 */
export function nextStability(
  stability: number,
  difficulty: Difficulty,
  easeFactor: number,
  easyBonus: number
): number {
  let multiplier: number;
  switch (difficulty) {
    case 'AGAIN':
      multiplier = AGAIN_STABILITY_FACTOR;
      break;
    case 'HARD':
      multiplier = HARD_STABILITY_FACTOR;
      break;
    case 'GOOD':
      multiplier = easeFactor;
      break;
    case 'EASY':
      multiplier = easeFactor * easyBonus;
      break;
  }
  const next = stability * multiplier;
  // Overflowing growth would poison every later calculation
  if (!Number.isFinite(next)) {
    return Number.MAX_VALUE;
  }
  return Math.max(MIN_STABILITY, next);
}

/**
 * Probability of recall `elapsedDays` after the last review.
 */
export function retrievability(stability: number, intervalDays: number, elapsedDays: number): number {
  if (elapsedDays <= 0) {
    return 1;
  }
  return Math.exp(-elapsedDays / (stability * intervalDays));
}

/**
 * Estimated recall probability at the due time.
 */
export function retentionAtDue(stability: number): number {
  return Math.exp(-1 / stability);
}
