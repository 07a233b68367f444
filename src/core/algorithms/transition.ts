/**
 * Shared tail of every strategy: given the algorithm-specific fields of the
 * next state, fill in the forgetting-curve estimate, the failure counters and
 * the due date, and clamp the interval.
 */

import { addDays } from '../time';
import { clampInterval, isSuccessfulReview, type Difficulty, type MemoryStrength } from '../models';
import { nextStability, retentionAtDue } from './forgetting-curve';
import type { AlgorithmResult, BaseAlgorithmConfig } from './types';

/**
 * Fields a strategy decides on. Anything omitted carries over from the
 * current state.
 */
export type StrengthChanges = Pick<MemoryStrength, 'easeFactor' | 'intervalDays' | 'repetitions'> &
  Partial<Pick<MemoryStrength, 'lapses' | 'learningStep' | 'leitnerBox' | 'isLeech'>>;

export interface TransitionOptions {
  /** Due time overriding `reviewedAt + intervalDays` (Anki learning steps) */
  dueAt?: Date;
}

export function completeTransition(
  current: MemoryStrength,
  difficulty: Difficulty,
  reviewedAt: Date,
  changes: StrengthChanges,
  config: BaseAlgorithmConfig,
  options: TransitionOptions = {}
): AlgorithmResult {
  const success = isSuccessfulReview(difficulty);
  const intervalDays = clampInterval(changes.intervalDays, config.maxIntervalDays);
  const stability = nextStability(current.stability, difficulty, current.easeFactor, config.easyBonus);

  // GOOD/EASY always clears the leech flag
  const isLeech = success ? false : (changes.isLeech ?? current.isLeech);

  const strength: MemoryStrength = {
    ...current,
    ...changes,
    intervalDays,
    stability,
    retentionRate: retentionAtDue(stability),
    lastReview: reviewedAt,
    consecutiveFailures: difficulty === 'AGAIN' ? current.consecutiveFailures + 1 : success ? 0 : current.consecutiveFailures,
    isLeech,
  };

  return {
    strength,
    nextDue: options.dueAt ?? addDays(reviewedAt, intervalDays),
    isLeech,
  };
}
