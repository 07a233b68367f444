/**
 * SM-2 Strategy
 *
 * The classic SuperMemo 2 interval rules:
 *
 * | Rating | Interval                                   | Ease         | Repetitions |
 * |--------|--------------------------------------------|--------------|-------------|
 * | AGAIN  | 1                                          | -0.2         | reset to 0  |
 * | HARD   | floor(interval * 0.6), at least 1          | -0.15        | unchanged   |
 * | GOOD   | 1, then 6, then floor(interval * ease)     | unchanged    | +1          |
 * | EASY   | floor(interval * ease * 1.3), at least 1   | +0.15        | +1          |
 *
 * Ease never drops below 1.3 and has no upper bound.
 */

import { lowerEase, type Difficulty, type MemoryStrength } from '../models';
import { completeTransition, type StrengthChanges } from './transition';
import {
  DEFAULT_EASY_BONUS,
  DEFAULT_MAX_INTERVAL_DAYS,
  parseDifficulty,
  type AlgorithmResult,
  type AlgorithmStrategy,
  type BaseAlgorithmConfig,
} from './types';

export type SM2Config = BaseAlgorithmConfig;

const DEFAULT_CONFIG: SM2Config = {
  maxIntervalDays: DEFAULT_MAX_INTERVAL_DAYS,
  easyBonus: DEFAULT_EASY_BONUS,
};

/** Interval multiplier on HARD */
const HARD_INTERVAL_FACTOR = 0.6;
/** Interval multiplier on EASY, on top of the ease factor */
const EASY_INTERVAL_FACTOR = 1.3;
const AGAIN_EASE_PENALTY = 0.2;
const HARD_EASE_PENALTY = 0.15;
const EASY_EASE_BONUS = 0.15;

/**
 * @example
 * ```typescript
 * const sm2 = new SM2Strategy();
 * const { strength, nextDue } = sm2.apply(createMemoryStrength(), 'GOOD', new Date());
 * // strength.intervalDays === 1, strength.repetitions === 1
 * ```
 */
export class SM2Strategy implements AlgorithmStrategy {
  readonly name = 'SM2';

  private readonly config: SM2Config;

  constructor(config?: Partial<SM2Config>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  apply(current: MemoryStrength, difficulty: Difficulty, reviewedAt: Date = new Date()): AlgorithmResult {
    const rating = parseDifficulty(difficulty);
    return completeTransition(current, rating, reviewedAt, this.nextFields(current, rating), this.config);
  }

  private nextFields(current: MemoryStrength, rating: Difficulty): StrengthChanges {
    const { easeFactor, intervalDays, repetitions } = current;

    switch (rating) {
      case 'AGAIN':
        return {
          intervalDays: 1,
          easeFactor: lowerEase(easeFactor, AGAIN_EASE_PENALTY),
          repetitions: 0,
        };
      case 'HARD':
        return {
          intervalDays: Math.max(1, Math.floor(intervalDays * HARD_INTERVAL_FACTOR)),
          easeFactor: lowerEase(easeFactor, HARD_EASE_PENALTY),
          repetitions,
        };
      case 'GOOD': {
        let nextInterval: number;
        if (repetitions === 0) {
          nextInterval = 1;
        } else if (repetitions === 1) {
          nextInterval = 6;
        } else {
          nextInterval = Math.floor(intervalDays * easeFactor);
        }
        return { intervalDays: nextInterval, easeFactor, repetitions: repetitions + 1 };
      }
      case 'EASY':
        return {
          intervalDays: Math.max(1, Math.floor(intervalDays * easeFactor * EASY_INTERVAL_FACTOR)),
          easeFactor: easeFactor + EASY_EASE_BONUS,
          repetitions: repetitions + 1,
        };
    }
  }
}
