/**
 * Leitner Strategy
 *
 * Items live in numbered boxes with fixed intervals. A pass moves the item up
 * one box, a fail sends it back to the first. The ease factor plays no part
 * and is held at its default.
 */

import { InvalidStateError } from '../errors';
import { DEFAULT_EASE_FACTOR, isSuccessfulReview, type Difficulty, type MemoryStrength } from '../models';
import { completeTransition } from './transition';
import {
  DEFAULT_EASY_BONUS,
  DEFAULT_MAX_INTERVAL_DAYS,
  parseDifficulty,
  type AlgorithmResult,
  type AlgorithmStrategy,
  type BaseAlgorithmConfig,
} from './types';

export interface LeitnerConfig extends BaseAlgorithmConfig {
  /** Interval of each box in days; box 1 is the first entry */
  boxIntervalsDays: number[];
}

export const DEFAULT_LEITNER_CONFIG: LeitnerConfig = {
  maxIntervalDays: DEFAULT_MAX_INTERVAL_DAYS,
  easyBonus: DEFAULT_EASY_BONUS,
  boxIntervalsDays: [1, 2, 4, 8, 16],
};

export class LeitnerStrategy implements AlgorithmStrategy {
  readonly name = 'LEITNER';

  private readonly config: LeitnerConfig;

  /**
   * @throws {InvalidStateError} If no boxes are configured
   */
  constructor(config?: Partial<LeitnerConfig>) {
    this.config = { ...DEFAULT_LEITNER_CONFIG, ...config };
    if (this.config.boxIntervalsDays.length === 0) {
      throw new InvalidStateError('Leitner strategy needs at least one box');
    }
  }

  get boxCount(): number {
    return this.config.boxIntervalsDays.length;
  }

  apply(current: MemoryStrength, difficulty: Difficulty, reviewedAt: Date = new Date()): AlgorithmResult {
    const rating = parseDifficulty(difficulty);

    // Strength may come from another algorithm or an older box layout
    const box = Math.min(Math.max(current.leitnerBox, 1), this.boxCount);
    const passed = isSuccessfulReview(rating);
    const nextBox = passed ? Math.min(box + 1, this.boxCount) : 1;

    return completeTransition(
      current,
      rating,
      reviewedAt,
      {
        easeFactor: DEFAULT_EASE_FACTOR,
        intervalDays: this.config.boxIntervalsDays[nextBox - 1],
        repetitions: passed ? current.repetitions + 1 : 0,
        leitnerBox: nextBox,
      },
      this.config
    );
  }
}
