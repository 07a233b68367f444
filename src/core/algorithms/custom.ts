/**
 * Default CUSTOM Strategy
 *
 * The CUSTOM slot exists so an application can plug in its own
 * AlgorithmStrategy (see `createAlgorithmRegistry`). When nothing is plugged
 * in, this simple doubling scheme is used: GOOD doubles the interval, EASY
 * doubles it and applies the easy bonus, HARD keeps it and AGAIN starts over.
 */

import type { Difficulty, MemoryStrength } from '../models';
import { completeTransition, type StrengthChanges } from './transition';
import {
  DEFAULT_EASY_BONUS,
  DEFAULT_MAX_INTERVAL_DAYS,
  parseDifficulty,
  type AlgorithmResult,
  type AlgorithmStrategy,
  type BaseAlgorithmConfig,
} from './types';

export type DoublingConfig = BaseAlgorithmConfig;

export class DoublingStrategy implements AlgorithmStrategy {
  readonly name = 'CUSTOM';

  private readonly config: DoublingConfig;

  constructor(config?: Partial<DoublingConfig>) {
    this.config = { maxIntervalDays: DEFAULT_MAX_INTERVAL_DAYS, easyBonus: DEFAULT_EASY_BONUS, ...config };
  }

  apply(current: MemoryStrength, difficulty: Difficulty, reviewedAt: Date = new Date()): AlgorithmResult {
    const rating = parseDifficulty(difficulty);
    const { easeFactor, intervalDays, repetitions } = current;

    let changes: StrengthChanges;
    switch (rating) {
      case 'AGAIN':
        changes = { easeFactor, intervalDays: 1, repetitions: 0 };
        break;
      case 'HARD':
        changes = { easeFactor, intervalDays, repetitions };
        break;
      case 'GOOD':
        changes = { easeFactor, intervalDays: intervalDays * 2, repetitions: repetitions + 1 };
        break;
      case 'EASY':
        changes = {
          easeFactor,
          intervalDays: intervalDays * 2 * this.config.easyBonus,
          repetitions: repetitions + 1,
        };
        break;
    }

    return completeTransition(current, rating, reviewedAt, changes, this.config);
  }
}
