/**
 * Anki-style Strategy
 *
 * SM-2 variant with a learning phase. New and lapsed items walk through a
 * list of short learning steps (minutes) before they graduate to day-based
 * intervals. While an item sits in a step, `intervalDays` keeps its day value
 * and only the due time is sub-day.
 *
 * Items failed more than `leechThreshold` times in a row are flagged as
 * leeches. The flag is reported, never acted on: suspending or rewriting a
 * leech is up to the caller.
 */

import { InvalidStateError } from '../errors';
import { lowerEase, type Difficulty, type MemoryStrength } from '../models';
import { addMinutes } from '../time';
import { completeTransition, type StrengthChanges } from './transition';
import {
  DEFAULT_EASY_BONUS,
  DEFAULT_MAX_INTERVAL_DAYS,
  parseDifficulty,
  type AlgorithmResult,
  type AlgorithmStrategy,
  type BaseAlgorithmConfig,
} from './types';

export interface AnkiConfig extends BaseAlgorithmConfig {
  /** Learning (and relearning) steps in minutes; must not be empty */
  learningStepsMinutes: number[];
  /** Interval given when an item passes its last learning step */
  graduatingIntervalDays: number;
  /** Interval given when EASY skips the remaining learning steps */
  easyIntervalDays: number;
  /** Ease lost on AGAIN */
  lapsePenalty: number;
  /** Interval multiplier on HARD in the review phase */
  hardMultiplier: number;
  /** Interval multiplier applied on a lapse */
  lapseIntervalMultiplier: number;
  /** Consecutive AGAINs above which an item is a leech */
  leechThreshold: number;
}

export const DEFAULT_ANKI_CONFIG: AnkiConfig = {
  maxIntervalDays: DEFAULT_MAX_INTERVAL_DAYS,
  easyBonus: DEFAULT_EASY_BONUS,
  learningStepsMinutes: [1, 10],
  graduatingIntervalDays: 1,
  easyIntervalDays: 4,
  lapsePenalty: 0.2,
  hardMultiplier: 1.2,
  lapseIntervalMultiplier: 0.5,
  leechThreshold: 8,
};

const HARD_EASE_PENALTY = 0.15;
const EASY_EASE_BONUS = 0.15;
/** SM-2's own EASY multiplier, applied before the easy bonus */
const SM2_EASY_FACTOR = 1.3;

type Step = { changes: StrengthChanges; dueInMinutes?: number };

export class AnkiStrategy implements AlgorithmStrategy {
  readonly name = 'ANKI';

  private readonly config: AnkiConfig;

  /**
   * @throws {InvalidStateError} If no learning steps are configured
   */
  constructor(config?: Partial<AnkiConfig>) {
    this.config = { ...DEFAULT_ANKI_CONFIG, ...config };
    if (this.config.learningStepsMinutes.length === 0) {
      throw new InvalidStateError('Anki strategy needs at least one learning step');
    }
  }

  apply(current: MemoryStrength, difficulty: Difficulty, reviewedAt: Date = new Date()): AlgorithmResult {
    const rating = parseDifficulty(difficulty);

    // Never-reviewed items enter at the first learning step
    const step = current.learningStep ?? (current.lastReview === null ? 0 : null);

    const next = step === null ? this.reviewPhase(current, rating) : this.learningPhase(current, rating, step);

    const consecutiveFailures = rating === 'AGAIN' ? current.consecutiveFailures + 1 : current.consecutiveFailures;
    const changes: StrengthChanges = {
      ...next.changes,
      isLeech: current.isLeech || consecutiveFailures > this.config.leechThreshold,
    };

    return completeTransition(current, rating, reviewedAt, changes, this.config, {
      dueAt: next.dueInMinutes === undefined ? undefined : addMinutes(reviewedAt, next.dueInMinutes),
    });
  }

  private stepMinutes(step: number): number {
    const steps = this.config.learningStepsMinutes;
    return steps[Math.min(step, steps.length - 1)];
  }

  private learningPhase(current: MemoryStrength, rating: Difficulty, step: number): Step {
    const { easeFactor, intervalDays, repetitions } = current;
    const lastStep = this.config.learningStepsMinutes.length - 1;

    switch (rating) {
      case 'AGAIN':
        return {
          changes: {
            easeFactor: lowerEase(easeFactor, this.config.lapsePenalty),
            intervalDays,
            repetitions: 0,
            learningStep: 0,
          },
          dueInMinutes: this.stepMinutes(0),
        };
      case 'HARD':
        return {
          changes: { easeFactor, intervalDays, repetitions, learningStep: step },
          dueInMinutes: this.stepMinutes(step),
        };
      case 'GOOD':
        if (step >= lastStep) {
          return {
            changes: {
              easeFactor,
              intervalDays: Math.max(this.config.graduatingIntervalDays, intervalDays),
              repetitions: repetitions + 1,
              learningStep: null,
            },
          };
        }
        return {
          changes: { easeFactor, intervalDays, repetitions, learningStep: step + 1 },
          dueInMinutes: this.stepMinutes(step + 1),
        };
      case 'EASY':
        return {
          changes: {
            easeFactor: easeFactor + EASY_EASE_BONUS,
            intervalDays: Math.max(this.config.easyIntervalDays, intervalDays),
            repetitions: repetitions + 1,
            learningStep: null,
          },
        };
    }
  }

  private reviewPhase(current: MemoryStrength, rating: Difficulty): Step {
    const { easeFactor, intervalDays, repetitions } = current;

    switch (rating) {
      case 'AGAIN':
        return {
          changes: {
            easeFactor: lowerEase(easeFactor, this.config.lapsePenalty),
            intervalDays: Math.max(1, Math.floor(intervalDays * this.config.lapseIntervalMultiplier)),
            repetitions: 0,
            lapses: current.lapses + 1,
            learningStep: 0,
          },
          dueInMinutes: this.stepMinutes(0),
        };
      case 'HARD':
        return {
          changes: {
            easeFactor: lowerEase(easeFactor, HARD_EASE_PENALTY),
            intervalDays: Math.floor(intervalDays * this.config.hardMultiplier),
            repetitions,
          },
        };
      case 'GOOD':
        return {
          changes: {
            easeFactor,
            intervalDays: Math.max(intervalDays + 1, Math.floor(intervalDays * easeFactor)),
            repetitions: repetitions + 1,
          },
        };
      case 'EASY':
        return {
          changes: {
            easeFactor: easeFactor + EASY_EASE_BONUS,
            intervalDays: Math.floor(intervalDays * easeFactor * SM2_EASY_FACTOR * this.config.easyBonus),
            repetitions: repetitions + 1,
          },
        };
    }
  }
}
