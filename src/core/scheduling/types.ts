/**
 * Scheduler request, result and configuration types.
 */

import type { AlgorithmRegistry } from '../algorithms';
import type { ReviewEventSink } from '../events';
import type { Logger } from '../logging';
import type { Algorithm, Difficulty, MemoryStrength, ReviewSchedule } from '../models';
import type { ContentStore, HistoryStore, ScheduleStore, SessionUpdate } from '../stores';
import type { RetryPolicy } from './retry';

/**
 * Optional facts about a review, stored in its history record.
 */
export interface ReviewMetadata {
  /** Session the review belongs to */
  sessionId?: string | null;
  /** Seconds spent on the review; must not be negative */
  timeTakenSeconds?: number | null;
  /** Self-reported confidence in [0, 1] */
  confidence?: number | null;
}

export interface ScheduleReviewRequest {
  itemId: string;
  userId: string;
  difficulty: Difficulty;
  /**
   * Algorithm to apply. Defaults to the schedule's current algorithm, then
   * to the configured default.
   */
  algorithm?: Algorithm;
  /**
   * Algorithm for an item that has no active schedule yet, when no explicit
   * algorithm is given. Falls back to the configured default.
   */
  defaultAlgorithm?: Algorithm;
  metadata?: ReviewMetadata;
  /** Review time; defaults to the scheduler clock */
  reviewedAt?: Date;
  /**
   * Folds the review into the session named by `metadata.sessionId`, in the
   * same commit as the schedule and history record
   */
  updateSession?: SessionUpdate;
}

export interface InitialScheduleRequest {
  itemId: string;
  userId: string;
  algorithm: Algorithm;
  /** Starting strength; defaults to the model defaults. Its interval may not exceed maxIntervalDays */
  strength?: MemoryStrength;
  /** First due date */
  scheduledDate: Date;
}

export interface InitialScheduleResult {
  /** False when an active schedule already existed and was left alone */
  created: boolean;
  schedule: ReviewSchedule;
}

export interface ReviewSchedulerConfig {
  /** Algorithm for items that have no schedule and no explicit choice */
  defaultAlgorithm: Algorithm;
  /** Backoff for transient store failures */
  retry: RetryPolicy;
  /** Longest interval an initial strength may carry */
  maxIntervalDays: number;
}

export interface ReviewSchedulerDependencies {
  schedules: ScheduleStore;
  history: HistoryStore;
  content: ContentStore;
  /** Strategy table; built with defaults when omitted */
  algorithms?: AlgorithmRegistry;
  /** Notification sink; events are dropped when omitted */
  events?: ReviewEventSink;
  logger?: Logger;
  /** Source of "now"; injectable for tests */
  clock?: () => Date;
}
