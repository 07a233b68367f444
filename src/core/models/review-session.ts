/**
 * ReviewSession Domain Types
 *
 * A ReviewSession groups a bounded run of reviews by one user. It is created
 * ACTIVE, collects running aggregates while reviews are recorded against it,
 * and becomes immutable once ENDED with a frozen summary.
 */

import type { Algorithm, Difficulty } from './review';

/**
 * Lifecycle status. NOT_STARTED has no stored representation: a session that
 * has not been started does not exist.
 */
export type SessionStatus = 'active' | 'ended';

export type DifficultyCounts = Record<Difficulty, number>;

/**
 * Running counters maintained while the session is active.
 */
export interface SessionAggregates {
  reviewCount: number;
  /** GOOD and EASY reviews */
  successCount: number;
  difficultyCounts: DifficultyCounts;
  confidenceSum: number;
  confidenceCount: number;
  timeTakenSecondsSum: number;
  timeTakenCount: number;
  /** Consecutive successful reviews at the end of the session so far */
  currentStreak: number;
  bestStreak: number;
}

/**
 * Final figures computed once, when the session ends.
 */
export interface ReviewSessionSummary {
  sessionId: string;
  userId: string;
  totalReviewed: number;
  uniqueItems: number;
  successCount: number;
  /** successCount / totalReviewed, 0 for an empty session */
  accuracyRate: number;
  /** Null when no review reported a confidence */
  averageConfidence: number | null;
  /** Null when no review reported a time */
  averageTimeSeconds: number | null;
  difficultyDistribution: DifficultyCounts;
  bestStreak: number;
  startedAt: Date;
  endedAt: Date;
  durationSeconds: number;
}

export interface ReviewSession {
  /** Unique identifier ('rsess_<uuid>') */
  id: string;
  userId: string;

  /** Algorithm used for items that have no schedule yet */
  algorithm: Algorithm;

  status: SessionStatus;
  startedAt: Date;
  endedAt: Date | null;

  /** Item ids in the order they were reviewed (repeats allowed) */
  itemsReviewed: string[];

  aggregates: SessionAggregates;

  /** Present once the session has ended */
  summary: ReviewSessionSummary | null;

  /** Bumped on every write; guards against lost updates across processes */
  version: number;
}
