/**
 * Running session aggregates and the summary frozen at session end.
 */

import {
  DIFFICULTIES,
  isSuccessfulReview,
  type Difficulty,
  type DifficultyCounts,
  type ReviewSession,
  type ReviewSessionSummary,
  type SessionAggregates,
} from '../models';

export function emptyDifficultyCounts(): DifficultyCounts {
  return { AGAIN: 0, HARD: 0, GOOD: 0, EASY: 0 };
}

export function emptyAggregates(): SessionAggregates {
  return {
    reviewCount: 0,
    successCount: 0,
    difficultyCounts: emptyDifficultyCounts(),
    confidenceSum: 0,
    confidenceCount: 0,
    timeTakenSecondsSum: 0,
    timeTakenCount: 0,
    currentStreak: 0,
    bestStreak: 0,
  };
}

export interface RecordedReview {
  difficulty: Difficulty;
  confidence: number | null;
  timeTakenSeconds: number | null;
}

/**
 * Aggregates after one more review. Does not modify its input.
 */
export function addReview(aggregates: SessionAggregates, review: RecordedReview): SessionAggregates {
  const success = isSuccessfulReview(review.difficulty);
  const currentStreak = success ? aggregates.currentStreak + 1 : 0;

  const difficultyCounts = { ...aggregates.difficultyCounts };
  difficultyCounts[review.difficulty] += 1;

  return {
    reviewCount: aggregates.reviewCount + 1,
    successCount: aggregates.successCount + (success ? 1 : 0),
    difficultyCounts,
    confidenceSum: aggregates.confidenceSum + (review.confidence ?? 0),
    confidenceCount: aggregates.confidenceCount + (review.confidence === null ? 0 : 1),
    timeTakenSecondsSum: aggregates.timeTakenSecondsSum + (review.timeTakenSeconds ?? 0),
    timeTakenCount: aggregates.timeTakenCount + (review.timeTakenSeconds === null ? 0 : 1),
    currentStreak,
    bestStreak: Math.max(aggregates.bestStreak, currentStreak),
  };
}

/**
 * Final figures for a session ending at `endedAt`.
 */
export function summarize(session: ReviewSession, endedAt: Date): ReviewSessionSummary {
  const { aggregates } = session;
  const difficultyDistribution = emptyDifficultyCounts();
  for (const difficulty of DIFFICULTIES) {
    difficultyDistribution[difficulty] = aggregates.difficultyCounts[difficulty];
  }

  return {
    sessionId: session.id,
    userId: session.userId,
    totalReviewed: aggregates.reviewCount,
    uniqueItems: new Set(session.itemsReviewed).size,
    successCount: aggregates.successCount,
    accuracyRate: aggregates.reviewCount === 0 ? 0 : aggregates.successCount / aggregates.reviewCount,
    averageConfidence:
      aggregates.confidenceCount === 0 ? null : aggregates.confidenceSum / aggregates.confidenceCount,
    averageTimeSeconds:
      aggregates.timeTakenCount === 0 ? null : aggregates.timeTakenSecondsSum / aggregates.timeTakenCount,
    difficultyDistribution,
    bestStreak: aggregates.bestStreak,
    startedAt: session.startedAt,
    endedAt,
    durationSeconds: Math.max(0, Math.floor((endedAt.getTime() - session.startedAt.getTime()) / 1000)),
  };
}
