import { describe, it, expect } from 'vitest';
import { addReview, emptyAggregates, summarize } from './aggregates';
import type { ReviewSession } from '../models';
import { utc } from '../../../tests/helpers';

describe('addReview', () => {
  it('tracks counts, sums and the success streak', () => {
    let aggregates = emptyAggregates();
    aggregates = addReview(aggregates, { difficulty: 'GOOD', confidence: 0.8, timeTakenSeconds: 10 });
    aggregates = addReview(aggregates, { difficulty: 'EASY', confidence: null, timeTakenSeconds: 4 });
    aggregates = addReview(aggregates, { difficulty: 'AGAIN', confidence: 0.2, timeTakenSeconds: null });
    aggregates = addReview(aggregates, { difficulty: 'GOOD', confidence: null, timeTakenSeconds: null });

    expect(aggregates).toEqual({
      reviewCount: 4,
      successCount: 3,
      difficultyCounts: { AGAIN: 1, HARD: 0, GOOD: 2, EASY: 1 },
      confidenceSum: 1,
      confidenceCount: 2,
      timeTakenSecondsSum: 14,
      timeTakenCount: 2,
      currentStreak: 1,
      bestStreak: 2,
    });
  });

  it('does not modify its input', () => {
    const before = emptyAggregates();
    addReview(before, { difficulty: 'HARD', confidence: null, timeTakenSeconds: null });

    expect(before).toEqual(emptyAggregates());
  });

  it('treats HARD as a failure for the streak', () => {
    let aggregates = addReview(emptyAggregates(), { difficulty: 'GOOD', confidence: null, timeTakenSeconds: null });
    aggregates = addReview(aggregates, { difficulty: 'HARD', confidence: null, timeTakenSeconds: null });

    expect(aggregates.currentStreak).toBe(0);
    expect(aggregates.successCount).toBe(1);
  });
});

describe('summarize', () => {
  function session(itemsReviewed: string[], aggregates = emptyAggregates()): ReviewSession {
    return {
      id: 'rsess_1',
      userId: 'u1',
      algorithm: 'SM2',
      status: 'active',
      startedAt: utc(2024, 3, 1, 9),
      endedAt: null,
      itemsReviewed,
      aggregates,
      summary: null,
      version: 1,
    };
  }

  it('reports an empty session with zero accuracy and no averages', () => {
    expect(summarize(session([]), utc(2024, 3, 1, 9, 5))).toEqual({
      sessionId: 'rsess_1',
      userId: 'u1',
      totalReviewed: 0,
      uniqueItems: 0,
      successCount: 0,
      accuracyRate: 0,
      averageConfidence: null,
      averageTimeSeconds: null,
      difficultyDistribution: { AGAIN: 0, HARD: 0, GOOD: 0, EASY: 0 },
      bestStreak: 0,
      startedAt: utc(2024, 3, 1, 9),
      endedAt: utc(2024, 3, 1, 9, 5),
      durationSeconds: 300,
    });
  });

  it('derives rates and averages from the aggregates', () => {
    let aggregates = addReview(emptyAggregates(), { difficulty: 'GOOD', confidence: 0.5, timeTakenSeconds: 6 });
    aggregates = addReview(aggregates, { difficulty: 'AGAIN', confidence: 1, timeTakenSeconds: 10 });
    aggregates = addReview(aggregates, { difficulty: 'GOOD', confidence: null, timeTakenSeconds: 5 });
    aggregates = addReview(aggregates, { difficulty: 'EASY', confidence: null, timeTakenSeconds: 3 });

    const summary = summarize(session(['mem_a', 'mem_b', 'mem_a', 'mem_c'], aggregates), utc(2024, 3, 1, 10));

    expect(summary.totalReviewed).toBe(4);
    expect(summary.uniqueItems).toBe(3);
    expect(summary.accuracyRate).toBe(0.75);
    expect(summary.averageConfidence).toBe(0.75);
    expect(summary.averageTimeSeconds).toBe(6);
    expect(summary.bestStreak).toBe(2);
    expect(summary.durationSeconds).toBe(3600);
  });
});
