import { describe, it, expect } from 'vitest';
import { compareByPriority, overdueDays, priorityScore, toReviewSchedule } from './priority';
import { reviewWindow } from './review-window';
import { createMemoryStrength, type StoredReviewSchedule } from '../models';
import { utc } from '../../../tests/helpers';

function stored(itemId: string, scheduledDate: Date, retentionRate: number): StoredReviewSchedule {
  return {
    itemId,
    userId: 'u1',
    scheduledDate,
    algorithm: 'SM2',
    strength: createMemoryStrength({ retentionRate }),
    status: 'active',
    version: 1,
    ...reviewWindow(scheduledDate, 1),
    createdAt: scheduledDate,
    updatedAt: scheduledDate,
  };
}

describe('overdueDays', () => {
  it('counts whole days past due and never goes negative', () => {
    const due = utc(2024, 3, 1, 12);

    expect(overdueDays(due, utc(2024, 3, 4, 11))).toBe(2);
    expect(overdueDays(due, utc(2024, 3, 4, 12))).toBe(3);
    expect(overdueDays(due, utc(2024, 2, 20))).toBe(0);
  });
});

describe('priorityScore', () => {
  it('adds overdue days to ten times the expected forgetting', () => {
    expect(priorityScore(3, 0.9)).toBeCloseTo(4, 10);
    expect(priorityScore(0, 0.5)).toBe(5);
  });
});

describe('toReviewSchedule', () => {
  it('derives overdue days, priority and the leech flag', () => {
    const schedule = toReviewSchedule(stored('mem_a', utc(2024, 3, 1), 0.75), utc(2024, 3, 3));

    expect(schedule.overdueDays).toBe(2);
    expect(schedule.priorityScore).toBe(4.5);
    expect(schedule.isLeech).toBe(false);
  });
});

describe('compareByPriority', () => {
  it('orders by priority, then due date, then item id', () => {
    const asOf = utc(2024, 3, 10);
    const schedules = [
      toReviewSchedule(stored('mem_c', utc(2024, 3, 9), 0.5), asOf), // 1 + 5 = 6
      toReviewSchedule(stored('mem_b', utc(2024, 3, 9), 0.5), asOf), // 6, same date as mem_c
      toReviewSchedule(stored('mem_a', utc(2024, 3, 2), 0.9), asOf), // 8 + 1 = 9
      toReviewSchedule(stored('mem_d', utc(2024, 3, 8), 0.6), asOf), // 2 + 4 = 6, earlier date
    ];

    expect([...schedules].sort(compareByPriority).map((s) => s.itemId)).toEqual([
      'mem_a',
      'mem_d',
      'mem_b',
      'mem_c',
    ]);
  });
});

describe('reviewWindow', () => {
  it('allows at least one day either side', () => {
    const due = utc(2024, 3, 10);

    expect(reviewWindow(due, 5)).toEqual({ earliestDate: utc(2024, 3, 9), latestDate: utc(2024, 3, 11) });
  });

  it('allows ten percent of longer intervals', () => {
    const due = utc(2024, 3, 10);

    expect(reviewWindow(due, 35)).toEqual({ earliestDate: utc(2024, 3, 7), latestDate: utc(2024, 3, 13) });
  });
});
