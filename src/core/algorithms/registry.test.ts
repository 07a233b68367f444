/**
 * Algorithm registry tests.
 */

import { describe, it, expect } from 'vitest';
import { createAlgorithmRegistry } from './registry';
import type { AlgorithmStrategy } from './types';
import { createMemoryStrength } from '../models';

const baseTime = new Date('2024-06-01T00:00:00Z');

describe('createAlgorithmRegistry', () => {
  it('provides a strategy for every algorithm', () => {
    const registry = createAlgorithmRegistry();
    expect(registry.SM2.name).toBe('SM2');
    expect(registry.ANKI.name).toBe('ANKI');
    expect(registry.LEITNER.name).toBe('LEITNER');
    expect(registry.CUSTOM.name).toBe('CUSTOM');
  });

  it('passes the shared interval ceiling to built-in strategies', () => {
    const registry = createAlgorithmRegistry({ maxIntervalDays: 365 });
    const current = createMemoryStrength({ intervalDays: 300, repetitions: 4 });

    expect(registry.SM2.apply(current, 'GOOD', baseTime).strength.intervalDays).toBe(365);
    expect(registry.CUSTOM.apply(current, 'GOOD', baseTime).strength.intervalDays).toBe(365);
  });

  it('uses a plugged-in CUSTOM strategy', () => {
    const fixed: AlgorithmStrategy = {
      name: 'fixed-week',
      apply: (strength, _difficulty, reviewedAt = new Date()) => ({
        strength: { ...strength, intervalDays: 7, lastReview: reviewedAt },
        nextDue: new Date(reviewedAt.getTime() + 7 * 24 * 60 * 60 * 1000),
        isLeech: false,
      }),
    };
    const registry = createAlgorithmRegistry({ custom: fixed });

    expect(registry.CUSTOM).toBe(fixed);
    expect(registry.CUSTOM.apply(createMemoryStrength(), 'AGAIN', baseTime).strength.intervalDays).toBe(7);
  });

  it('passes per-algorithm options through', () => {
    const registry = createAlgorithmRegistry({ leitner: { boxIntervalsDays: [2, 5] } });
    const { strength } = registry.LEITNER.apply(createMemoryStrength(), 'GOOD', baseTime);
    expect(strength.intervalDays).toBe(5);
  });
});
