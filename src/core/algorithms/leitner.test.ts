/**
 * LeitnerStrategy Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { LeitnerStrategy } from './leitner';
import { createMemoryStrength } from '../models';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('LeitnerStrategy', () => {
  const leitner = new LeitnerStrategy();
  const baseTime = new Date('2024-05-10T12:00:00Z');

  it('promotes from box 1 to box 2 on GOOD', () => {
    const result = leitner.apply(createMemoryStrength({ leitnerBox: 1 }), 'GOOD', baseTime);

    expect(result.strength.leitnerBox).toBe(2);
    expect(result.strength.intervalDays).toBe(2);
    expect(result.strength.repetitions).toBe(1);
    expect(result.nextDue.getTime()).toBe(baseTime.getTime() + 2 * DAY_MS);
  });

  it('demotes from box 3 to box 1 on AGAIN', () => {
    const result = leitner.apply(createMemoryStrength({ leitnerBox: 3, repetitions: 2 }), 'AGAIN', baseTime);

    expect(result.strength.leitnerBox).toBe(1);
    expect(result.strength.intervalDays).toBe(1);
    expect(result.strength.repetitions).toBe(0);
  });

  it('demotes to box 1 on HARD', () => {
    const { strength } = leitner.apply(createMemoryStrength({ leitnerBox: 4 }), 'HARD', baseTime);
    expect(strength.leitnerBox).toBe(1);
  });

  it('stays in the last box on EASY', () => {
    const { strength } = leitner.apply(createMemoryStrength({ leitnerBox: 5 }), 'EASY', baseTime);
    expect(strength.leitnerBox).toBe(5);
    expect(strength.intervalDays).toBe(16);
  });

  it('holds ease at the default', () => {
    const { strength } = leitner.apply(createMemoryStrength({ easeFactor: 1.8 }), 'AGAIN', baseTime);
    expect(strength.easeFactor).toBe(2.5);
  });

  it('reads intervals from configured boxes', () => {
    const custom = new LeitnerStrategy({ boxIntervalsDays: [1, 3, 7] });
    const { strength } = custom.apply(createMemoryStrength({ leitnerBox: 3 }), 'GOOD', baseTime);

    expect(strength.leitnerBox).toBe(3);
    expect(strength.intervalDays).toBe(7);
  });
});
