import { describe, it, expect } from 'vitest';
import { retentionAtDue, retrievability } from './forgetting-curve';

describe('forgetting curve', () => {
  it('decays exponentially with elapsed time', () => {
    expect(retrievability(2, 5, 5)).toBeCloseTo(Math.exp(-0.5), 10);
    expect(retrievability(2, 5, 10)).toBeCloseTo(Math.exp(-1), 10);
  });

  it('is certain right after a review', () => {
    expect(retrievability(1, 1, 0)).toBe(1);
  });

  it('matches retentionAtDue at the due time', () => {
    expect(retrievability(3, 8, 8)).toBeCloseTo(retentionAtDue(3), 10);
  });
});
