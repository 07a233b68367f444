import { describe, it, expect } from 'vitest';
import { backoffDelay, withRetry, type RetryPolicy } from './retry';
import {
  ConcurrentModificationError,
  InvalidStateError,
  StoreUnavailableError,
  TransientStoreError,
} from '../errors';
import { createRecordingLogger } from '../../../tests/helpers';

const FAST: RetryPolicy = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

describe('backoffDelay', () => {
  it('doubles from the base delay and stops at the cap', () => {
    const policy: RetryPolicy = { attempts: 5, baseDelayMs: 50, maxDelayMs: 300 };

    expect(backoffDelay(1, policy)).toBe(50);
    expect(backoffDelay(2, policy)).toBe(100);
    expect(backoffDelay(3, policy)).toBe(200);
    expect(backoffDelay(4, policy)).toBe(300);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const logger = createRecordingLogger();
    const attempts: number[] = [];

    const result = await withRetry(
      'op',
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new TransientStoreError('busy');
        return 'done';
      },
      FAST,
      logger
    );

    expect(result).toBe('done');
    expect(attempts).toEqual([1, 2, 3]);
    expect(logger.entries.map((entry) => entry.message)).toEqual([
      'Retrying op (attempt 2/3) after 0ms',
      'Retrying op (attempt 3/3) after 0ms',
    ]);
  });

  it('retries version conflicts', async () => {
    let calls = 0;
    const result = await withRetry(
      'commit',
      async () => {
        calls += 1;
        if (calls === 1) throw new ConcurrentModificationError("Schedule for item 'mem_1'", 1);
        return calls;
      },
      FAST,
      createRecordingLogger()
    );

    expect(result).toBe(2);
  });

  it('throws StoreUnavailableError once attempts run out', async () => {
    let calls = 0;
    const promise = withRetry(
      'commitReview',
      async () => {
        calls += 1;
        throw new TransientStoreError('busy');
      },
      FAST,
      createRecordingLogger()
    );

    await expect(promise).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(promise).rejects.toMatchObject({
      code: 'STORE_UNAVAILABLE',
      details: { operation: 'commitReview', attempts: 3 },
    });
    expect(calls).toBe(3);
  });

  it('does not retry errors that are not retryable', async () => {
    let calls = 0;
    const promise = withRetry(
      'op',
      async () => {
        calls += 1;
        throw new InvalidStateError('bad input');
      },
      FAST,
      createRecordingLogger()
    );

    await expect(promise).rejects.toBeInstanceOf(InvalidStateError);
    expect(calls).toBe(1);
  });
});
