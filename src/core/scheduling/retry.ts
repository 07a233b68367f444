/**
 * Bounded exponential backoff for store operations.
 *
 * Only errors flagged `retryable` (TransientStoreError,
 * ConcurrentModificationError) are retried; anything else propagates on the
 * first failure. The task is re-run from scratch each time, so it must do its
 * own fresh read.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { StoreUnavailableError, isRetryableError } from '../errors';
import type { Logger } from '../logging';

export interface RetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  /** Delay before the second attempt */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 1000,
};

/**
 * Delay before attempt `attempt + 1`: base * 2^(attempt - 1), capped.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Runs `task` until it succeeds, fails with a non-retryable error, or the
 * attempts run out.
 *
 * @throws {StoreUnavailableError} When every attempt failed with a retryable error
 */
export async function withRetry<T>(
  operation: string,
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  logger: Logger
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return await task(attempt);
    } catch (error) {
      if (!isRetryableError(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < policy.attempts) {
        const delay = backoffDelay(attempt, policy);
        logger.warn(
          `Retrying ${operation} (attempt ${attempt + 1}/${policy.attempts}) after ${delay}ms`,
          { error: error instanceof Error ? error.message : String(error) }
        );
        await sleep(delay);
      }
    }
  }

  logger.error(`${operation} failed after ${policy.attempts} attempts`);
  throw new StoreUnavailableError(operation, policy.attempts, lastError);
}
