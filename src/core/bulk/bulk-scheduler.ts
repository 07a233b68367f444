/**
 * Bulk Scheduler
 *
 * Gives many items their first schedule at once, typically after an import.
 * Each item is handled on its own: one missing item or failed write is
 * reported and the rest carry on. Items that already have an active schedule
 * are reported as skipped and left untouched.
 *
 * Work runs through a small pool of workers pulling from a shared cursor, so
 * at most `concurrency` items are in flight. Cancellation is checked before
 * each item is taken; anything not yet taken is reported in `notProcessed`.
 *
 * @example
 * ```typescript
 * const bulk = new BulkScheduler({ scheduler });
 * const controller = new AbortController();
 *
 * const result = await bulk.bulkSchedule({
 *   itemIds: imported.map((item) => item.id),
 *   userId: 'user_1',
 *   algorithm: 'LEITNER',
 *   distributeOverDays: 7,
 *   signal: controller.signal,
 * });
 * console.log(`${result.scheduled.length} scheduled, ${result.failed.length} failed`);
 * ```
 */

import { DEFAULT_MAX_INTERVAL_DAYS } from '../algorithms';
import { InvalidStateError, toErrorInfo } from '../errors';
import { createLogger, type Logger } from '../logging';
import { createMemoryStrength, type MemoryStrength, type ReviewSchedule } from '../models';
import { parseAlgorithm, type ReviewScheduler } from '../scheduling';
import { requireId, requireIntervalWithin } from '../scheduling/validation';
import { addDays } from '../time';
import type {
  BulkItemFailure,
  BulkScheduleRequest,
  BulkScheduleResult,
  BulkSchedulerConfig,
  BulkSchedulerDependencies,
} from './types';

const DEFAULT_CONFIG: BulkSchedulerConfig = {
  concurrency: 4,
  maxIntervalDays: DEFAULT_MAX_INTERVAL_DAYS,
};

type ItemOutcome =
  | { kind: 'scheduled'; schedule: ReviewSchedule }
  | { kind: 'skipped' }
  | { kind: 'failed'; failure: BulkItemFailure };

function requireWholeDays(field: string, value: number | undefined, minimum: number): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < minimum) {
    throw new InvalidStateError(`${field} must be an integer >= ${minimum}, received ${value}`, { field, value });
  }
  return value;
}

export class BulkScheduler {
  private readonly scheduler: ReviewScheduler;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly config: BulkSchedulerConfig;

  constructor(deps: BulkSchedulerDependencies, config?: Partial<BulkSchedulerConfig>) {
    this.scheduler = deps.scheduler;
    this.logger = deps.logger ?? createLogger('BulkScheduler');
    this.clock = deps.clock ?? (() => new Date());
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (!Number.isInteger(this.config.concurrency) || this.config.concurrency < 1) {
      throw new InvalidStateError('concurrency must be a positive integer', { value: this.config.concurrency });
    }
  }

  /**
   * @throws {InvalidStateError} If the request itself is malformed (bad user
   *   id, algorithm, initial strength or day offsets); per-item problems are
   *   reported in the result instead
   */
  async bulkSchedule(request: BulkScheduleRequest): Promise<BulkScheduleResult> {
    const userId = requireId('userId', request.userId);
    const algorithm = parseAlgorithm(request.algorithm);
    const strength: MemoryStrength = requireIntervalWithin(
      createMemoryStrength(request.initialStrength ?? {}),
      this.config.maxIntervalDays
    );
    const startOffsetDays = requireWholeDays('startOffsetDays', request.startOffsetDays, 0) ?? 0;
    const distributeOverDays = requireWholeDays('distributeOverDays', request.distributeOverDays, 1) ?? 1;
    const { itemIds, signal } = request;

    const now = this.clock();
    const outcomes: (ItemOutcome | undefined)[] = new Array(itemIds.length);
    let cursor = 0;
    let cancelled = false;

    const worker = async () => {
      while (cursor < itemIds.length) {
        if (signal?.aborted) {
          cancelled = true;
          return;
        }
        const index = cursor++;
        const itemId = itemIds[index];
        const scheduledDate = addDays(now, startOffsetDays + (index % distributeOverDays));
        outcomes[index] = await this.scheduleOne(itemId, userId, algorithm, strength, scheduledDate);
      }
    };

    const workers = Math.min(this.config.concurrency, itemIds.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const result: BulkScheduleResult = { scheduled: [], skipped: [], failed: [], notProcessed: [], cancelled };
    itemIds.forEach((itemId, index) => {
      const outcome = outcomes[index];
      if (outcome === undefined) {
        result.notProcessed.push(itemId);
      } else if (outcome.kind === 'scheduled') {
        result.scheduled.push(outcome.schedule);
      } else if (outcome.kind === 'skipped') {
        result.skipped.push(itemId);
      } else {
        result.failed.push(outcome.failure);
      }
    });

    this.logger.info(
      `Bulk scheduled ${result.scheduled.length}/${itemIds.length} item(s) for user '${userId}'` +
        ` (${result.skipped.length} skipped, ${result.failed.length} failed` +
        (cancelled ? `, cancelled with ${result.notProcessed.length} left)` : ')')
    );
    return result;
  }

  private async scheduleOne(
    itemId: string,
    userId: string,
    algorithm: BulkScheduleRequest['algorithm'],
    strength: MemoryStrength,
    scheduledDate: Date
  ): Promise<ItemOutcome> {
    try {
      const { created, schedule } = await this.scheduler.createInitialSchedule({
        itemId,
        userId,
        algorithm,
        strength,
        scheduledDate,
      });
      return created ? { kind: 'scheduled', schedule } : { kind: 'skipped' };
    } catch (error) {
      const { code, message } = toErrorInfo(error);
      this.logger.warn(`Item '${itemId}' failed: ${code}`, { message });
      return { kind: 'failed', failure: { itemId, code, message } };
    }
  }
}
