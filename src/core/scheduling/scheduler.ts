/**
 * Review Scheduler
 *
 * Orchestrates a review end to end:
 *
 * 1. Validates the request and checks the item still exists
 * 2. Loads the current schedule (or starts from default strength)
 * 3. Applies the selected algorithm strategy
 * 4. Commits the new schedule and the history record atomically
 * 5. Announces the outcome on the event sink
 *
 * Read-modify-write work for one (item, user) key is serialised through a
 * keyed mutex, and every commit carries the version it read so a writer in
 * another process is caught by the store. Transient store failures are
 * retried from a fresh read with bounded backoff.
 *
 * The scheduler keeps no state between calls besides the mutex queues.
 *
 * @example
 * ```typescript
 * const scheduler = new ReviewScheduler({ schedules, history, content });
 *
 * const schedule = await scheduler.scheduleReview({
 *   itemId: 'mem_42',
 *   userId: 'user_1',
 *   difficulty: 'GOOD',
 *   metadata: { timeTakenSeconds: 12, confidence: 0.8 },
 * });
 *
 * const due = await scheduler.getDueItems('user_1');
 * ```
 */

import { randomUUID } from 'node:crypto';
import {
  DEFAULT_MAX_INTERVAL_DAYS,
  createAlgorithmRegistry,
  parseDifficulty,
  retrievability,
  type AlgorithmRegistry,
} from '../algorithms';
import { bestReviewHour } from '../analytics/review-hours';
import { InvalidStateError, ItemNotFoundError, ScheduleNotFoundError } from '../errors';
import type { ReviewEventPayloads, ReviewEventSink, ReviewEventType } from '../events';
import { createLogger, type Logger } from '../logging';
import {
  createMemoryStrength,
  type Algorithm,
  type ReviewHistoryRecord,
  type ReviewSchedule,
  type StoredReviewSchedule,
} from '../models';
import type { ContentStore, HistoryStore, ScheduleStore } from '../stores';
import { MS_PER_DAY } from '../time';
import { KeyedMutex } from './keyed-mutex';
import { compareByPriority, toReviewSchedule } from './priority';
import { DEFAULT_RETRY_POLICY, withRetry } from './retry';
import { reviewWindow } from './review-window';
import type {
  InitialScheduleRequest,
  InitialScheduleResult,
  ReviewSchedulerConfig,
  ReviewSchedulerDependencies,
  ScheduleReviewRequest,
} from './types';
import { parseAlgorithm, parseMetadata, requireDate, requireId, requireIntervalWithin } from './validation';

/** Default number of due items returned */
export const DEFAULT_DUE_LIMIT = 100;

const DEFAULT_CONFIG: ReviewSchedulerConfig = {
  defaultAlgorithm: 'SM2',
  retry: DEFAULT_RETRY_POLICY,
  maxIntervalDays: DEFAULT_MAX_INTERVAL_DAYS,
};

export class ReviewScheduler {
  // === Dependencies (injected) ===

  private readonly schedules: ScheduleStore;
  private readonly history: HistoryStore;
  private readonly content: ContentStore;
  private readonly algorithms: AlgorithmRegistry;
  private readonly events: ReviewEventSink | null;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private readonly config: ReviewSchedulerConfig;

  /** Serialises work per (item, user) */
  private readonly locks = new KeyedMutex();

  constructor(deps: ReviewSchedulerDependencies, config?: Partial<ReviewSchedulerConfig>) {
    this.schedules = deps.schedules;
    this.history = deps.history;
    this.content = deps.content;
    this.algorithms = deps.algorithms ?? createAlgorithmRegistry();
    this.events = deps.events ?? null;
    this.logger = deps.logger ?? createLogger('ReviewScheduler');
    this.clock = deps.clock ?? (() => new Date());

    this.config = { ...DEFAULT_CONFIG, ...config };
    parseAlgorithm(this.config.defaultAlgorithm);
  }

  // ==========================================================================
  // Reviews
  // ==========================================================================

  /**
   * Records a review and moves the item to its next due date.
   *
   * @returns The new schedule, with `isLeech` set when the item keeps failing
   * @throws {InvalidDifficultyError} If the difficulty is missing or unknown
   * @throws {InvalidStateError} On malformed ids, algorithm or metadata
   * @throws {ItemNotFoundError} If the content store does not know the item
   * @throws {StoreUnavailableError} If the store kept failing transiently
   */
  async scheduleReview(request: ScheduleReviewRequest): Promise<ReviewSchedule> {
    const itemId = requireId('itemId', request.itemId);
    const userId = requireId('userId', request.userId);
    const difficulty = parseDifficulty(request.difficulty);
    const requestedAlgorithm = request.algorithm === undefined ? undefined : parseAlgorithm(request.algorithm);
    const fallbackAlgorithm =
      request.defaultAlgorithm === undefined ? this.config.defaultAlgorithm : parseAlgorithm(request.defaultAlgorithm);
    const metadata = parseMetadata(request.metadata);
    const reviewedAt = request.reviewedAt === undefined ? this.clock() : requireDate('reviewedAt', request.reviewedAt);
    const { updateSession } = request;
    if (updateSession !== undefined && metadata.sessionId === null) {
      throw new InvalidStateError('updateSession needs metadata.sessionId', { field: 'updateSession' });
    }

    // Fixed across retries so a replayed append is recognised as a duplicate
    const historyId = `rh_${randomUUID()}`;

    const outcome = await this.locks.runExclusive(lockKey(itemId, userId), () =>
      withRetry(
        'scheduleReview',
        async () => {
          if (!(await this.content.itemExists(itemId))) {
            throw new ItemNotFoundError(itemId);
          }

          const existing = await this.schedules.getSchedule(itemId, userId);
          const active = existing?.status === 'active' ? existing : null;
          const algorithm = requestedAlgorithm ?? active?.algorithm ?? fallbackAlgorithm;
          const current = active?.strength ?? createMemoryStrength();

          const result = this.algorithms[algorithm].apply(current, difficulty, reviewedAt);

          const next: StoredReviewSchedule = {
            itemId,
            userId,
            scheduledDate: result.nextDue,
            algorithm,
            strength: result.strength,
            status: 'active',
            version: existing?.version ?? 0,
            ...reviewWindow(result.nextDue, result.strength.intervalDays),
            createdAt: active?.createdAt ?? reviewedAt,
            updatedAt: reviewedAt,
          };

          const record: ReviewHistoryRecord = {
            id: historyId,
            itemId,
            userId,
            sessionId: metadata.sessionId,
            difficulty,
            algorithm,
            timeTakenSeconds: metadata.timeTakenSeconds,
            confidence: metadata.confidence,
            intervalDaysBefore: current.intervalDays,
            intervalDaysAfter: result.strength.intervalDays,
            reviewedAt,
          };

          const stored = await this.schedules.commitReview(next, existing?.version ?? null, record, updateSession);
          return { stored, record, becameLeech: result.isLeech && !current.isLeech };
        },
        this.config.retry,
        this.logger
      )
    );

    const { stored, record, becameLeech } = outcome;

    this.emit('review.completed', {
      itemId,
      userId,
      sessionId: record.sessionId,
      difficulty,
      algorithm: stored.algorithm,
      reviewedAt,
    });
    this.emit('review.scheduled', {
      itemId,
      userId,
      algorithm: stored.algorithm,
      scheduledDate: stored.scheduledDate,
      intervalDays: stored.strength.intervalDays,
    });
    if (becameLeech) {
      this.logger.warn(`Item '${itemId}' became a leech for user '${userId}'`, {
        consecutiveFailures: stored.strength.consecutiveFailures,
      });
      this.emit('item.leech', {
        itemId,
        userId,
        consecutiveFailures: stored.strength.consecutiveFailures,
        lapses: stored.strength.lapses,
      });
    }

    return toReviewSchedule(stored, reviewedAt);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Items due at `asOf`, most urgent first.
   *
   * Ordering is total (priority, then due date, then item id), so the same
   * data and `asOf` always give the same list.
   *
   * @throws {InvalidStateError} If limit is not a positive integer
   */
  async getDueItems(userId: string, asOf: Date = this.clock(), limit: number = DEFAULT_DUE_LIMIT): Promise<ReviewSchedule[]> {
    requireId('userId', userId);
    requireDate('asOf', asOf);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidStateError(`limit must be a positive integer, received ${limit}`, { field: 'limit', value: limit });
    }

    const stored = await withRetry(
      'getDueItems',
      () => this.schedules.findDueSchedules(userId, asOf),
      this.config.retry,
      this.logger
    );

    const due = stored
      .filter((schedule) => schedule.status === 'active' && schedule.scheduledDate.getTime() <= asOf.getTime())
      .map((schedule) => toReviewSchedule(schedule, asOf))
      .sort(compareByPriority)
      .slice(0, limit);

    if (due.length > 0) {
      this.emit('review.due', { userId, asOf, itemIds: due.map((schedule) => schedule.itemId) });
    }

    return due;
  }

  /**
   * The schedule for a key, active or archived, or null.
   */
  async getSchedule(itemId: string, userId: string, asOf: Date = this.clock()): Promise<ReviewSchedule | null> {
    const stored = await withRetry(
      'getSchedule',
      () => this.schedules.getSchedule(requireId('itemId', itemId), requireId('userId', userId)),
      this.config.retry,
      this.logger
    );
    return stored === null ? null : toReviewSchedule(stored, asOf);
  }

  /**
   * Probability that the item is still remembered at `asOf`, from the
   * forgetting curve. Never-reviewed items report their stored estimate.
   */
  getRetrievability(schedule: Pick<StoredReviewSchedule, 'strength'>, asOf: Date = this.clock()): number {
    const { strength } = schedule;
    if (strength.lastReview === null) {
      return strength.retentionRate;
    }
    const elapsedDays = (asOf.getTime() - strength.lastReview.getTime()) / MS_PER_DAY;
    return retrievability(strength.stability, strength.intervalDays, elapsedDays);
  }

  /**
   * UTC hour of day at which the user historically does best (9 without history).
   */
  async getOptimalReviewHour(userId: string): Promise<number> {
    const records = await withRetry(
      'getOptimalReviewHour',
      () => this.history.findHistory({ userId: requireId('userId', userId) }),
      this.config.retry,
      this.logger
    );
    return bestReviewHour(records);
  }

  // ==========================================================================
  // Schedule management
  // ==========================================================================

  /**
   * Switches the algorithm of an active schedule. Strength and due date are
   * untouched; the next review uses the new algorithm's rules on the
   * existing state.
   *
   * @throws {ScheduleNotFoundError} If there is no active schedule
   */
  async reschedule(itemId: string, userId: string, newAlgorithm: Algorithm): Promise<ReviewSchedule> {
    requireId('itemId', itemId);
    requireId('userId', userId);
    const algorithm = parseAlgorithm(newAlgorithm);
    const now = this.clock();

    const stored = await this.locks.runExclusive(lockKey(itemId, userId), () =>
      withRetry(
        'reschedule',
        async () => {
          const existing = await this.schedules.getSchedule(itemId, userId);
          if (existing === null || existing.status !== 'active') {
            throw new ScheduleNotFoundError(itemId, userId);
          }
          return this.schedules.putSchedule({ ...existing, algorithm, updatedAt: now }, existing.version);
        },
        this.config.retry,
        this.logger
      )
    );

    this.logger.info(`Switched item '${itemId}' to ${algorithm} for user '${userId}'`);
    return toReviewSchedule(stored, now);
  }

  /**
   * Creates a schedule if the key has no active one. An existing active
   * schedule is returned as is, never overwritten.
   *
   * @throws {ItemNotFoundError} If the content store does not know the item
   */
  async createInitialSchedule(request: InitialScheduleRequest): Promise<InitialScheduleResult> {
    const itemId = requireId('itemId', request.itemId);
    const userId = requireId('userId', request.userId);
    const algorithm = parseAlgorithm(request.algorithm);
    const strength = requireIntervalWithin(request.strength ?? createMemoryStrength(), this.config.maxIntervalDays);
    const scheduledDate = requireDate('scheduledDate', request.scheduledDate);
    const now = this.clock();

    const result = await this.locks.runExclusive(lockKey(itemId, userId), () =>
      withRetry(
        'createInitialSchedule',
        async (): Promise<InitialScheduleResult> => {
          if (!(await this.content.itemExists(itemId))) {
            throw new ItemNotFoundError(itemId);
          }

          const existing = await this.schedules.getSchedule(itemId, userId);
          if (existing !== null && existing.status === 'active') {
            return { created: false, schedule: toReviewSchedule(existing, now) };
          }

          const stored = await this.schedules.putSchedule(
            {
              itemId,
              userId,
              scheduledDate,
              algorithm,
              strength,
              status: 'active',
              version: existing?.version ?? 0,
              ...reviewWindow(scheduledDate, strength.intervalDays),
              createdAt: now,
              updatedAt: now,
            },
            existing?.version ?? null
          );
          return { created: true, schedule: toReviewSchedule(stored, now) };
        },
        this.config.retry,
        this.logger
      )
    );

    if (result.created) {
      this.emit('review.scheduled', {
        itemId,
        userId,
        algorithm,
        scheduledDate: result.schedule.scheduledDate,
        intervalDays: result.schedule.strength.intervalDays,
      });
    }
    return result;
  }

  /**
   * Archives every schedule of an item that was deleted from the content
   * store. Rows are kept for audit and drop out of due-item queries.
   *
   * @returns Number of schedules archived
   */
  async archiveItem(itemId: string): Promise<number> {
    requireId('itemId', itemId);
    const archived = await withRetry(
      'archiveItem',
      () => this.schedules.archiveItemSchedules(itemId, this.clock()),
      this.config.retry,
      this.logger
    );
    if (archived > 0) {
      this.logger.info(`Archived ${archived} schedule(s) of item '${itemId}'`);
    }
    return archived;
  }

  private emit<K extends ReviewEventType>(type: K, data: ReviewEventPayloads[K]): void {
    this.events?.emit(type, data);
  }
}

function lockKey(itemId: string, userId: string): string {
  return `${itemId}\u0000${userId}`;
}
