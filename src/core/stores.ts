/**
 * Store contracts consumed by the engine.
 *
 * The engine only talks to these interfaces. `src/storage` ships SQLite
 * implementations; tests use in-memory fakes.
 */

import type {
  MemoryStrength,
  ReviewHistoryRecord,
  ReviewSession,
  StoredReviewSchedule,
} from './models';

/**
 * Folds a review into its session. Must be synchronous and free of side
 * effects: stores call it inside their commit.
 */
export type SessionUpdate = (session: ReviewSession) => ReviewSession;

export interface ScheduleStore {
  /** Strength of the active schedule, or null when there is none */
  getStrength(itemId: string, userId: string): Promise<MemoryStrength | null>;

  /** The schedule row for the key, active or archived */
  getSchedule(itemId: string, userId: string): Promise<StoredReviewSchedule | null>;

  /**
   * Upserts a schedule. `expectedVersion` is the version that was read, or
   * null when no row was read. The stored row gets `expectedVersion + 1`
   * (1 for a new row).
   *
   * @throws {ConcurrentModificationError} If the stored version differs
   * @throws {TransientStoreError} On retryable store failures
   */
  putSchedule(schedule: StoredReviewSchedule, expectedVersion: number | null): Promise<StoredReviewSchedule>;

  /**
   * Writes the schedule and appends the history record in one transaction,
   * with the same version check as putSchedule.
   *
   * When `updateSession` is given, the session named by `record.sessionId`
   * is read, passed through it and written back (version + 1) in the same
   * transaction. Nothing is written if the session is missing or ended.
   *
   * @throws {SessionNotFoundError} If the record's session does not exist
   * @throws {SessionClosedError} If the record's session has ended
   */
  commitReview(
    schedule: StoredReviewSchedule,
    expectedVersion: number | null,
    record: ReviewHistoryRecord,
    updateSession?: SessionUpdate
  ): Promise<StoredReviewSchedule>;

  /** Active schedules of the user with scheduledDate <= asOf, in no particular order */
  findDueSchedules(userId: string, asOf: Date): Promise<StoredReviewSchedule[]>;

  /**
   * Archives every schedule of the item.
   *
   * @returns Number of schedules archived
   */
  archiveItemSchedules(itemId: string, archivedAt: Date): Promise<number>;
}

export interface HistoryQuery {
  userId: string;
  itemId?: string;
  /** Inclusive lower bound on reviewedAt */
  from?: Date;
  /** Inclusive upper bound on reviewedAt */
  to?: Date;
}

export interface HistoryStore {
  /** Appends a record; a record whose id is already stored is ignored */
  appendHistory(record: ReviewHistoryRecord): Promise<void>;

  /** Matching records ordered by reviewedAt, then id */
  findHistory(query: HistoryQuery): Promise<ReviewHistoryRecord[]>;
}

export interface ContentStore {
  /** True for items that exist and have not been deleted */
  itemExists(itemId: string): Promise<boolean>;
}

export interface SessionStore {
  /** Stores a new session at version 1 */
  create(session: ReviewSession): Promise<ReviewSession>;
  findById(sessionId: string): Promise<ReviewSession | null>;
  /**
   * Replaces the stored session if it still carries `expectedVersion`; the
   * stored row gets `expectedVersion + 1`.
   *
   * @throws {SessionNotFoundError} If no session has the id
   * @throws {ConcurrentModificationError} If the stored version differs
   */
  save(session: ReviewSession, expectedVersion: number): Promise<ReviewSession>;
}
