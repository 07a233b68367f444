/**
 * Review Schedule Repository Implementation
 *
 * SQLite ScheduleStore. Writes are optimistic: each one names the version
 * it read and only lands if the row still carries that version, otherwise
 * ConcurrentModificationError is thrown and the transaction rolls back.
 * A review recorded in a session updates the session row in the same
 * transaction.
 */

import { eq, and, lte, asc, sql } from 'drizzle-orm';
import type { AppDatabase, AppTransaction } from '../db';
import { reviewSchedules, reviewHistory } from '../schema';
import { runStoreCall } from '../sqlite-errors';
import { ConcurrentModificationError } from '@/core/errors';
import type { MemoryStrength, ReviewHistoryRecord, StoredReviewSchedule } from '@/core/models';
import type { ScheduleStore, SessionUpdate } from '@/core/stores';
import { applySessionUpdate } from './review-session.repository';

type ScheduleRow = typeof reviewSchedules.$inferSelect;

/**
 * Maps a database row to a StoredReviewSchedule domain model.
 */
function mapToDomain(row: ScheduleRow): StoredReviewSchedule {
  return {
    itemId: row.itemId,
    userId: row.userId,
    scheduledDate: row.scheduledDate,
    algorithm: row.algorithm,
    strength: {
      easeFactor: row.easeFactor,
      intervalDays: row.intervalDays,
      repetitions: row.repetitions,
      retentionRate: row.retentionRate,
      stability: row.stability,
      lastReview: row.lastReview,
      lapses: row.lapses,
      consecutiveFailures: row.consecutiveFailures,
      learningStep: row.learningStep,
      leitnerBox: row.leitnerBox,
      isLeech: row.isLeech,
    },
    status: row.status,
    version: row.version,
    earliestDate: row.earliestDate,
    latestDate: row.latestDate,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function scheduleConflict(schedule: StoredReviewSchedule, expectedVersion: number): ConcurrentModificationError {
  return new ConcurrentModificationError(
    `Schedule for item '${schedule.itemId}' and user '${schedule.userId}'`,
    expectedVersion,
    { itemId: schedule.itemId, userId: schedule.userId }
  );
}

/**
 * Columns written on every put, version excluded.
 */
function toColumns(schedule: StoredReviewSchedule) {
  const { strength } = schedule;
  return {
    algorithm: schedule.algorithm,
    status: schedule.status,
    scheduledDate: schedule.scheduledDate,
    earliestDate: schedule.earliestDate,
    latestDate: schedule.latestDate,
    easeFactor: strength.easeFactor,
    intervalDays: strength.intervalDays,
    repetitions: strength.repetitions,
    retentionRate: strength.retentionRate,
    stability: strength.stability,
    lastReview: strength.lastReview,
    lapses: strength.lapses,
    consecutiveFailures: strength.consecutiveFailures,
    learningStep: strength.learningStep,
    leitnerBox: strength.leitnerBox,
    isLeech: strength.isLeech,
    updatedAt: schedule.updatedAt,
  };
}

/**
 * @example
 * ```typescript
 * const schedules = new ReviewScheduleRepository(db);
 * const current = await schedules.getSchedule('mem_1', 'user_1');
 * await schedules.putSchedule(next, current?.version ?? null);
 * ```
 */
export class ReviewScheduleRepository implements ScheduleStore {
  constructor(private readonly db: AppDatabase) {}

  async getStrength(itemId: string, userId: string): Promise<MemoryStrength | null> {
    const schedule = await this.getSchedule(itemId, userId);
    return schedule?.status === 'active' ? schedule.strength : null;
  }

  async getSchedule(itemId: string, userId: string): Promise<StoredReviewSchedule | null> {
    return runStoreCall('getSchedule', () => {
      const row = this.db
        .select()
        .from(reviewSchedules)
        .where(and(eq(reviewSchedules.itemId, itemId), eq(reviewSchedules.userId, userId)))
        .get();
      return row ? mapToDomain(row) : null;
    });
  }

  async putSchedule(schedule: StoredReviewSchedule, expectedVersion: number | null): Promise<StoredReviewSchedule> {
    return runStoreCall('putSchedule', () =>
      this.db.transaction((tx) => this.write(tx, schedule, expectedVersion))
    );
  }

  async commitReview(
    schedule: StoredReviewSchedule,
    expectedVersion: number | null,
    record: ReviewHistoryRecord,
    updateSession?: SessionUpdate
  ): Promise<StoredReviewSchedule> {
    return runStoreCall('commitReview', () =>
      this.db.transaction((tx) => {
        const written = this.write(tx, schedule, expectedVersion);
        tx.insert(reviewHistory).values(record).onConflictDoNothing().run();
        if (updateSession !== undefined && record.sessionId !== null) {
          applySessionUpdate(tx, record.sessionId, updateSession);
        }
        return written;
      })
    );
  }

  async findDueSchedules(userId: string, asOf: Date): Promise<StoredReviewSchedule[]> {
    return runStoreCall('findDueSchedules', () =>
      this.db
        .select()
        .from(reviewSchedules)
        .where(
          and(
            eq(reviewSchedules.userId, userId),
            eq(reviewSchedules.status, 'active'),
            lte(reviewSchedules.scheduledDate, asOf)
          )
        )
        .orderBy(asc(reviewSchedules.scheduledDate))
        .all()
        .map(mapToDomain)
    );
  }

  async archiveItemSchedules(itemId: string, archivedAt: Date): Promise<number> {
    return runStoreCall('archiveItemSchedules', () => {
      const result = this.db
        .update(reviewSchedules)
        .set({
          status: 'archived',
          version: sql`${reviewSchedules.version} + 1`,
          updatedAt: archivedAt,
        })
        .where(and(eq(reviewSchedules.itemId, itemId), eq(reviewSchedules.status, 'active')))
        .run();
      return result.changes;
    });
  }

  /**
   * Inserts (expectedVersion null) or updates under the version check.
   */
  private write(
    tx: AppTransaction,
    schedule: StoredReviewSchedule,
    expectedVersion: number | null
  ): StoredReviewSchedule {
    const nextVersion = (expectedVersion ?? 0) + 1;
    const columns = toColumns(schedule);

    if (expectedVersion === null) {
      const inserted = tx
        .insert(reviewSchedules)
        .values({
          ...columns,
          itemId: schedule.itemId,
          userId: schedule.userId,
          version: nextVersion,
          createdAt: schedule.createdAt,
        })
        .onConflictDoNothing()
        .returning()
        .get();
      if (!inserted) {
        throw scheduleConflict(schedule, 0);
      }
      return mapToDomain(inserted);
    }

    const updated = tx
      .update(reviewSchedules)
      .set({ ...columns, version: nextVersion })
      .where(
        and(
          eq(reviewSchedules.itemId, schedule.itemId),
          eq(reviewSchedules.userId, schedule.userId),
          eq(reviewSchedules.version, expectedVersion)
        )
      )
      .returning()
      .get();
    if (!updated) {
      throw scheduleConflict(schedule, expectedVersion);
    }
    return mapToDomain(updated);
  }
}
