/**
 * Review History Repository Implementation
 *
 * Append-only log of reviews. Re-appending a stored id is a no-op, so a
 * retried commit never duplicates history.
 */

import { eq, and, gte, lte, asc, type SQL } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { reviewHistory } from '../schema';
import { runStoreCall } from '../sqlite-errors';
import type { ReviewHistoryRecord } from '@/core/models';
import type { HistoryQuery, HistoryStore } from '@/core/stores';

function mapToDomain(row: typeof reviewHistory.$inferSelect): ReviewHistoryRecord {
  return {
    id: row.id,
    itemId: row.itemId,
    userId: row.userId,
    sessionId: row.sessionId,
    difficulty: row.difficulty,
    algorithm: row.algorithm,
    timeTakenSeconds: row.timeTakenSeconds,
    confidence: row.confidence,
    intervalDaysBefore: row.intervalDaysBefore,
    intervalDaysAfter: row.intervalDaysAfter,
    reviewedAt: row.reviewedAt,
  };
}

export class ReviewHistoryRepository implements HistoryStore {
  constructor(private readonly db: AppDatabase) {}

  async appendHistory(record: ReviewHistoryRecord): Promise<void> {
    await runStoreCall('appendHistory', () =>
      this.db.insert(reviewHistory).values(record).onConflictDoNothing().run()
    );
  }

  async findHistory(query: HistoryQuery): Promise<ReviewHistoryRecord[]> {
    const conditions: SQL[] = [eq(reviewHistory.userId, query.userId)];
    if (query.itemId !== undefined) conditions.push(eq(reviewHistory.itemId, query.itemId));
    if (query.from !== undefined) conditions.push(gte(reviewHistory.reviewedAt, query.from));
    if (query.to !== undefined) conditions.push(lte(reviewHistory.reviewedAt, query.to));

    return runStoreCall('findHistory', () =>
      this.db
        .select()
        .from(reviewHistory)
        .where(and(...conditions))
        .orderBy(asc(reviewHistory.reviewedAt), asc(reviewHistory.id))
        .all()
        .map(mapToDomain)
    );
  }
}
