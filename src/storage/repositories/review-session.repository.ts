/**
 * Review Session Repository Implementation
 *
 * Sessions are stored whole: aggregates and the frozen summary live in JSON
 * columns, with the summary's timestamps kept as epoch milliseconds. Every
 * write is conditional on the version that was read.
 */

import { and, eq } from 'drizzle-orm';
import type { AppDatabase, AppTransaction } from '../db';
import { reviewSessions, type DbSessionSummary } from '../schema';
import { runStoreCall } from '../sqlite-errors';
import { ConcurrentModificationError, SessionClosedError, SessionNotFoundError } from '@/core/errors';
import type { ReviewSession, ReviewSessionSummary } from '@/core/models';
import type { SessionStore, SessionUpdate } from '@/core/stores';

function summaryToDb(summary: ReviewSessionSummary): DbSessionSummary {
  return {
    ...summary,
    startedAt: summary.startedAt.getTime(),
    endedAt: summary.endedAt.getTime(),
  };
}

function summaryFromDb(summary: DbSessionSummary): ReviewSessionSummary {
  return {
    ...summary,
    startedAt: new Date(summary.startedAt),
    endedAt: new Date(summary.endedAt),
  };
}

function mapToDomain(row: typeof reviewSessions.$inferSelect): ReviewSession {
  return {
    id: row.id,
    userId: row.userId,
    algorithm: row.algorithm,
    status: row.status,
    startedAt: row.startedAt,
    endedAt: row.endedAt,
    itemsReviewed: row.itemsReviewed,
    aggregates: row.aggregates,
    summary: row.summary ? summaryFromDb(row.summary) : null,
    version: row.version,
  };
}

/**
 * Columns written on every save, id and version excluded.
 */
function toColumns(session: ReviewSession) {
  return {
    userId: session.userId,
    algorithm: session.algorithm,
    status: session.status,
    startedAt: session.startedAt,
    endedAt: session.endedAt,
    itemsReviewed: session.itemsReviewed,
    aggregates: session.aggregates,
    summary: session.summary ? summaryToDb(session.summary) : null,
  };
}

/**
 * Conditional update of one session under the version check.
 *
 * @throws {SessionNotFoundError} If no session has the id
 * @throws {ConcurrentModificationError} If the stored version differs
 */
function writeSession(tx: AppTransaction, session: ReviewSession, expectedVersion: number): ReviewSession {
  const updated = tx
    .update(reviewSessions)
    .set({ ...toColumns(session), version: expectedVersion + 1 })
    .where(and(eq(reviewSessions.id, session.id), eq(reviewSessions.version, expectedVersion)))
    .returning()
    .get();
  if (updated) {
    return mapToDomain(updated);
  }

  const exists = tx.select({ id: reviewSessions.id }).from(reviewSessions).where(eq(reviewSessions.id, session.id)).get();
  if (!exists) {
    throw new SessionNotFoundError(session.id);
  }
  throw new ConcurrentModificationError(`Session '${session.id}'`, expectedVersion, { sessionId: session.id });
}

/**
 * Folds a committed review into its ACTIVE session inside the caller's
 * transaction.
 *
 * @throws {SessionNotFoundError} If the session does not exist
 * @throws {SessionClosedError} If the session has ended
 */
export function applySessionUpdate(tx: AppTransaction, sessionId: string, update: SessionUpdate): ReviewSession {
  const row = tx.select().from(reviewSessions).where(eq(reviewSessions.id, sessionId)).get();
  if (!row) {
    throw new SessionNotFoundError(sessionId);
  }
  const current = mapToDomain(row);
  if (current.status === 'ended') {
    throw new SessionClosedError(sessionId);
  }
  return writeSession(tx, update(current), current.version);
}

/**
 * @example
 * ```typescript
 * const sessions = new ReviewSessionRepository(db);
 * const session = await sessions.findById('rsess_1');
 * if (session) await sessions.save({ ...session, status: 'ended' }, session.version);
 * ```
 */
export class ReviewSessionRepository implements SessionStore {
  constructor(private readonly db: AppDatabase) {}

  async create(session: ReviewSession): Promise<ReviewSession> {
    return runStoreCall('createSession', () =>
      mapToDomain(
        this.db
          .insert(reviewSessions)
          .values({ ...toColumns(session), id: session.id, version: 1 })
          .returning()
          .get()
      )
    );
  }

  async findById(sessionId: string): Promise<ReviewSession | null> {
    return runStoreCall('findSession', () => {
      const row = this.db.select().from(reviewSessions).where(eq(reviewSessions.id, sessionId)).get();
      return row ? mapToDomain(row) : null;
    });
  }

  /**
   * @throws {SessionNotFoundError} If no session has the id
   * @throws {ConcurrentModificationError} If the stored version differs
   */
  async save(session: ReviewSession, expectedVersion: number): Promise<ReviewSession> {
    return runStoreCall('saveSession', () =>
      this.db.transaction((tx) => writeSession(tx, session, expectedVersion))
    );
  }
}
