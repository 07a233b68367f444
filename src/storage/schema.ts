/**
 * Database Schema Definitions for the Review Engine
 *
 * Drizzle ORM schema definitions for SQLite. The DDL that creates these
 * tables lives in `schema.sql`; the two must be kept in step.
 *
 * Tables:
 * - Memory Items: reviewable content (the shipped content store)
 * - Review Schedules: one row per (item, user) with the embedded strength
 * - Review History: append-only log of review events
 * - Review Sessions: bounded runs of reviews with running aggregates
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  primaryKey,
} from 'drizzle-orm/sqlite-core';
import type { SessionAggregates, DifficultyCounts } from '@/core/models';

const ALGORITHM_VALUES = ['SM2', 'ANKI', 'LEITNER', 'CUSTOM'] as const;
const DIFFICULTY_VALUES = ['AGAIN', 'HARD', 'GOOD', 'EASY'] as const;

/**
 * Memory Items Table
 *
 * Items are soft-deleted: `deleted_at` is set and the row stays so history
 * and archived schedules keep pointing at something.
 */
export const memoryItems = sqliteTable('memory_items', {
  id: text('id').primaryKey(),

  content: text('content').notNull(),

  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

  // Null while the item is live
  deletedAt: integer('deleted_at', { mode: 'timestamp_ms' }),
});

/**
 * Review Schedules Table
 *
 * Exactly one row per (item, user). The MemoryStrength is stored flat, one
 * column per field. `version` is bumped on every write and checked by
 * optimistic commits.
 *
 * Status values:
 * - 'active': participates in due-item queries
 * - 'archived': owning item was deleted
 */
export const reviewSchedules = sqliteTable(
  'review_schedules',
  {
    itemId: text('item_id').notNull(),
    userId: text('user_id').notNull(),

    algorithm: text('algorithm', { enum: ALGORITHM_VALUES }).notNull(),
    status: text('status', { enum: ['active', 'archived'] }).notNull().default('active'),
    version: integer('version').notNull(),

    scheduledDate: integer('scheduled_date', { mode: 'timestamp_ms' }).notNull(),
    earliestDate: integer('earliest_date', { mode: 'timestamp_ms' }).notNull(),
    latestDate: integer('latest_date', { mode: 'timestamp_ms' }).notNull(),

    // Embedded MemoryStrength
    easeFactor: real('ease_factor').notNull(),
    intervalDays: integer('interval_days').notNull(),
    repetitions: integer('repetitions').notNull(),
    retentionRate: real('retention_rate').notNull(),
    stability: real('stability').notNull(),
    lastReview: integer('last_review', { mode: 'timestamp_ms' }),
    lapses: integer('lapses').notNull(),
    consecutiveFailures: integer('consecutive_failures').notNull(),
    learningStep: integer('learning_step'),
    leitnerBox: integer('leitner_box').notNull(),
    isLeech: integer('is_leech', { mode: 'boolean' }).notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.itemId, table.userId] }),
    index('review_schedules_due_idx').on(table.userId, table.status, table.scheduledDate),
  ]
);

/**
 * Review History Table
 *
 * Append-only. Inserting an id that already exists is ignored.
 */
export const reviewHistory = sqliteTable(
  'review_history',
  {
    id: text('id').primaryKey(),
    itemId: text('item_id').notNull(),
    userId: text('user_id').notNull(),
    sessionId: text('session_id'),
    difficulty: text('difficulty', { enum: DIFFICULTY_VALUES }).notNull(),
    algorithm: text('algorithm', { enum: ALGORITHM_VALUES }).notNull(),
    timeTakenSeconds: real('time_taken_seconds'),
    confidence: real('confidence'),
    intervalDaysBefore: integer('interval_days_before').notNull(),
    intervalDaysAfter: integer('interval_days_after').notNull(),
    reviewedAt: integer('reviewed_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    index('review_history_user_time_idx').on(table.userId, table.reviewedAt),
    index('review_history_item_user_time_idx').on(table.itemId, table.userId, table.reviewedAt),
  ]
);

/**
 * Summary as stored in JSON: timestamps as epoch milliseconds.
 */
export interface DbSessionSummary {
  sessionId: string;
  userId: string;
  totalReviewed: number;
  uniqueItems: number;
  successCount: number;
  accuracyRate: number;
  averageConfidence: number | null;
  averageTimeSeconds: number | null;
  difficultyDistribution: DifficultyCounts;
  bestStreak: number;
  startedAt: number;
  endedAt: number;
  durationSeconds: number;
}

/**
 * Review Sessions Table
 *
 * Aggregates and the frozen summary are stored as JSON.
 */
export const reviewSessions = sqliteTable(
  'review_sessions',
  {
    id: text('id').primaryKey(),
    userId: text('user_id').notNull(),
    algorithm: text('algorithm', { enum: ALGORITHM_VALUES }).notNull(),
    status: text('status', { enum: ['active', 'ended'] }).notNull(),
    startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
    endedAt: integer('ended_at', { mode: 'timestamp_ms' }),
    itemsReviewed: text('items_reviewed', { mode: 'json' }).$type<string[]>().notNull(),
    aggregates: text('aggregates', { mode: 'json' }).$type<SessionAggregates>().notNull(),
    summary: text('summary', { mode: 'json' }).$type<DbSessionSummary>(),
    version: integer('version').notNull(),
  },
  (table) => [index('review_sessions_user_idx').on(table.userId)]
);
