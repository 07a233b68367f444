/**
 * Test Helpers Module
 *
 * In-process stand-ins for the engine's stores, with optional artificial
 * latency (to force interleavings) and scripted failures (to exercise
 * retries), plus date and clock utilities.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import {
  ConcurrentModificationError,
  SessionClosedError,
  SessionNotFoundError,
} from '../src/core/errors';
import type { Logger } from '../src/core/logging';
import type { RetryPolicy } from '../src/core/scheduling';
import type {
  ContentStore,
  HistoryQuery,
  HistoryStore,
  ScheduleStore,
  SessionStore,
  SessionUpdate,
} from '../src/core/stores';
import type {
  MemoryStrength,
  ReviewHistoryRecord,
  ReviewSession,
  StoredReviewSchedule,
} from '../src/core/models';

// ============================================================================
// Date Utilities
// ============================================================================

/**
 * UTC date from calendar parts; month is 1-based.
 */
export function utc(year: number, month: number, day: number, hour = 0, minute = 0): Date {
  return new Date(Date.UTC(year, month - 1, day, hour, minute));
}

/**
 * Mutable clock for injecting "now".
 */
export class TestClock {
  constructor(private current: Date) {}

  readonly now = (): Date => new Date(this.current.getTime());

  set(date: Date): void {
    this.current = date;
  }

  advanceDays(days: number): void {
    this.current = new Date(this.current.getTime() + days * 24 * 60 * 60 * 1000);
  }
}

/** Retry policy without delays, for fast tests */
export const NO_DELAY_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

// ============================================================================
// Scripted Store Behaviour
// ============================================================================

/**
 * Latency and queued failures shared by the fake stores.
 */
export class StoreScript {
  /** Delay applied before every store call */
  latencyMs = 0;

  private readonly failures = new Map<string, unknown[]>();
  private readonly counts = new Map<string, number>();

  /** Queue errors thrown by the next calls of `operation`, one per call */
  failNext(operation: string, ...errors: unknown[]): void {
    this.failures.set(operation, [...(this.failures.get(operation) ?? []), ...errors]);
  }

  calls(operation: string): number {
    return this.counts.get(operation) ?? 0;
  }

  async step(operation: string): Promise<void> {
    this.counts.set(operation, this.calls(operation) + 1);
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
    const queued = this.failures.get(operation);
    if (queued !== undefined && queued.length > 0) {
      throw queued.shift();
    }
  }
}

// ============================================================================
// In-Memory Stores
// ============================================================================

function scheduleKey(itemId: string, userId: string): string {
  return `${itemId}\u0000${userId}`;
}

export class InMemoryHistoryStore implements HistoryStore {
  readonly records: ReviewHistoryRecord[] = [];

  constructor(readonly script: StoreScript = new StoreScript()) {}

  async appendHistory(record: ReviewHistoryRecord): Promise<void> {
    await this.script.step('appendHistory');
    this.append(record);
  }

  /** Synchronous append used inside the schedule store's commit */
  append(record: ReviewHistoryRecord): void {
    if (!this.records.some((existing) => existing.id === record.id)) {
      this.records.push(structuredClone(record));
    }
  }

  async findHistory(query: HistoryQuery): Promise<ReviewHistoryRecord[]> {
    await this.script.step('findHistory');
    return this.records
      .filter(
        (record) =>
          record.userId === query.userId &&
          (query.itemId === undefined || record.itemId === query.itemId) &&
          (query.from === undefined || record.reviewedAt.getTime() >= query.from.getTime()) &&
          (query.to === undefined || record.reviewedAt.getTime() <= query.to.getTime())
      )
      .sort((a, b) => a.reviewedAt.getTime() - b.reviewedAt.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((record) => structuredClone(record));
  }
}

export class InMemoryScheduleStore implements ScheduleStore {
  readonly rows = new Map<string, StoredReviewSchedule>();

  constructor(
    readonly history: InMemoryHistoryStore = new InMemoryHistoryStore(),
    readonly script: StoreScript = history.script,
    readonly sessions: InMemorySessionStore | null = null
  ) {}

  async getStrength(itemId: string, userId: string): Promise<MemoryStrength | null> {
    const schedule = await this.getSchedule(itemId, userId);
    return schedule?.status === 'active' ? schedule.strength : null;
  }

  async getSchedule(itemId: string, userId: string): Promise<StoredReviewSchedule | null> {
    await this.script.step('getSchedule');
    const row = this.rows.get(scheduleKey(itemId, userId));
    return row === undefined ? null : structuredClone(row);
  }

  async putSchedule(schedule: StoredReviewSchedule, expectedVersion: number | null): Promise<StoredReviewSchedule> {
    await this.script.step('putSchedule');
    return this.write(schedule, expectedVersion);
  }

  async commitReview(
    schedule: StoredReviewSchedule,
    expectedVersion: number | null,
    record: ReviewHistoryRecord,
    updateSession?: SessionUpdate
  ): Promise<StoredReviewSchedule> {
    await this.script.step('commitReview');
    // Everything below runs without yielding, so it commits as one unit
    let nextSession: ReviewSession | null = null;
    if (updateSession !== undefined && record.sessionId !== null) {
      if (this.sessions === null) {
        throw new Error('InMemoryScheduleStore was created without a session store');
      }
      nextSession = this.sessions.prepareUpdate(record.sessionId, updateSession);
    }
    const written = this.write(schedule, expectedVersion);
    this.history.append(record);
    if (nextSession !== null && this.sessions !== null) {
      this.sessions.put(nextSession);
    }
    return written;
  }

  async findDueSchedules(userId: string, asOf: Date): Promise<StoredReviewSchedule[]> {
    await this.script.step('findDueSchedules');
    return [...this.rows.values()]
      .filter(
        (row) => row.userId === userId && row.status === 'active' && row.scheduledDate.getTime() <= asOf.getTime()
      )
      .map((row) => structuredClone(row));
  }

  async archiveItemSchedules(itemId: string, archivedAt: Date): Promise<number> {
    await this.script.step('archiveItemSchedules');
    let archived = 0;
    for (const [key, row] of this.rows) {
      if (row.itemId === itemId && row.status === 'active') {
        this.rows.set(key, { ...row, status: 'archived', version: row.version + 1, updatedAt: archivedAt });
        archived += 1;
      }
    }
    return archived;
  }

  /** Seeds a row directly, bypassing version checks */
  seed(schedule: StoredReviewSchedule): void {
    this.rows.set(scheduleKey(schedule.itemId, schedule.userId), structuredClone(schedule));
  }

  private write(schedule: StoredReviewSchedule, expectedVersion: number | null): StoredReviewSchedule {
    const key = scheduleKey(schedule.itemId, schedule.userId);
    const storedVersion = this.rows.get(key)?.version ?? null;
    if (storedVersion !== expectedVersion) {
      throw new ConcurrentModificationError(`Schedule for item '${schedule.itemId}'`, expectedVersion ?? 0, {
        itemId: schedule.itemId,
        userId: schedule.userId,
      });
    }
    const written: StoredReviewSchedule = {
      itemId: schedule.itemId,
      userId: schedule.userId,
      scheduledDate: schedule.scheduledDate,
      algorithm: schedule.algorithm,
      strength: schedule.strength,
      status: schedule.status,
      version: (expectedVersion ?? 0) + 1,
      earliestDate: schedule.earliestDate,
      latestDate: schedule.latestDate,
      createdAt: schedule.createdAt,
      updatedAt: schedule.updatedAt,
    };
    this.rows.set(key, structuredClone(written));
    return structuredClone(written);
  }
}

export class InMemoryContentStore implements ContentStore {
  private readonly items = new Set<string>();

  constructor(...itemIds: string[]) {
    this.add(...itemIds);
  }

  add(...itemIds: string[]): void {
    for (const id of itemIds) this.items.add(id);
  }

  remove(itemId: string): void {
    this.items.delete(itemId);
  }

  async itemExists(itemId: string): Promise<boolean> {
    return this.items.has(itemId);
  }
}

export class InMemorySessionStore implements SessionStore {
  readonly sessions = new Map<string, ReviewSession>();

  constructor(readonly script: StoreScript = new StoreScript()) {}

  async create(session: ReviewSession): Promise<ReviewSession> {
    await this.script.step('createSession');
    const created: ReviewSession = { ...session, version: 1 };
    this.sessions.set(session.id, structuredClone(created));
    return structuredClone(created);
  }

  async findById(sessionId: string): Promise<ReviewSession | null> {
    await this.script.step('findSession');
    const session = this.sessions.get(sessionId);
    return session === undefined ? null : structuredClone(session);
  }

  async save(session: ReviewSession, expectedVersion: number): Promise<ReviewSession> {
    await this.script.step('saveSession');
    const stored = this.sessions.get(session.id);
    if (stored === undefined) {
      throw new SessionNotFoundError(session.id);
    }
    if (stored.version !== expectedVersion) {
      throw new ConcurrentModificationError(`Session '${session.id}'`, expectedVersion, { sessionId: session.id });
    }
    const written: ReviewSession = { ...session, version: expectedVersion + 1 };
    this.put(written);
    return structuredClone(written);
  }

  /** Applies a review's session update without writing it; used by the schedule store's commit */
  prepareUpdate(sessionId: string, update: SessionUpdate): ReviewSession {
    const stored = this.sessions.get(sessionId);
    if (stored === undefined) {
      throw new SessionNotFoundError(sessionId);
    }
    if (stored.status === 'ended') {
      throw new SessionClosedError(sessionId);
    }
    return { ...update(structuredClone(stored)), version: stored.version + 1 };
  }

  put(session: ReviewSession): void {
    this.sessions.set(session.id, structuredClone(session));
  }
}

/**
 * One set of fake stores sharing a failure script.
 */
export function createFakeStores(...itemIds: string[]) {
  const script = new StoreScript();
  const history = new InMemoryHistoryStore(script);
  const sessions = new InMemorySessionStore(script);
  return {
    script,
    history,
    schedules: new InMemoryScheduleStore(history, script, sessions),
    content: new InMemoryContentStore(...itemIds),
    sessions,
  };
}

// ============================================================================
// Logging
// ============================================================================

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  prefix: string;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Logger that keeps every entry in memory instead of printing.
 */
export function createRecordingLogger(prefix = 'test', entries: LogEntry[] = []): Logger & { entries: LogEntry[] } {
  const record =
    (level: LogEntry['level']) =>
    (message: string, context?: Record<string, unknown>): void => {
      entries.push({ level, prefix, message, context });
    };
  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: (childPrefix: string) => createRecordingLogger(childPrefix, entries),
  };
}
