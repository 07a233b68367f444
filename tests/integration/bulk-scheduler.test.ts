/**
 * Integration Tests: Bulk Scheduler
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ReviewScheduler } from '../../src/core/scheduling';
import { BulkScheduler } from '../../src/core/bulk';
import { ReviewEventBus } from '../../src/core/events';
import { InvalidStateError, TransientStoreError } from '../../src/core/errors';
import { NO_DELAY_RETRY, TestClock, createFakeStores, createRecordingLogger, utc } from '../helpers';

const START = utc(2024, 3, 1, 9);

function createHarness(concurrency = 4) {
  const stores = createFakeStores('mem_1', 'mem_2', 'mem_3', 'mem_4', 'mem_5');
  const clock = new TestClock(START);
  const logger = createRecordingLogger('BulkScheduler');
  const events = new ReviewEventBus(logger);
  const scheduler = new ReviewScheduler(
    { schedules: stores.schedules, history: stores.history, content: stores.content, events, logger, clock: clock.now },
    { retry: NO_DELAY_RETRY }
  );
  const bulk = new BulkScheduler({ scheduler, logger, clock: clock.now }, { concurrency });
  return { stores, logger, events, scheduler, bulk };
}

describe('BulkScheduler', () => {
  let h: ReturnType<typeof createHarness>;

  beforeEach(() => {
    h = createHarness();
  });

  it('schedules every item due immediately by default', async () => {
    const result = await h.bulk.bulkSchedule({ itemIds: ['mem_1', 'mem_2'], userId: 'u1', algorithm: 'SM2' });

    expect(result.scheduled.map((schedule) => schedule.itemId)).toEqual(['mem_1', 'mem_2']);
    expect(result.scheduled.map((schedule) => schedule.scheduledDate)).toEqual([START, START]);
    expect(result.cancelled).toBe(false);
    expect(h.stores.schedules.rows.size).toBe(2);
  });

  it('spreads items over days after the start offset', async () => {
    const result = await h.bulk.bulkSchedule({
      itemIds: ['mem_1', 'mem_2', 'mem_3', 'mem_4', 'mem_5'],
      userId: 'u1',
      algorithm: 'LEITNER',
      startOffsetDays: 2,
      distributeOverDays: 3,
    });

    expect(result.scheduled.map((schedule) => schedule.scheduledDate)).toEqual([
      utc(2024, 3, 3, 9),
      utc(2024, 3, 4, 9),
      utc(2024, 3, 5, 9),
      utc(2024, 3, 3, 9),
      utc(2024, 3, 4, 9),
    ]);
    expect(result.scheduled.every((schedule) => schedule.algorithm === 'LEITNER')).toBe(true);
  });

  it('uses the given initial strength', async () => {
    const result = await h.bulk.bulkSchedule({
      itemIds: ['mem_1'],
      userId: 'u1',
      algorithm: 'SM2',
      initialStrength: { easeFactor: 2.1, intervalDays: 5, repetitions: 2 },
    });

    expect(result.scheduled[0].strength).toMatchObject({ easeFactor: 2.1, intervalDays: 5, repetitions: 2 });
  });

  it('reports failures per item and carries on', async () => {
    const result = await h.bulk.bulkSchedule({
      itemIds: ['mem_1', 'mem_missing', 'mem_2'],
      userId: 'u1',
      algorithm: 'SM2',
    });

    expect(result.scheduled.map((schedule) => schedule.itemId)).toEqual(['mem_1', 'mem_2']);
    expect(result.failed).toEqual([
      { itemId: 'mem_missing', code: 'ITEM_NOT_FOUND', message: "Item with ID 'mem_missing' not found" },
    ]);
    expect(h.logger.entries).toContainEqual({
      level: 'warn',
      prefix: 'BulkScheduler',
      message: "Item 'mem_missing' failed: ITEM_NOT_FOUND",
      context: { message: "Item with ID 'mem_missing' not found" },
    });
  });

  it('skips items that already have an active schedule', async () => {
    await h.scheduler.scheduleReview({ itemId: 'mem_2', userId: 'u1', difficulty: 'GOOD' });
    const before = h.stores.schedules.rows.get('mem_2\u0000u1');

    const result = await h.bulk.bulkSchedule({ itemIds: ['mem_1', 'mem_2'], userId: 'u1', algorithm: 'LEITNER' });

    expect(result.skipped).toEqual(['mem_2']);
    expect(result.scheduled.map((schedule) => schedule.itemId)).toEqual(['mem_1']);
    expect(h.stores.schedules.rows.get('mem_2\u0000u1')).toEqual(before);
  });

  it('retries transient failures inside one item', async () => {
    h.stores.script.failNext('putSchedule', new TransientStoreError('database is locked'));

    const result = await h.bulk.bulkSchedule({ itemIds: ['mem_1'], userId: 'u1', algorithm: 'SM2' });

    expect(result.scheduled).toHaveLength(1);
    expect(h.stores.script.calls('putSchedule')).toBe(2);
  });

  it('processes nothing when cancelled before starting', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await h.bulk.bulkSchedule({
      itemIds: ['mem_1', 'mem_2', 'mem_3'],
      userId: 'u1',
      algorithm: 'SM2',
      signal: controller.signal,
    });

    expect(result).toEqual({
      scheduled: [],
      skipped: [],
      failed: [],
      notProcessed: ['mem_1', 'mem_2', 'mem_3'],
      cancelled: true,
    });
    expect(h.stores.schedules.rows.size).toBe(0);
  });

  it('keeps finished items when cancelled midway', async () => {
    h = createHarness(1);
    const controller = new AbortController();
    h.events.on('review.scheduled', () => controller.abort());

    const result = await h.bulk.bulkSchedule({
      itemIds: ['mem_1', 'mem_2', 'mem_3'],
      userId: 'u1',
      algorithm: 'SM2',
      signal: controller.signal,
    });

    expect(result.scheduled.map((schedule) => schedule.itemId)).toEqual(['mem_1']);
    expect(result.notProcessed).toEqual(['mem_2', 'mem_3']);
    expect(result.cancelled).toBe(true);
  });

  it('rejects malformed requests before touching any item', async () => {
    await expect(
      h.bulk.bulkSchedule({ itemIds: ['mem_1'], userId: 'u1', algorithm: 'SM2', initialStrength: { stability: 0 } })
    ).rejects.toBeInstanceOf(InvalidStateError);
    await expect(
      h.bulk.bulkSchedule({ itemIds: ['mem_1'], userId: 'u1', algorithm: 'SM2', startOffsetDays: -1 })
    ).rejects.toBeInstanceOf(InvalidStateError);
    await expect(
      h.bulk.bulkSchedule({ itemIds: ['mem_1'], userId: 'u1', algorithm: 'SM2', distributeOverDays: 0 })
    ).rejects.toBeInstanceOf(InvalidStateError);

    expect(h.stores.schedules.rows.size).toBe(0);
  });

  it('rejects an initial interval beyond the configured ceiling', async () => {
    const { scheduler, stores } = createHarness();
    const bulk = new BulkScheduler({ scheduler }, { maxIntervalDays: 365 });

    await expect(
      bulk.bulkSchedule({ itemIds: ['mem_1'], userId: 'u1', algorithm: 'SM2', initialStrength: { intervalDays: 1e9 } })
    ).rejects.toBeInstanceOf(InvalidStateError);
    await expect(
      bulk.bulkSchedule({ itemIds: ['mem_1'], userId: 'u1', algorithm: 'SM2', initialStrength: { intervalDays: 366 } })
    ).rejects.toThrow('intervalDays must not exceed 365, received 366');

    expect(stores.schedules.rows.size).toBe(0);
  });

  it('requires a positive concurrency', () => {
    const { scheduler } = createHarness();
    expect(() => new BulkScheduler({ scheduler }, { concurrency: 0 })).toThrow(InvalidStateError);
  });

  it('returns an empty result for no items', async () => {
    const result = await h.bulk.bulkSchedule({ itemIds: [], userId: 'u1', algorithm: 'SM2' });

    expect(result).toEqual({ scheduled: [], skipped: [], failed: [], notProcessed: [], cancelled: false });
  });
});
