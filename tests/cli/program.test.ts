/**
 * CLI Tests: review-engine command tree
 *
 * Commands run through createProgram against an in-memory database; the
 * JSON each command writes is captured and parsed.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createProgram } from '../../src/cli/program';
import { createCliContext, type CliRuntime } from '../../src/cli/context';
import { createReviewEngine, createSqliteStores } from '../../src/engine';
import { loadConfig } from '../../src/config';
import { applySchema, createDatabase } from '../../src/storage/db';
import { InvalidDifficultyError, SessionClosedError } from '../../src/core/errors';
import { createRecordingLogger, utc } from '../helpers';

const NOW = utc(2024, 4, 2, 10);

function openTestRuntime(): CliRuntime {
  const db = createDatabase(':memory:');
  applySchema(db);
  const stores = createSqliteStores(db);
  return {
    db,
    engine: createReviewEngine({
      stores,
      config: loadConfig({}),
      logger: createRecordingLogger('cli'),
      clock: () => NOW,
    }),
    items: stores.items,
  };
}

describe('review-engine CLI', () => {
  let outputs: string[];
  let context: ReturnType<typeof createCliContext>;

  async function run(...args: string[]): Promise<unknown> {
    await createProgram(context).parseAsync(args, { from: 'user' });
    return JSON.parse(outputs[outputs.length - 1]);
  }

  beforeEach(() => {
    outputs = [];
    context = createCliContext(openTestRuntime, (output) => outputs.push(output));
  });

  afterEach(() => {
    context.close();
  });

  it('adds, lists and deletes items', async () => {
    expect(await run('items', 'add', 'Largest', 'planet:', 'Jupiter', '--id', 'mem_jupiter')).toMatchObject({
      id: 'mem_jupiter',
      content: 'Largest planet: Jupiter',
      deletedAt: null,
    });

    const listed = await run('items', 'list');
    expect(listed).toEqual([expect.objectContaining({ id: 'mem_jupiter' })]);

    await run('review', 'mem_jupiter', 'good', '--user', 'u1', '--at', '2024-04-01T09:00:00Z');
    expect(await run('items', 'delete', 'mem_jupiter')).toEqual({ itemId: 'mem_jupiter', archivedSchedules: 1 });
    expect(await run('items', 'list')).toEqual([]);
  });

  it('records a review with lower-case input and prints the schedule', async () => {
    await run('items', 'add', 'Water boils at 100 C', '--id', 'mem_water');

    const schedule = await run(
      'review', 'mem_water', 'easy',
      '--user', 'u1',
      '--algorithm', 'leitner',
      '--confidence', '0.9',
      '--at', '2024-04-01T09:00:00Z'
    );

    expect(schedule).toMatchObject({
      itemId: 'mem_water',
      userId: 'u1',
      algorithm: 'LEITNER',
      scheduledDate: '2024-04-03T09:00:00.000Z',
    });
  });

  it('lists due items as of a date with a limit', async () => {
    await run('items', 'add', 'a', '--id', 'mem_a');
    await run('items', 'add', 'b', '--id', 'mem_b');
    await run('bulk', 'mem_a', 'mem_b', '--user', 'u1', '--algorithm', 'SM2', '--distribute', '2');

    const dueNow = await run('due', '--user', 'u1');
    expect(dueNow).toEqual([expect.objectContaining({ itemId: 'mem_a' })]);

    const dueLater = await run('due', '--user', 'u1', '--as-of', '2024-04-05T00:00:00Z', '--limit', '1');
    expect(dueLater).toHaveLength(1);
  });

  it('creates a first schedule once and switches its algorithm', async () => {
    await run('items', 'add', 'c', '--id', 'mem_c');

    expect(await run('schedule', 'mem_c', '--user', 'u1', '--algorithm', 'anki', '--at', '2024-04-03T08:00:00Z')).toMatchObject({
      created: true,
      schedule: { algorithm: 'ANKI', scheduledDate: '2024-04-03T08:00:00.000Z' },
    });
    expect(await run('schedule', 'mem_c', '--user', 'u1', '--algorithm', 'SM2')).toMatchObject({
      created: false,
      schedule: { algorithm: 'ANKI' },
    });
    expect(await run('reschedule', 'mem_c', '--user', 'u1', '--algorithm', 'custom')).toMatchObject({
      algorithm: 'CUSTOM',
      scheduledDate: '2024-04-03T08:00:00.000Z',
    });
  });

  it('runs a session and refuses reviews after it ends', async () => {
    await run('items', 'add', 'd', '--id', 'mem_d');

    const session = await run('session', 'start', '--user', 'u1', '--algorithm', 'anki');
    expect(session).toMatchObject({ userId: 'u1', algorithm: 'ANKI', status: 'active' });
    const sessionId = typeof session === 'object' && session !== null && 'id' in session ? String(session.id) : '';

    await run('session', 'record', sessionId, 'mem_d', 'GOOD', '--time', '4');
    expect(await run('session', 'end', sessionId)).toMatchObject({
      sessionId,
      totalReviewed: 1,
      averageTimeSeconds: 4,
      durationSeconds: 0,
    });

    await expect(
      createProgram(context).parseAsync(['session', 'record', sessionId, 'mem_d', 'GOOD'], { from: 'user' })
    ).rejects.toBeInstanceOf(SessionClosedError);
  });

  it('reports statistics for a window and the best hour', async () => {
    await run('items', 'add', 'e', '--id', 'mem_e');
    await run('review', 'mem_e', 'GOOD', '--user', 'u1', '--at', '2024-04-02T07:30:00Z');

    expect(await run('stats', '--user', 'u1', '--window', 'today')).toMatchObject({
      window: { from: '2024-04-02T00:00:00.000Z', to: '2024-04-02T10:00:00.000Z' },
      reviewedCount: 1,
      streakDays: 1,
    });
    expect(await run('stats', '--user', 'u1', '--from', '2024-04-03T00:00:00Z', '--to', '2024-04-04T00:00:00Z')).toMatchObject({
      reviewedCount: 0,
    });
    expect(await run('best-hour', '--user', 'u1')).toEqual({ userId: 'u1', hour: 7 });
  });

  it('rejects an unknown difficulty', async () => {
    await run('items', 'add', 'f', '--id', 'mem_f');

    await expect(
      createProgram(context).parseAsync(['review', 'mem_f', 'meh', '--user', 'u1'], { from: 'user' })
    ).rejects.toBeInstanceOf(InvalidDifficultyError);
  });

  it('applies the schema through migrate', async () => {
    expect(await run('migrate')).toEqual({
      tables: ['memory_items', 'review_history', 'review_schedules', 'review_sessions'],
    });
  });
});
