/**
 * Scheduling commands: `review`, `due`, `schedule`, `reschedule`, `bulk`.
 *
 * ```bash
 * review-engine review mem_atp GOOD --user u1 --confidence 0.8
 * review-engine due --user u1 --limit 20
 * review-engine bulk mem_a mem_b mem_c --user u1 --algorithm LEITNER --distribute 3
 * ```
 */

import { Command } from 'commander';
import { parseDifficulty } from '../../core/algorithms';
import { parseAlgorithm } from '../../core/scheduling';
import { parseDateOption, parseIntegerOption, parseNumberOption } from '../utils/options';
import { formatJson } from '../utils/terminal';
import type { CliContext } from '../context';

interface ReviewOptions {
  user: string;
  algorithm?: string;
  session?: string;
  time?: number;
  confidence?: number;
  at?: Date;
}

interface DueOptions {
  user: string;
  limit?: number;
  asOf?: Date;
}

interface ScheduleOptions {
  user: string;
  algorithm: string;
  at?: Date;
}

interface RescheduleOptions {
  user: string;
  algorithm: string;
}

interface BulkOptions {
  user: string;
  algorithm: string;
  startOffset?: number;
  distribute?: number;
}

export function createReviewCommands(context: CliContext): Command[] {
  const review = new Command('review')
    .description('Record a review outcome (AGAIN, HARD, GOOD, EASY) and reschedule the item')
    .argument('<item-id>')
    .argument('<difficulty>')
    .requiredOption('-u, --user <id>', 'User id')
    .option('-a, --algorithm <name>', 'Algorithm (SM2, ANKI, LEITNER, CUSTOM)')
    .option('-s, --session <id>', 'Session to attribute the review to in history')
    .option('--time <seconds>', 'Time taken in seconds', parseNumberOption)
    .option('--confidence <value>', 'Self-reported confidence between 0 and 1', parseNumberOption)
    .option('--at <date>', 'Review time (defaults to now)', parseDateOption)
    .action(async (itemId: string, difficulty: string, options: ReviewOptions) => {
      const schedule = await context.runtime().engine.scheduler.scheduleReview({
        itemId,
        userId: options.user,
        difficulty: parseDifficulty(difficulty.toUpperCase()),
        algorithm: options.algorithm === undefined ? undefined : parseAlgorithm(options.algorithm.toUpperCase()),
        metadata: {
          sessionId: options.session,
          timeTakenSeconds: options.time,
          confidence: options.confidence,
        },
        reviewedAt: options.at,
      });
      context.write(formatJson(schedule));
    });

  const due = new Command('due')
    .description('List due items, highest priority first')
    .requiredOption('-u, --user <id>', 'User id')
    .option('-n, --limit <count>', 'Maximum items to return', parseIntegerOption)
    .option('--as-of <date>', 'Reference time (defaults to now)', parseDateOption)
    .action(async (options: DueOptions) => {
      const { scheduler } = context.runtime().engine;
      context.write(formatJson(await scheduler.getDueItems(options.user, options.asOf, options.limit)));
    });

  const schedule = new Command('schedule')
    .description('Create the first schedule for an item if it has none')
    .argument('<item-id>')
    .requiredOption('-u, --user <id>', 'User id')
    .requiredOption('-a, --algorithm <name>', 'Algorithm (SM2, ANKI, LEITNER, CUSTOM)')
    .option('--at <date>', 'First review date (defaults to now)', parseDateOption)
    .action(async (itemId: string, options: ScheduleOptions) => {
      const { engine } = context.runtime();
      const result = await engine.scheduler.createInitialSchedule({
        itemId,
        userId: options.user,
        algorithm: parseAlgorithm(options.algorithm.toUpperCase()),
        scheduledDate: options.at ?? new Date(),
      });
      context.write(formatJson(result));
    });

  const reschedule = new Command('reschedule')
    .description('Move an item to another algorithm, keeping its strength')
    .argument('<item-id>')
    .requiredOption('-u, --user <id>', 'User id')
    .requiredOption('-a, --algorithm <name>', 'Algorithm (SM2, ANKI, LEITNER, CUSTOM)')
    .action(async (itemId: string, options: RescheduleOptions) => {
      const { scheduler } = context.runtime().engine;
      const updated = await scheduler.reschedule(itemId, options.user, parseAlgorithm(options.algorithm.toUpperCase()));
      context.write(formatJson(updated));
    });

  const bulk = new Command('bulk')
    .description('Schedule many items at once; items that already have a schedule are skipped')
    .argument('<item-ids...>')
    .requiredOption('-u, --user <id>', 'User id')
    .requiredOption('-a, --algorithm <name>', 'Algorithm (SM2, ANKI, LEITNER, CUSTOM)')
    .option('--start-offset <days>', 'Days until the first review', parseIntegerOption)
    .option('--distribute <days>', 'Spread first reviews over this many days', parseIntegerOption)
    .action(async (itemIds: string[], options: BulkOptions) => {
      const { engine } = context.runtime();
      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);

      try {
        const result = await engine.bulk.bulkSchedule({
          itemIds,
          userId: options.user,
          algorithm: parseAlgorithm(options.algorithm.toUpperCase()),
          startOffsetDays: options.startOffset,
          distributeOverDays: options.distribute,
          signal: controller.signal,
        });
        context.write(formatJson(result));
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });

  const bestHour = new Command('best-hour')
    .description('UTC hour at which the user recalls best')
    .requiredOption('-u, --user <id>', 'User id')
    .action(async (options: { user: string }) => {
      const hour = await context.runtime().engine.scheduler.getOptimalReviewHour(options.user);
      context.write(formatJson({ userId: options.user, hour }));
    });

  return [review, due, schedule, reschedule, bulk, bestHour];
}
