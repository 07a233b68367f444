/**
 * `session` command: bounded review runs with aggregates.
 *
 * ```bash
 * review-engine session start --user u1 --algorithm ANKI
 * review-engine session record rsess_... mem_atp GOOD --confidence 0.9
 * review-engine session end rsess_...
 * ```
 */

import { Command } from 'commander';
import { parseDifficulty } from '../../core/algorithms';
import { parseAlgorithm } from '../../core/scheduling';
import { parseNumberOption } from '../utils/options';
import { formatJson } from '../utils/terminal';
import type { CliContext } from '../context';

interface StartOptions {
  user: string;
  algorithm?: string;
}

interface RecordOptions {
  algorithm?: string;
  time?: number;
  confidence?: number;
}

export function createSessionCommand(context: CliContext): Command {
  const session = new Command('session').description('Run review sessions');

  session
    .command('start')
    .description('Start a session and print it')
    .requiredOption('-u, --user <id>', 'User id')
    .option('-a, --algorithm <name>', 'Algorithm for items without a schedule')
    .action(async (options: StartOptions) => {
      const started = await context.runtime().engine.sessions.startSession(options.user, {
        algorithm: options.algorithm === undefined ? undefined : parseAlgorithm(options.algorithm.toUpperCase()),
      });
      context.write(formatJson(started));
    });

  session
    .command('record <session-id> <item-id> <difficulty>')
    .description('Record a review inside a session')
    .option('-a, --algorithm <name>', 'Algorithm override for this review')
    .option('--time <seconds>', 'Time taken in seconds', parseNumberOption)
    .option('--confidence <value>', 'Self-reported confidence between 0 and 1', parseNumberOption)
    .action(async (sessionId: string, itemId: string, difficulty: string, options: RecordOptions) => {
      const schedule = await context.runtime().engine.sessions.recordReview(sessionId, {
        itemId,
        difficulty: parseDifficulty(difficulty.toUpperCase()),
        algorithm: options.algorithm === undefined ? undefined : parseAlgorithm(options.algorithm.toUpperCase()),
        timeTakenSeconds: options.time,
        confidence: options.confidence,
      });
      context.write(formatJson(schedule));
    });

  session
    .command('end <session-id>')
    .description('End a session and print its summary')
    .action(async (sessionId: string) => {
      context.write(formatJson(await context.runtime().engine.sessions.endSession(sessionId)));
    });

  session
    .command('show <session-id>')
    .description('Print a session with its running aggregates')
    .action(async (sessionId: string) => {
      context.write(formatJson(await context.runtime().engine.sessions.getSession(sessionId)));
    });

  return session;
}
