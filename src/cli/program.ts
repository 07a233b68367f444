/**
 * Command tree for the `review-engine` CLI.
 *
 * Built over a CliContext so tests can run commands against an in-memory
 * database and capture the output.
 */

import { Command } from 'commander';
import { createItemsCommand } from './commands/items';
import { createMigrateCommand } from './commands/migrate';
import { createReviewCommands } from './commands/review';
import { createSessionCommand } from './commands/session';
import { createStatsCommand } from './commands/stats';
import type { CliContext } from './context';

export function createProgram(context: CliContext): Command {
  const program = new Command('review-engine')
    .description('Spaced-repetition scheduling engine')
    .version('0.1.0');

  program.addCommand(createMigrateCommand(context));
  program.addCommand(createItemsCommand(context));
  for (const command of createReviewCommands(context)) {
    program.addCommand(command);
  }
  program.addCommand(createSessionCommand(context));
  program.addCommand(createStatsCommand(context));

  return program;
}
