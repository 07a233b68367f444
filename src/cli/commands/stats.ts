/**
 * `stats` command: learning statistics for a user.
 *
 * ```bash
 * review-engine stats --user u1 --window week
 * review-engine stats --user u1 --from 2024-03-01 --to 2024-03-31
 * ```
 *
 * An explicit --from or --to takes precedence over --window.
 */

import { Command, Option } from 'commander';
import type { StatisticsPreset, StatisticsWindow } from '../../core/analytics';
import { parseDateOption } from '../utils/options';
import { formatJson } from '../utils/terminal';
import type { CliContext } from '../context';

const PRESETS: readonly StatisticsPreset[] = ['today', 'week', 'month', 'all_time'];

interface StatsOptions {
  user: string;
  window: string;
  from?: Date;
  to?: Date;
  asOf?: Date;
}

function isPreset(value: string): value is StatisticsPreset {
  return PRESETS.some((preset) => preset === value);
}

export function createStatsCommand(context: CliContext): Command {
  return new Command('stats')
    .description('Show learning statistics')
    .requiredOption('-u, --user <id>', 'User id')
    .addOption(
      new Option('-w, --window <name>', 'Preset window').choices(PRESETS).default('all_time')
    )
    .option('--from <date>', 'Window start (inclusive)', parseDateOption)
    .option('--to <date>', 'Window end (inclusive)', parseDateOption)
    .option('--as-of <date>', 'Reference time (defaults to now)', parseDateOption)
    .action(async (options: StatsOptions) => {
      let window: StatisticsWindow = isPreset(options.window) ? options.window : 'all_time';
      if (options.from !== undefined || options.to !== undefined) {
        window = { from: options.from, to: options.to };
      }
      const statistics = await context.runtime().engine.statistics.getStatistics(options.user, window, options.asOf);
      context.write(formatJson(statistics));
    });
}
