/**
 * `migrate` command: apply the schema and list the tables.
 */

import { Command } from 'commander';
import { migrate } from '../../storage/migrate';
import { formatJson } from '../utils/terminal';
import type { CliContext } from '../context';

export function createMigrateCommand(context: CliContext): Command {
  return new Command('migrate')
    .description('Create missing tables and indexes')
    .action(() => {
      const tables = migrate(context.runtime().db);
      context.write(formatJson({ tables }));
    });
}
