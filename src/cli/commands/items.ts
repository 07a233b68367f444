/**
 * `items` command: manage the content the engine schedules.
 *
 * ```bash
 * review-engine items add "Mitochondria produce ATP" --id mem_atp
 * review-engine items list
 * review-engine items delete mem_atp
 * ```
 *
 * Deleting an item soft-deletes it and archives every schedule that
 * points at it.
 */

import { Command } from 'commander';
import { formatJson } from '../utils/terminal';
import type { CliContext } from '../context';

interface AddOptions {
  id?: string;
}

export function createItemsCommand(context: CliContext): Command {
  const items = new Command('items').description('Manage memory items');

  items
    .command('add <content...>')
    .description('Add an item; words are joined with spaces')
    .option('--id <id>', 'Item id (generated when omitted)')
    .action(async (words: string[], options: AddOptions) => {
      const item = await context.runtime().items.create({ id: options.id, content: words.join(' ') });
      context.write(formatJson(item));
    });

  items
    .command('list')
    .description('List items that have not been deleted')
    .action(async () => {
      context.write(formatJson(await context.runtime().items.findAll()));
    });

  items
    .command('delete <item-id>')
    .description('Delete an item and archive its schedules')
    .action(async (itemId: string) => {
      const { items: repository, engine } = context.runtime();
      await repository.delete(itemId);
      const archivedSchedules = await engine.scheduler.archiveItem(itemId);
      context.write(formatJson({ itemId, archivedSchedules }));
    });

  return items;
}
