import { Command } from 'commander';
import { FilterType } from '@protask/core';
import * as out from '../output.js';
import { run, type CliContext } from '../context.js';

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('Show the visible task list')
    .option('--no-subtasks', 'Hide sub-tasks')
    .action(async (opts: { subtasks: boolean }, cmd: Command) => {
      await run(ctx, cmd, () => {
        const { store } = ctx;
        const visible = store.getVisibleTasks();

        if (store.size === 0) {
          out.info('Your task list is empty!');
          out.info('Add one with: protask add "title"');
          return;
        }
        if (visible.length === 0) {
          out.info(store.searchQuery ? `No tasks match '${store.searchQuery}'.` : 'No tasks match the current filter.');
          return;
        }

        out.printTasks(visible, opts.subtasks);
        if (store.filter !== FilterType.All || store.searchQuery) {
          out.info(`\n${visible.length} of ${store.size} task(s) shown`);
        }
      });
    });
}
