import { Command } from 'commander';
import { ListReconciler } from '@protask/core';
import * as out from '../output.js';
import { normalizeTitle, parsePriorityArg } from '../helpers.js';
import { run, type CliContext } from '../context.js';

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task to the top of the list')
    .argument('<title>', 'Task title')
    .option('-p, --priority <level>', 'low, medium or high', 'medium')
    .action(async (rawTitle: string, opts: { priority: string }, cmd: Command) => {
      await run(ctx, cmd, () => {
        const title = normalizeTitle(rawTitle);
        if (title === null) throw new Error('Please enter a task description.');
        const priority = parsePriorityArg(opts.priority);
        if (priority === null) throw new Error(`Unknown priority '${opts.priority}'. Use low, medium or high.`);

        // Report where the new row really lands under the current view
        let insertedAt = -1;
        const reconciler = new ListReconciler(ctx.store, {
          insertItem: (index) => { insertedAt = index; },
          removeItem: () => {},
        });
        const task = ctx.store.addTask(title, priority);
        reconciler.dispose();

        const label = `"${out.truncate(task.title, 50)}"`;
        if (insertedAt === -1) {
          out.success(`Added ${label} (hidden by the current view)`);
        } else {
          out.success(`Added ${label} at row ${insertedAt + 1}`);
        }
      });
    });
}
