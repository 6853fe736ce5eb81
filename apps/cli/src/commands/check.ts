import { Command } from 'commander';
import * as out from '../output.js';
import { resolveRowArg } from '../helpers.js';
import { run, type CliContext } from '../context.js';

export function createCheckCommand(ctx: CliContext): Command {
  return new Command('check')
    .description('Toggle a task between pending and done')
    .argument('<row>', 'Row number in the visible list')
    .action(async (row: string, _opts: unknown, cmd: Command) => {
      await run(ctx, cmd, () => {
        const { store } = ctx;
        const index = resolveRowArg(store, row);
        store.toggleTaskStatus(index);
        const task = store.getSnapshot()[index];
        if (task) {
          out.success(task.isDone ? `Completed "${task.title}"` : `Reopened "${task.title}"`);
        }
      });
    });
}
