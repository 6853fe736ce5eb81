import { Command } from 'commander';
import * as out from '../output.js';
import { normalizeTitle, parseSubTaskArg, resolveRowArg } from '../helpers.js';
import { run, type CliContext } from '../context.js';

export function createSubTaskCommand(ctx: CliContext): Command {
  const subCommand = new Command('sub')
    .description('Manage the sub-tasks of a task');

  subCommand.addCommand(
    new Command('add')
      .description('Append a sub-task')
      .argument('<row>', 'Row number of the parent task')
      .argument('<title>', 'Sub-task title')
      .action(async (row: string, rawTitle: string, _opts: unknown, cmd: Command) => {
        await run(ctx, cmd, () => {
          const index = resolveRowArg(ctx.store, row);
          const title = normalizeTitle(rawTitle);
          if (title === null) throw new Error('Please enter a sub-task description.');
          ctx.store.addSubTask(index, title);
          out.success(`Added sub-task "${title}"`);
        });
      }),
  );

  subCommand.addCommand(
    new Command('check')
      .description('Toggle a sub-task between pending and done')
      .argument('<row>', 'Row number of the parent task')
      .argument('<n>', 'Sub-task number')
      .action(async (row: string, n: string, _opts: unknown, cmd: Command) => {
        await run(ctx, cmd, () => {
          const index = resolveRowArg(ctx.store, row);
          if (!ctx.store.toggleSubTaskStatus(index, parseSubTaskArg(n))) {
            throw new Error(`Sub-task ${n} not found`);
          }
          out.success(`Toggled sub-task ${n}`);
        });
      }),
  );

  subCommand.addCommand(
    new Command('rm')
      .description('Remove a sub-task')
      .argument('<row>', 'Row number of the parent task')
      .argument('<n>', 'Sub-task number')
      .action(async (row: string, n: string, _opts: unknown, cmd: Command) => {
        await run(ctx, cmd, () => {
          const index = resolveRowArg(ctx.store, row);
          if (!ctx.store.removeSubTask(index, parseSubTaskArg(n))) {
            throw new Error(`Sub-task ${n} not found`);
          }
          out.success(`Removed sub-task ${n}`);
        });
      }),
  );

  return subCommand;
}
