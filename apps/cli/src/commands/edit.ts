import { Command } from 'commander';
import * as out from '../output.js';
import { normalizeTitle, parsePriorityArg, resolveRowArg } from '../helpers.js';
import { run, type CliContext } from '../context.js';

export function createEditCommand(ctx: CliContext): Command {
  return new Command('edit')
    .description('Change the title and optionally the priority of a task')
    .argument('<row>', 'Row number in the visible list')
    .argument('<title>', 'New title')
    .option('-p, --priority <level>', 'low, medium or high (unchanged when omitted)')
    .action(async (row: string, rawTitle: string, opts: { priority?: string }, cmd: Command) => {
      await run(ctx, cmd, () => {
        const { store } = ctx;
        const index = resolveRowArg(store, row);
        const current = store.getSnapshot()[index];
        if (!current) throw new Error(`Row ${row} not found`);

        const title = normalizeTitle(rawTitle);
        if (title === null) throw new Error('Please enter a task description.');

        let priority = current.priority;
        if (opts.priority !== undefined) {
          const parsed = parsePriorityArg(opts.priority);
          if (parsed === null) throw new Error(`Unknown priority '${opts.priority}'. Use low, medium or high.`);
          priority = parsed;
        }

        store.updateTask(index, title, priority);
        out.success(`Updated row ${row}`);
      });
    });
}
