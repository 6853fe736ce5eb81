import { Command } from 'commander';
import {
  LAST_DELETED_SLOT, encodeDeletionRecord, decodeDeletionRecord, createLogger,
} from '@protask/core';
import * as out from '../output.js';
import { resolveRowArg } from '../helpers.js';
import { run, type CliContext } from '../context.js';

const log = createLogger('cli');

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Delete a task (restore it with undo)')
    .argument('<row>', 'Row number in the visible list')
    .action(async (row: string, _opts: unknown, cmd: Command) => {
      await run(ctx, cmd, async () => {
        const { store, preferences } = ctx;
        const index = resolveRowArg(store, row);
        const removed = store.deleteTask(index);
        const record = store.lastDeleted;
        if (!removed || !record) throw new Error(`Row ${row} not found`);

        await preferences.setString(LAST_DELETED_SLOT, JSON.stringify(encodeDeletionRecord(record)));
        out.success(`Task deleted: "${removed.title}". Run 'protask undo' to restore it.`);
      });
    });
}

export function createUndoCommand(ctx: CliContext): Command {
  return new Command('undo')
    .description('Restore the most recently deleted task')
    .action(async (_opts: unknown, cmd: Command) => {
      await run(ctx, cmd, async () => {
        const { store, preferences } = ctx;
        const stored = await preferences.getString(LAST_DELETED_SLOT);
        const record = stored === null ? null : decodeDeletionRecord(parseJson(stored));
        if (!record) {
          out.warning('Nothing to undo');
          return;
        }

        store.restoreDeletion(record);
        const restored = store.undoLastDelete();
        await preferences.remove(LAST_DELETED_SLOT);
        if (!restored) {
          out.warning(`"${record.task.title}" is already in the list`);
          return;
        }
        out.success(`Restored "${record.task.title}"`);
      });
    });
}

/** undefined for text that is not JSON; the record decoder rejects it */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    log.warn('Ignoring unreadable undo record:', err instanceof Error ? err.message : String(err));
    return undefined;
  }
}
