import { Command, CommanderError } from 'commander';
import { createDb, closeDb, SqlitePreferences } from '@protask/core';
import type { ProtaskDb } from '@protask/core';
import * as out from './output.js';
import { openContext, type CliContext } from './context.js';
import { createListCommand } from './commands/list.js';
import { createAddCommand } from './commands/add.js';
import { createEditCommand } from './commands/edit.js';
import { createCheckCommand } from './commands/check.js';
import { createDeleteCommand, createUndoCommand } from './commands/delete.js';
import { createSubTaskCommand } from './commands/subtask.js';
import { createThemeCommand } from './commands/theme.js';

/** Build the CLI program around an opened context */
export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('protask')
    .description('Personal task list')
    .version('1.0.0')
    .option('-f, --filter <type>', 'Show all, pending or completed tasks')
    .option('-s, --search <query>', 'Only tasks whose title contains the query')
    .option('--desc', 'List low priority first');

  // Register commands
  program.addCommand(createListCommand(ctx), { isDefault: true });
  program.addCommand(createAddCommand(ctx));
  program.addCommand(createEditCommand(ctx));
  program.addCommand(createCheckCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createUndoCommand(ctx));
  program.addCommand(createSubTaskCommand(ctx));
  program.addCommand(createThemeCommand(ctx));

  return program;
}

/** addCommand does not pass exitOverride down, so set it on every level */
function overrideExit(cmd: Command): void {
  cmd.exitOverride();
  for (const sub of cmd.commands) overrideExit(sub);
}

/**
 * Run one invocation and return its exit code. Waits for every pending
 * write, so the next invocation sees the result.
 */
export async function runCli(args: readonly string[], ctx: CliContext): Promise<number> {
  const program = createProgram(ctx);
  overrideExit(program);

  try {
    await program.parseAsync([...args], { from: 'user' });
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  await ctx.store.flush();
  await ctx.theme.flush();
  const saveError = ctx.store.persistenceError;
  if (saveError) {
    out.error(`Could not save tasks: ${saveError.message}`);
    return 1;
  }
  return ctx.exitCode;
}

/**
 * Open the database at `dbPath` (default: `PROTASK_DB` or the platform
 * path), run one invocation and close it again. Any failure, including
 * opening the database, is printed and gives exit code 1.
 */
export async function main(args: readonly string[], dbPath?: string): Promise<number> {
  let db: ProtaskDb | undefined;
  try {
    db = createDb(dbPath);
    const ctx = await openContext(new SqlitePreferences(db));
    return await runCli(args, ctx);
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    return 1;
  } finally {
    if (db) closeDb(db);
  }
}
