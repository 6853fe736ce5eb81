import type { Command } from 'commander';
import type { Preferences } from '@protask/core';
import { PreferencesTaskRepository, TaskStore, ThemePreference } from '@protask/core';
import * as out from './output.js';
import { applyViewFlags, readViewFlags } from './helpers.js';

/** Everything a command needs. Built once per invocation. */
export interface CliContext {
  store: TaskStore;
  preferences: Preferences;
  theme: ThemePreference;
  /** Set to 1 by a failing command */
  exitCode: number;
}

/**
 * Run a command body with the global view flags applied. A thrown error
 * becomes a red message and exit code 1.
 */
export async function run(ctx: CliContext, cmd: Command, fn: () => void | Promise<void>): Promise<void> {
  try {
    applyViewFlags(ctx.store, readViewFlags(cmd));
    await fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    ctx.exitCode = 1;
  }
}

/** Load the task collection and theme from `preferences` */
export async function openContext(preferences: Preferences): Promise<CliContext> {
  const store = await TaskStore.open(new PreferencesTaskRepository(preferences));
  const theme = await ThemePreference.load(preferences);
  return { store, preferences, theme, exitCode: 0 };
}
