import { join } from 'node:path';
import { homedir } from 'node:os';

/** Slot holding the JSON task collection */
export const TASKS_SLOT = 'tasks';
/** Slot holding the theme-mode ordinal */
export const THEME_SLOT = 'themeMode';
/** Slot holding the CLI's last deletion, so undo survives between invocations */
export const LAST_DELETED_SLOT = 'lastDeleted';

const APP_DIR = 'protask';
const DB_FILE = 'protask.db';

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(): string {
  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', APP_DIR);
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  } else {
    // Linux / other
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
  }

  return join(dir, DB_FILE);
}

/** `PROTASK_DB` wins over the platform default. Blank values are ignored. */
export function resolveDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['PROTASK_DB']?.trim();
  return override ? override : getDefaultDbPath();
}
