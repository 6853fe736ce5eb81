import { ThemeMode, isThemeMode } from '../types/theme-mode.js';
import type { Preferences } from '../persistence/preferences.js';
import { THEME_SLOT } from '../config.js';
import { createLogger } from '../logging/log-buffer.js';

const log = createLogger('theme');

/**
 * The theme-mode slot. Changes apply in memory at once; the write happens in
 * the background and a failure only logs a warning.
 */
export class ThemePreference {
  private preferences: Preferences;
  private current: ThemeMode;
  private pendingWrite: Promise<void> = Promise.resolve();

  private constructor(preferences: Preferences, mode: ThemeMode) {
    this.preferences = preferences;
    this.current = mode;
  }

  /** Absent or unknown values fall back to System */
  static async load(preferences: Preferences): Promise<ThemePreference> {
    const stored = await preferences.getInt(THEME_SLOT);
    const mode = stored !== null && isThemeMode(stored) ? stored : ThemeMode.System;
    return new ThemePreference(preferences, mode);
  }

  get mode(): ThemeMode { return this.current; }

  /** Light becomes Dark; Dark and System become Light */
  toggle(): ThemeMode {
    return this.set(this.current === ThemeMode.Light ? ThemeMode.Dark : ThemeMode.Light);
  }

  useSystem(): ThemeMode {
    return this.set(ThemeMode.System);
  }

  /** Resolves once every write started so far has settled */
  flush(): Promise<void> {
    return this.pendingWrite;
  }

  private set(mode: ThemeMode): ThemeMode {
    this.current = mode;
    this.pendingWrite = this.pendingWrite
      .then(() => this.preferences.setInt(THEME_SLOT, mode))
      .catch((err: unknown) => {
        log.warn('Could not save theme:', err instanceof Error ? err.message : String(err));
      });
    return mode;
  }
}
