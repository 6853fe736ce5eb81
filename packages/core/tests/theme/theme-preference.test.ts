import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ThemePreference } from '../../src/theme/theme-preference.js';
import { ThemeMode } from '../../src/types/theme-mode.js';
import { SqlitePreferences } from '../../src/persistence/preferences.js';
import { createTestDb } from '../../src/db.js';
import { clearLogs, getLogHistory, setConsoleEcho } from '../../src/logging/log-buffer.js';
import { FlakyPreferences } from '../helpers.js';

let prefs: SqlitePreferences;

beforeEach(() => {
  prefs = new SqlitePreferences(createTestDb());
});

describe('ThemePreference.load', () => {
  it('defaults to System when nothing is stored', async () => {
    expect((await ThemePreference.load(prefs)).mode).toBe(ThemeMode.System);
  });

  it('reads the stored ordinal', async () => {
    await prefs.setInt('themeMode', 2);
    expect((await ThemePreference.load(prefs)).mode).toBe(ThemeMode.Dark);
  });

  it('falls back to System for an unknown ordinal', async () => {
    await prefs.setInt('themeMode', 7);
    expect((await ThemePreference.load(prefs)).mode).toBe(ThemeMode.System);
  });
});

describe('toggle', () => {
  it('goes System → Light → Dark → Light', async () => {
    const theme = await ThemePreference.load(prefs);
    expect(theme.toggle()).toBe(ThemeMode.Light);
    expect(theme.toggle()).toBe(ThemeMode.Dark);
    expect(theme.toggle()).toBe(ThemeMode.Light);
  });

  it('persists the last value', async () => {
    const theme = await ThemePreference.load(prefs);
    theme.toggle();
    theme.toggle();
    await theme.flush();
    expect(await prefs.getInt('themeMode')).toBe(ThemeMode.Dark);
    expect((await ThemePreference.load(prefs)).mode).toBe(ThemeMode.Dark);
  });
});

describe('useSystem', () => {
  it('stores System', async () => {
    await prefs.setInt('themeMode', 1);
    const theme = await ThemePreference.load(prefs);
    expect(theme.useSystem()).toBe(ThemeMode.System);
    await theme.flush();
    expect(await prefs.getInt('themeMode')).toBe(0);
  });
});

describe('when the write fails', () => {
  beforeEach(() => {
    setConsoleEcho(false);
    clearLogs();
  });

  afterEach(() => {
    setConsoleEcho(true);
  });

  it('keeps the new mode in memory and logs a warning', async () => {
    const flaky = new FlakyPreferences();
    const theme = await ThemePreference.load(flaky);
    flaky.failWrites = true;

    theme.toggle();
    await theme.flush();

    expect(theme.mode).toBe(ThemeMode.Light);
    expect(getLogHistory()).toEqual([
      expect.objectContaining({ level: 'warn', scope: 'theme', message: 'Could not save theme: disk full' }),
    ]);
  });
});
