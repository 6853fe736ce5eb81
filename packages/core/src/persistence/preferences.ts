/**
 * Async slot access over the preference table. Every getter tolerates an
 * absent slot by returning null.
 */

import type { ProtaskDb } from '../db.js';
import { withRetry } from '../db.js';
import { getPreference, setPreference, removePreference } from '../queries/preference-queries.js';

export interface Preferences {
  getString(key: string): Promise<string | null>;
  setString(key: string, value: string): Promise<void>;
  /** Null when absent or when the stored text is not an integer */
  getInt(key: string): Promise<number | null>;
  setInt(key: string, value: number): Promise<void>;
  remove(key: string): Promise<void>;
}

const INTEGER_RE = /^-?\d+$/;

export class SqlitePreferences implements Preferences {
  private db: ProtaskDb;

  constructor(db: ProtaskDb) {
    this.db = db;
  }

  async getString(key: string): Promise<string | null> {
    return getPreference(this.db, key);
  }

  async setString(key: string, value: string): Promise<void> {
    await withRetry(() => setPreference(this.db, key, value));
  }

  async getInt(key: string): Promise<number | null> {
    const raw = getPreference(this.db, key);
    if (raw === null || !INTEGER_RE.test(raw.trim())) return null;
    return Number.parseInt(raw, 10);
  }

  async setInt(key: string, value: number): Promise<void> {
    if (!Number.isInteger(value)) {
      throw new Error(`Preference '${key}' must be an integer, got ${value}`);
    }
    await withRetry(() => setPreference(this.db, key, String(value)));
  }

  async remove(key: string): Promise<void> {
    await withRetry(() => removePreference(this.db, key));
  }
}
