/**
 * Key-value preference storage operations. Each key is one durable slot.
 */

import { eq } from 'drizzle-orm';
import type { ProtaskDb } from '../db.js';
import { preferences } from '../schema/index.js';

/** Get a preference value by key */
export function getPreference(db: ProtaskDb, key: string): string | null {
  const row = db.select({ value: preferences.value }).from(preferences).where(eq(preferences.key, key)).get();
  return row?.value ?? null;
}

/** Set a preference value, overwriting any previous one */
export function setPreference(db: ProtaskDb, key: string, value: string): void {
  db.insert(preferences).values({ key, value }).onConflictDoUpdate({ target: preferences.key, set: { value } }).run();
}

/** Remove a preference. Removing an absent key is a no-op. */
export function removePreference(db: ProtaskDb, key: string): void {
  db.delete(preferences).where(eq(preferences.key, key)).run();
}

