import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import { resolveDbPath } from './config.js';

export type ProtaskDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS preferences (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

/**
 * Create a Drizzle database connection with proper pragmas.
 * If no path is given, uses `PROTASK_DB` or the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): ProtaskDb {
  const dbPath = path ?? resolveDbPath();

  // Ensure directory exists for file-based databases
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  // Idempotent: every statement uses IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/**
 * Create an in-memory database with schema applied. For tests.
 */
export function createTestDb(): ProtaskDb {
  return createDb(':memory:');
}

/** Sleep utility for retry logic */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isBusyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'SQLITE_BUSY';
}

/**
 * Retry wrapper with exponential backoff for SQLITE_BUSY errors.
 * Wraps write operations that may fail while another connection holds the lock.
 */
export async function withRetry<T>(fn: () => T, maxRetries = 3): Promise<T> {
  for (let i = 0; i < maxRetries; i++) {
    try {
      return fn();
    } catch (err: unknown) {
      if (isBusyError(err) && i < maxRetries - 1) {
        await sleep(100 * Math.pow(2, i)); // 100ms, 200ms, 400ms
        continue;
      }
      throw err;
    }
  }
  throw new Error('withRetry: max retries exceeded');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (pragmas, close, raw exec).
 */
export function getRawDb(db: ProtaskDb): Database.Database {
  return db.$client;
}

/** Close the underlying connection. Safe to call twice. */
export function closeDb(db: ProtaskDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
