import { sqliteTable, text } from 'drizzle-orm/sqlite-core';

/** One row per slot. Values are always stored as text. */
export const preferences = sqliteTable('preferences', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});
