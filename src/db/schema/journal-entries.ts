import { pgTable, uuid, text, timestamp } from 'drizzle-orm/pg-core';

// Append-only: the API exposes no update or delete for this table.
export const journalEntries = pgTable('journal_entries', {
  id: uuid('id').primaryKey().defaultRandom(),
  timestampUtc: timestamp('timestamp_utc', { withTimezone: true }).notNull().defaultNow(),
  entryType: text('entry_type').notNull(),
  source: text('source').notNull(),
  text: text('text').notNull(),
  factStatus: text('fact_status'),
});
