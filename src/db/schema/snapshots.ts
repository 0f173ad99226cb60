import { pgTable, uuid, text, real, jsonb, timestamp } from 'drizzle-orm/pg-core';

export const snapshots = pgTable('snapshots', {
  id: uuid('id').primaryKey().defaultRandom(),
  release: text('release').notNull(),
  leverageScore: real('leverage_score').notNull(),
  decision: text('decision').notNull(),
  snapshot: jsonb('snapshot').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
