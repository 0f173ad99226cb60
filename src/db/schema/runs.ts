import { pgTable, uuid, text, integer, jsonb, timestamp } from 'drizzle-orm/pg-core';

export const runs = pgTable('runs', {
  id: uuid('id').primaryKey().defaultRandom(),
  release: text('release').notNull(),
  seed: integer('seed').notNull(),
  samples: integer('samples').notNull(),
  distributions: jsonb('distributions').notNull(),
  summary: jsonb('summary'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
