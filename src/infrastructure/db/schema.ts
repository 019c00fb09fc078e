import { pgTable, uuid, varchar, integer, timestamp, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the append-only `events` table.
 *
 * `uq_events_entity_version` is the concurrency control: the database,
 * not application code, decides which of two writers gets a version.
 * Rows are never updated or deleted.
 */
export const events = pgTable('events', {
  event_id: uuid('event_id').primaryKey(),
  entity_type: varchar('entity_type', { length: 255 }).notNull(),
  entity_id: varchar('entity_id', { length: 255 }).notNull(),
  event_type: varchar('event_type', { length: 255 }).notNull(),
  version: integer('version').notNull(),
  payload: jsonb('payload').notNull().default({}),
  occurred_at: timestamp('occurred_at', { withTimezone: true }).notNull(),
  recorded_at: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex('uq_events_entity_version').on(table.entity_type, table.entity_id, table.version),
  index('idx_events_event_type').on(table.event_type),
]);

export type EventRow = typeof events.$inferSelect;
