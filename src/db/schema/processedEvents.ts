import { pgTable, varchar, timestamp } from 'drizzle-orm/pg-core';

/**
 * Processed Events
 *
 * One row per Stripe event id that has been applied. Existence of the row is the
 * deduplication gate; rows are only removed by the retention job.
 */
export const processedEvents = pgTable('processed_events', {
  eventId: varchar('event_id', { length: 255 }).primaryKey(),
  eventType: varchar('event_type', { length: 100 }).notNull(),
  receivedAt: timestamp('received_at', { withTimezone: true }).defaultNow().notNull(),
});

export type ProcessedEventRow = typeof processedEvents.$inferSelect;
