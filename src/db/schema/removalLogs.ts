import { pgTable, serial, integer, varchar, text, boolean, jsonb, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Removal Logs
 *
 * Append-only audit trail of every sweep decision. Several rows may exist for the same
 * subscription across runs (and within a run: `processing` followed by the outcome).
 */
export const removalLogs = pgTable(
  'removal_logs',
  {
    id: serial('id').primaryKey(),
    runId: varchar('run_id', { length: 64 }).notNull(),
    subscriptionId: integer('subscription_id').notNull(),
    email: varchar('email', { length: 255 }).notNull(),
    memberId: varchar('member_id', { length: 32 }),
    reason: varchar('reason', { length: 20 }).notNull(), // 'expired' | 'cancelled'
    status: varchar('status', { length: 32 }).notNull(),
    groupsRemoved: jsonb('groups_removed').$type<string[]>().notNull().default([]),
    groupsFailed: jsonb('groups_failed').$type<string[]>().notNull().default([]),
    notificationSent: boolean('notification_sent').notNull().default(false),
    error: text('error'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    subscriptionIdx: index('removal_logs_subscription_id_idx').on(table.subscriptionId),
    createdAtIdx: index('removal_logs_created_at_idx').on(table.createdAt),
  })
);

export type RemovalLogRow = typeof removalLogs.$inferSelect;
