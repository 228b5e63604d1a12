import { pgTable, serial, integer, varchar, text, timestamp, index } from 'drizzle-orm/pg-core';

export const notificationLogs = pgTable(
  'notification_logs',
  {
    id: serial('id').primaryKey(),
    subscriptionId: integer('subscription_id').notNull(),
    email: varchar('email', { length: 255 }).notNull(),
    memberId: varchar('member_id', { length: 32 }).notNull(),
    leadDays: integer('lead_days').notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    status: varchar('status', { length: 20 }).notNull(), // 'sent' | 'failed'
    error: text('error'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    milestoneIdx: index('notification_logs_milestone_idx').on(
      table.subscriptionId,
      table.leadDays,
      table.expiresAt
    ),
  })
);

export type NotificationLogRow = typeof notificationLogs.$inferSelect;
