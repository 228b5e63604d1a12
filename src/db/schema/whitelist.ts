import { pgTable, varchar, text, timestamp } from 'drizzle-orm/pg-core';

export const whitelist = pgTable('whitelist', {
  memberId: varchar('member_id', { length: 32 }).primaryKey(),
  email: varchar('email', { length: 255 }),
  reason: text('reason').notNull().default(''),
  addedBy: varchar('added_by', { length: 255 }).notNull().default('admin'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export type WhitelistRow = typeof whitelist.$inferSelect;
export type NewWhitelistRow = typeof whitelist.$inferInsert;
