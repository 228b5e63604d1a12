import { pgTable, serial, integer, varchar, boolean, timestamp, index } from 'drizzle-orm/pg-core';

export const inviteLogs = pgTable(
  'invite_logs',
  {
    id: serial('id').primaryKey(),
    email: varchar('email', { length: 255 }).notNull(),
    memberId: varchar('member_id', { length: 32 }),
    groupId: varchar('group_id', { length: 32 }).notNull(),
    inviteLink: varchar('invite_link', { length: 512 }).notNull(),
    memberLimit: integer('member_limit').notNull().default(1),
    isTemporary: boolean('is_temporary').notNull().default(true),
    expiresAt: timestamp('expires_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    emailCreatedIdx: index('invite_logs_email_created_idx').on(table.email, table.createdAt),
  })
);

export type InviteLogRow = typeof inviteLogs.$inferSelect;
