import { sql } from 'drizzle-orm';
import { pgTable, serial, varchar, timestamp, index } from 'drizzle-orm/pg-core';

export const subscriptions = pgTable(
  'subscriptions',
  {
    id: serial('id').primaryKey(),
    email: varchar('email', { length: 255 }).notNull().unique(), // stored normalized
    fullName: varchar('full_name', { length: 255 }),
    memberId: varchar('member_id', { length: 32 }),
    stripeCustomerId: varchar('stripe_customer_id', { length: 64 }),
    stripeSessionId: varchar('stripe_session_id', { length: 128 }),
    stripeSubscriptionId: varchar('stripe_subscription_id', { length: 64 }),
    lastInvoiceId: varchar('last_invoice_id', { length: 64 }),
    plan: varchar('plan', { length: 32 }),
    status: varchar('status', { length: 32 }).notNull().default('pending'),
    expiresAt: timestamp('expires_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    // Compared by conditional writes, so kept at the precision a JS Date round-trips
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .default(sql`date_trunc('milliseconds', now())`)
      .notNull(),
  },
  (table) => ({
    stripeSubscriptionIdx: index('subscriptions_stripe_subscription_id_idx').on(table.stripeSubscriptionId),
    stripeCustomerIdx: index('subscriptions_stripe_customer_id_idx').on(table.stripeCustomerId),
    emailStatusIdx: index('subscriptions_email_status_idx').on(table.email, table.status),
  })
);

export type SubscriptionRow = typeof subscriptions.$inferSelect;
export type NewSubscriptionRow = typeof subscriptions.$inferInsert;
