import { and, asc, desc, eq, gte, isNotNull, isNull, lt, lte, or, sql } from 'drizzle-orm';
import type { DbType } from '../db';
import { subscriptions, type SubscriptionRow } from '../db/schema';
import { graceCutoff } from '../services/sweepSelection';
import {
  isPlanType,
  isSubscriptionStatus,
  nextUpdatedAt,
  normalizeEmail,
  type SubscriptionRecord,
  type SubscriptionState,
  type SubscriptionStatus,
} from '../types/subscription';
import { logger } from '../utils/logger';
import type { SubscriptionListOptions, SubscriptionRepository } from './types';

export function toSubscriptionRecord(row: SubscriptionRow): SubscriptionRecord {
  let status: SubscriptionStatus = 'pending';
  if (isSubscriptionStatus(row.status)) {
    status = row.status;
  } else {
    logger.warn('[Subscriptions] Unknown status in database, treating as pending', {
      id: row.id,
      status: row.status,
    });
  }

  return {
    id: row.id,
    email: row.email,
    fullName: row.fullName,
    memberId: row.memberId,
    stripeCustomerId: row.stripeCustomerId,
    stripeSessionId: row.stripeSessionId,
    stripeSubscriptionId: row.stripeSubscriptionId,
    lastInvoiceId: row.lastInvoiceId,
    plan: row.plan && isPlanType(row.plan) ? row.plan : null,
    status,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toColumns(state: SubscriptionState) {
  return {
    email: normalizeEmail(state.email),
    fullName: state.fullName,
    memberId: state.memberId,
    stripeCustomerId: state.stripeCustomerId,
    stripeSessionId: state.stripeSessionId,
    stripeSubscriptionId: state.stripeSubscriptionId,
    lastInvoiceId: state.lastInvoiceId,
    plan: state.plan,
    status: state.status,
    expiresAt: state.expiresAt,
  };
}

export class DrizzleSubscriptionRepository implements SubscriptionRepository {
  constructor(private readonly db: DbType) {}

  private async first(rows: Promise<SubscriptionRow[]>): Promise<SubscriptionRecord | null> {
    const [row] = await rows;
    return row ? toSubscriptionRecord(row) : null;
  }

  async findById(id: number): Promise<SubscriptionRecord | null> {
    return this.first(this.db.select().from(subscriptions).where(eq(subscriptions.id, id)).limit(1));
  }

  async findByEmail(email: string): Promise<SubscriptionRecord | null> {
    return this.first(
      this.db.select().from(subscriptions).where(eq(subscriptions.email, normalizeEmail(email))).limit(1)
    );
  }

  async findByStripeSubscriptionId(stripeSubscriptionId: string): Promise<SubscriptionRecord | null> {
    return this.first(
      this.db
        .select()
        .from(subscriptions)
        .where(eq(subscriptions.stripeSubscriptionId, stripeSubscriptionId))
        .orderBy(desc(subscriptions.updatedAt))
        .limit(1)
    );
  }

  async findByStripeCustomerId(stripeCustomerId: string): Promise<SubscriptionRecord | null> {
    return this.first(
      this.db
        .select()
        .from(subscriptions)
        .where(eq(subscriptions.stripeCustomerId, stripeCustomerId))
        .orderBy(desc(subscriptions.updatedAt))
        .limit(1)
    );
  }

  async create(state: SubscriptionState): Promise<SubscriptionRecord> {
    // Versions are compared at millisecond precision, so the first one is stamped here
    const now = new Date();
    const [row] = await this.db
      .insert(subscriptions)
      .values({ ...toColumns(state), createdAt: now, updatedAt: now })
      .returning();
    return toSubscriptionRecord(row);
  }

  /** Unconditional write for administrative overrides. */
  async update(id: number, state: SubscriptionState): Promise<SubscriptionRecord> {
    const [row] = await this.db
      .update(subscriptions)
      .set({
        ...toColumns(state),
        updatedAt: sql`greatest(date_trunc('milliseconds', now()), ${subscriptions.updatedAt} + interval '1 millisecond')`,
      })
      .where(eq(subscriptions.id, id))
      .returning();

    if (!row) {
      throw new Error(`Subscription ${id} not found`);
    }
    return toSubscriptionRecord(row);
  }

  async updateIfUnchanged(
    id: number,
    expectedUpdatedAt: Date,
    state: SubscriptionState
  ): Promise<SubscriptionRecord | null> {
    const [row] = await this.db
      .update(subscriptions)
      .set({ ...toColumns(state), updatedAt: nextUpdatedAt(expectedUpdatedAt, new Date()) })
      .where(and(eq(subscriptions.id, id), eq(subscriptions.updatedAt, expectedUpdatedAt)))
      .returning();
    return row ? toSubscriptionRecord(row) : null;
  }

  async updateStatusIfUnchanged(id: number, expectedUpdatedAt: Date, status: SubscriptionStatus): Promise<boolean> {
    const updated = await this.db
      .update(subscriptions)
      .set({ status, updatedAt: nextUpdatedAt(expectedUpdatedAt, new Date()) })
      .where(and(eq(subscriptions.id, id), eq(subscriptions.updatedAt, expectedUpdatedAt)))
      .returning({ id: subscriptions.id });
    return updated.length > 0;
  }

  async delete(id: number): Promise<boolean> {
    const deleted = await this.db
      .delete(subscriptions)
      .where(eq(subscriptions.id, id))
      .returning({ id: subscriptions.id });
    return deleted.length > 0;
  }

  async list(options: SubscriptionListOptions = {}): Promise<SubscriptionRecord[]> {
    const rows = await this.db
      .select()
      .from(subscriptions)
      .where(options.status ? eq(subscriptions.status, options.status) : undefined)
      .orderBy(desc(subscriptions.updatedAt))
      .limit(options.limit ?? 100)
      .offset(options.offset ?? 0);
    return rows.map(toSubscriptionRecord);
  }

  async findRemovalCandidates(now: Date, gracePeriodDays: number): Promise<SubscriptionRecord[]> {
    const cutoff = graceCutoff(now, gracePeriodDays);
    const rows = await this.db
      .select()
      .from(subscriptions)
      .where(
        or(
          and(
            eq(subscriptions.status, 'active'),
            isNotNull(subscriptions.expiresAt),
            lt(subscriptions.expiresAt, cutoff)
          ),
          and(
            eq(subscriptions.status, 'canceled'),
            or(isNull(subscriptions.expiresAt), lt(subscriptions.expiresAt, cutoff))
          )
        )
      )
      .orderBy(asc(subscriptions.id));
    return rows.map(toSubscriptionRecord);
  }

  async findInGracePeriod(now: Date, gracePeriodDays: number): Promise<SubscriptionRecord[]> {
    const rows = await this.db
      .select()
      .from(subscriptions)
      .where(
        and(
          eq(subscriptions.status, 'active'),
          gte(subscriptions.expiresAt, graceCutoff(now, gracePeriodDays)),
          lte(subscriptions.expiresAt, now)
        )
      )
      .orderBy(asc(subscriptions.expiresAt));
    return rows.map(toSubscriptionRecord);
  }

  async findActiveExpiringBetween(from: Date, to: Date): Promise<SubscriptionRecord[]> {
    const rows = await this.db
      .select()
      .from(subscriptions)
      .where(
        and(
          eq(subscriptions.status, 'active'),
          isNotNull(subscriptions.memberId),
          gte(subscriptions.expiresAt, from),
          lt(subscriptions.expiresAt, to)
        )
      )
      .orderBy(asc(subscriptions.expiresAt));
    return rows.map(toSubscriptionRecord);
  }
}
