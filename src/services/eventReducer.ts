import type {
  BillingEvent,
  CheckoutSessionPayload,
  InvoicePayload,
  SubscriptionPayload,
} from './billingEvents';
import { extendExpiry, resolvePlan, type PlanSource } from './planService';
import {
  isTerminalStatus,
  type PlanType,
  type SubscriptionState,
  type SubscriptionStatus,
} from '../types/subscription';

/**
 * Event Reducer
 *
 * Folds one billing event onto the current state of one subscription. No I/O: the caller
 * resolves which record the event targets and persists whatever comes back. Every fold is
 * safe to re-apply: running the same event twice ends in the same state as running it once.
 */

export type ReduceClassification = 'created' | 'extended' | 'activated' | 'deactivated' | 'unchanged';

export type SkipReason =
  | 'missing_email'
  | 'not_subscription_mode'
  | 'subscription_not_found'
  | 'ignored_event_type';

export type ReduceOutcome =
  | { kind: 'skipped'; reason: SkipReason }
  | {
      kind: 'applied';
      classification: ReduceClassification;
      next: SubscriptionState;
      changed: boolean;
      planSource?: PlanSource;
      /** Invoice carried neither a period end nor a recognizable plan. */
      expiryUnknown?: boolean;
    };

export interface ReduceContext {
  now: Date;
  pricePlans: Record<string, PlanType>;
}

const STRIPE_STATUS_MAP = new Map<string, SubscriptionStatus>([
  ['active', 'active'],
  ['trialing', 'active'],
  ['past_due', 'past_due'],
  ['canceled', 'canceled'],
  ['unpaid', 'canceled'],
  ['incomplete', 'pending'],
  ['incomplete_expired', 'canceled'],
]);

export function mapStripeStatus(stripeStatus: string): SubscriptionStatus {
  return STRIPE_STATUS_MAP.get(stripeStatus) ?? 'pending';
}

export function pickState(record: SubscriptionState): SubscriptionState {
  return {
    email: record.email,
    fullName: record.fullName,
    memberId: record.memberId,
    stripeCustomerId: record.stripeCustomerId,
    stripeSessionId: record.stripeSessionId,
    stripeSubscriptionId: record.stripeSubscriptionId,
    lastInvoiceId: record.lastInvoiceId,
    plan: record.plan,
    status: record.status,
    expiresAt: record.expiresAt,
  };
}

function sameInstant(a: Date | null, b: Date | null): boolean {
  if (a === null || b === null) return a === b;
  return a.getTime() === b.getTime();
}

export function statesEqual(a: SubscriptionState, b: SubscriptionState): boolean {
  return (
    a.email === b.email &&
    a.fullName === b.fullName &&
    a.memberId === b.memberId &&
    a.stripeCustomerId === b.stripeCustomerId &&
    a.stripeSessionId === b.stripeSessionId &&
    a.stripeSubscriptionId === b.stripeSubscriptionId &&
    a.lastInvoiceId === b.lastInvoiceId &&
    a.plan === b.plan &&
    a.status === b.status &&
    sameInstant(a.expiresAt, b.expiresAt)
  );
}

function emptyState(email: string): SubscriptionState {
  return {
    email,
    fullName: null,
    memberId: null,
    stripeCustomerId: null,
    stripeSessionId: null,
    stripeSubscriptionId: null,
    lastInvoiceId: null,
    plan: null,
    status: 'pending',
    expiresAt: null,
  };
}

function statusTransition(from: SubscriptionStatus, to: SubscriptionStatus): ReduceClassification {
  if (from === to) return 'unchanged';
  return to === 'active' ? 'activated' : 'deactivated';
}

function reduceCheckoutCompleted(
  current: SubscriptionState | null,
  session: CheckoutSessionPayload
): ReduceOutcome {
  if (!session.email) {
    return { kind: 'skipped', reason: 'missing_email' };
  }

  const isSubscription = session.mode === 'subscription';

  if (!current) {
    if (!isSubscription) {
      return { kind: 'skipped', reason: 'not_subscription_mode' };
    }
    return {
      kind: 'applied',
      classification: 'created',
      changed: true,
      next: {
        ...emptyState(session.email),
        fullName: session.fullName,
        memberId: session.memberIdHint,
        stripeCustomerId: session.stripeCustomerId,
        stripeSessionId: session.sessionId,
        stripeSubscriptionId: session.stripeSubscriptionId,
        status: session.paid ? 'active' : 'pending',
      },
    };
  }

  const before = pickState(current);
  // Only fill what is empty; never overwrite or downgrade
  const next: SubscriptionState = {
    ...before,
    fullName: before.fullName ?? session.fullName,
    memberId: before.memberId ?? session.memberIdHint,
  };

  if (isSubscription) {
    next.stripeCustomerId = before.stripeCustomerId ?? session.stripeCustomerId;
    next.stripeSubscriptionId = before.stripeSubscriptionId ?? session.stripeSubscriptionId;
    next.stripeSessionId = before.stripeSessionId ?? session.sessionId;
    if (session.paid && before.status === 'pending') {
      next.status = 'active';
    }
  }

  return {
    kind: 'applied',
    classification: before.status === 'pending' && next.status === 'active' ? 'activated' : 'unchanged',
    changed: !statesEqual(before, next),
    next,
  };
}

function reduceInvoicePaid(
  current: SubscriptionState | null,
  invoice: InvoicePayload,
  ctx: ReduceContext
): ReduceOutcome {
  if (!current && !invoice.email) {
    return { kind: 'skipped', reason: 'missing_email' };
  }

  const before = current ? pickState(current) : null;
  const base = before ?? emptyState(invoice.email ?? '');

  const resolution = resolvePlan(
    { priceId: invoice.priceId, description: invoice.description, existing: base.plan },
    ctx.pricePlans
  );

  const alreadyApplied =
    before !== null && invoice.invoiceId !== null && before.lastInvoiceId === invoice.invoiceId;

  let expiresAt = base.expiresAt;
  if (invoice.periodEnd) {
    // The provider's period end is authoritative, but a late event never shortens a known expiry
    expiresAt =
      base.expiresAt && base.expiresAt.getTime() > invoice.periodEnd.getTime() ? base.expiresAt : invoice.periodEnd;
  } else if (resolution.plan && !alreadyApplied) {
    expiresAt = extendExpiry(base.expiresAt, resolution.plan, ctx.now);
  }

  const next: SubscriptionState = {
    ...base,
    status: 'active',
    plan: resolution.plan ?? base.plan,
    expiresAt,
    lastInvoiceId: invoice.invoiceId ?? base.lastInvoiceId,
    stripeCustomerId: base.stripeCustomerId ?? invoice.stripeCustomerId,
    stripeSubscriptionId: base.stripeSubscriptionId ?? invoice.stripeSubscriptionId,
  };

  let classification: ReduceClassification = 'unchanged';
  if (!before) {
    classification = 'created';
  } else if (before.status !== 'active') {
    classification = 'activated';
  } else if (expiresAt && (!before.expiresAt || expiresAt.getTime() > before.expiresAt.getTime())) {
    classification = 'extended';
  }

  return {
    kind: 'applied',
    classification,
    changed: before === null || !statesEqual(before, next),
    next,
    planSource: resolution.source,
    expiryUnknown: !invoice.periodEnd && !resolution.plan,
  };
}

function reduceStatusChange(
  current: SubscriptionState | null,
  subscription: SubscriptionPayload,
  status: SubscriptionStatus
): ReduceOutcome {
  if (!current) {
    return { kind: 'skipped', reason: 'subscription_not_found' };
  }

  const before = pickState(current);
  if (isTerminalStatus(before.status)) {
    // Only a new paid period (invoice) brings a removed member back
    return { kind: 'applied', classification: 'unchanged', changed: false, next: before };
  }

  const next: SubscriptionState = {
    ...before,
    status,
    stripeSubscriptionId: before.stripeSubscriptionId ?? subscription.stripeSubscriptionId,
    stripeCustomerId: before.stripeCustomerId ?? subscription.stripeCustomerId,
  };

  return {
    kind: 'applied',
    classification: statusTransition(before.status, next.status),
    changed: !statesEqual(before, next),
    next,
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled billing event: ${JSON.stringify(value)}`);
}

export function reduceBillingEvent(
  current: SubscriptionState | null,
  event: BillingEvent,
  ctx: ReduceContext
): ReduceOutcome {
  switch (event.kind) {
    case 'checkout_completed':
      return reduceCheckoutCompleted(current, event.session);
    case 'invoice_paid':
      return reduceInvoicePaid(current, event.invoice, ctx);
    case 'subscription_updated':
      return reduceStatusChange(current, event.subscription, mapStripeStatus(event.subscription.status));
    case 'subscription_deleted':
      return reduceStatusChange(current, event.subscription, 'canceled');
    case 'ignored':
      return { kind: 'skipped', reason: 'ignored_event_type' };
    default:
      return assertNever(event);
  }
}
