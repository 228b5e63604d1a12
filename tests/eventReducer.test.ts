import type { BillingEvent } from '../src/services/billingEvents';
import { mapStripeStatus, reduceBillingEvent, type ReduceContext, type ReduceOutcome } from '../src/services/eventReducer';
import type { SubscriptionState } from '../src/types/subscription';

const now = new Date('2024-05-01T00:00:00Z');
const ctx: ReduceContext = { now, pricePlans: { price_month: 'monthly' } };

function state(overrides: Partial<SubscriptionState> = {}): SubscriptionState {
  return {
    email: 'member@example.com',
    fullName: null,
    memberId: null,
    stripeCustomerId: null,
    stripeSessionId: null,
    stripeSubscriptionId: null,
    lastInvoiceId: null,
    plan: null,
    status: 'pending',
    expiresAt: null,
    ...overrides,
  };
}

function checkout(overrides: Partial<Extract<BillingEvent, { kind: 'checkout_completed' }>['session']> = {}): BillingEvent {
  return {
    kind: 'checkout_completed',
    eventId: 'evt_checkout',
    type: 'checkout.session.completed',
    session: {
      sessionId: 'cs_1',
      email: 'member@example.com',
      fullName: 'Test Member',
      memberIdHint: '123456',
      mode: 'subscription',
      paid: true,
      stripeCustomerId: 'cus_1',
      stripeSubscriptionId: 'sub_1',
      ...overrides,
    },
  };
}

function invoice(overrides: Partial<Extract<BillingEvent, { kind: 'invoice_paid' }>['invoice']> = {}): BillingEvent {
  return {
    kind: 'invoice_paid',
    eventId: 'evt_invoice',
    type: 'invoice.paid',
    invoice: {
      invoiceId: 'in_1',
      email: 'member@example.com',
      stripeCustomerId: 'cus_1',
      stripeSubscriptionId: 'sub_1',
      priceId: 'price_month',
      periodEnd: new Date('2024-06-01T00:00:00Z'),
      description: null,
      ...overrides,
    },
  };
}

function statusEvent(kind: 'subscription_updated' | 'subscription_deleted', status: string): BillingEvent {
  return {
    kind,
    eventId: `evt_${kind}`,
    type: kind === 'subscription_updated' ? 'customer.subscription.updated' : 'customer.subscription.deleted',
    subscription: { stripeSubscriptionId: 'sub_1', stripeCustomerId: 'cus_1', status },
  };
}

function applied(outcome: ReduceOutcome): Extract<ReduceOutcome, { kind: 'applied' }> {
  if (outcome.kind !== 'applied') {
    throw new Error(`expected applied, got skipped (${outcome.reason})`);
  }
  return outcome;
}

describe('Event Reducer', () => {
  describe('mapStripeStatus', () => {
    it.each([
      ['active', 'active'],
      ['trialing', 'active'],
      ['past_due', 'past_due'],
      ['canceled', 'canceled'],
      ['unpaid', 'canceled'],
      ['incomplete', 'pending'],
      ['incomplete_expired', 'canceled'],
      ['paused', 'pending'],
    ])('should map %s to %s', (stripeStatus, expected) => {
      expect(mapStripeStatus(stripeStatus)).toBe(expected);
    });
  });

  describe('checkout.session.completed', () => {
    it('should create an active record for a paid subscription checkout', () => {
      const outcome = applied(reduceBillingEvent(null, checkout(), ctx));

      expect(outcome.classification).toBe('created');
      expect(outcome.next).toEqual(
        state({
          fullName: 'Test Member',
          memberId: '123456',
          stripeCustomerId: 'cus_1',
          stripeSessionId: 'cs_1',
          stripeSubscriptionId: 'sub_1',
          status: 'active',
        })
      );
    });

    it('should create a pending record when the checkout is not paid yet', () => {
      const outcome = applied(reduceBillingEvent(null, checkout({ paid: false }), ctx));
      expect(outcome.next.status).toBe('pending');
    });

    it('should skip sessions without an email', () => {
      expect(reduceBillingEvent(null, checkout({ email: null }), ctx)).toEqual({
        kind: 'skipped',
        reason: 'missing_email',
      });
    });

    it('should skip one-off payments for unknown emails', () => {
      expect(reduceBillingEvent(null, checkout({ mode: 'payment' }), ctx)).toEqual({
        kind: 'skipped',
        reason: 'not_subscription_mode',
      });
    });

    it('should only fill empty fields on an existing record', () => {
      const current = state({ fullName: 'Known Name', memberId: '42', status: 'active', stripeCustomerId: 'cus_old' });
      const outcome = applied(reduceBillingEvent(current, checkout(), ctx));

      expect(outcome.classification).toBe('unchanged');
      expect(outcome.next.fullName).toBe('Known Name');
      expect(outcome.next.memberId).toBe('42');
      expect(outcome.next.stripeCustomerId).toBe('cus_old');
      expect(outcome.next.stripeSubscriptionId).toBe('sub_1');
      expect(outcome.changed).toBe(true);
    });

    it('should activate a pending record once paid', () => {
      const outcome = applied(reduceBillingEvent(state({ status: 'pending' }), checkout(), ctx));
      expect(outcome.classification).toBe('activated');
      expect(outcome.next.status).toBe('active');
    });

    it('should never downgrade an existing record', () => {
      const current = state({ status: 'active', expiresAt: new Date('2024-06-01T00:00:00Z') });
      const outcome = applied(reduceBillingEvent(current, checkout({ paid: false }), ctx));
      expect(outcome.next.status).toBe('active');
      expect(outcome.next.expiresAt).toEqual(new Date('2024-06-01T00:00:00Z'));
    });

    it('should be a no-op when applied twice', () => {
      const first = applied(reduceBillingEvent(null, checkout(), ctx));
      const second = applied(reduceBillingEvent(first.next, checkout(), ctx));

      expect(second.changed).toBe(false);
      expect(second.next).toEqual(first.next);
    });
  });

  describe('invoice.paid', () => {
    it('should create an active record from the invoice when none exists', () => {
      const outcome = applied(reduceBillingEvent(null, invoice(), ctx));

      expect(outcome.classification).toBe('created');
      expect(outcome.next).toEqual(
        state({
          stripeCustomerId: 'cus_1',
          stripeSubscriptionId: 'sub_1',
          lastInvoiceId: 'in_1',
          plan: 'monthly',
          status: 'active',
          expiresAt: new Date('2024-06-01T00:00:00Z'),
        })
      );
      expect(outcome.planSource).toBe('price');
    });

    it('should skip when there is neither a record nor an email', () => {
      expect(reduceBillingEvent(null, invoice({ email: null }), ctx)).toEqual({
        kind: 'skipped',
        reason: 'missing_email',
      });
    });

    it('should take the later of the stored expiry and the period end', () => {
      const current = state({ status: 'active', expiresAt: new Date('2024-07-01T00:00:00Z') });
      const outcome = applied(reduceBillingEvent(current, invoice(), ctx));

      expect(outcome.next.expiresAt).toEqual(new Date('2024-07-01T00:00:00Z'));
      expect(outcome.classification).toBe('unchanged');
    });

    it('should classify a later period end as an extension', () => {
      const current = state({ status: 'active', expiresAt: new Date('2024-05-15T00:00:00Z') });
      const outcome = applied(reduceBillingEvent(current, invoice(), ctx));

      expect(outcome.classification).toBe('extended');
      expect(outcome.next.expiresAt).toEqual(new Date('2024-06-01T00:00:00Z'));
    });

    it('should reactivate a removed member', () => {
      const current = state({ status: 'auto_removed', expiresAt: new Date('2024-04-01T00:00:00Z') });
      const outcome = applied(reduceBillingEvent(current, invoice(), ctx));

      expect(outcome.classification).toBe('activated');
      expect(outcome.next.status).toBe('active');
    });

    it('should extend by the plan duration when no period end is present', () => {
      const current = state({ status: 'active', expiresAt: new Date('2024-05-10T00:00:00Z'), lastInvoiceId: 'in_0' });
      const outcome = applied(reduceBillingEvent(current, invoice({ periodEnd: null }), ctx));

      expect(outcome.next.expiresAt).toEqual(new Date('2024-06-09T00:00:00Z'));
      expect(outcome.classification).toBe('extended');
    });

    it('should not extend twice for the same invoice', () => {
      const first = applied(reduceBillingEvent(state({ status: 'active' }), invoice({ periodEnd: null }), ctx));
      const second = applied(reduceBillingEvent(first.next, invoice({ periodEnd: null }), ctx));

      expect(first.next.expiresAt).toEqual(new Date('2024-05-31T00:00:00Z'));
      expect(second.next.expiresAt).toEqual(first.next.expiresAt);
      expect(second.changed).toBe(false);
    });

    it('should report the plan source when inferred from the description', () => {
      const outcome = applied(
        reduceBillingEvent(null, invoice({ priceId: 'price_unknown', description: 'VIP quarterly' }), ctx)
      );
      expect(outcome.next.plan).toBe('quarterly');
      expect(outcome.planSource).toBe('description');
    });

    it('should flag an unknown expiry when there is no period end and no plan', () => {
      const outcome = applied(
        reduceBillingEvent(null, invoice({ priceId: null, description: null, periodEnd: null }), ctx)
      );
      expect(outcome.expiryUnknown).toBe(true);
      expect(outcome.next.expiresAt).toBeNull();
      expect(outcome.next.status).toBe('active');
    });
  });

  describe('subscription status events', () => {
    it('should skip when the subscription is unknown', () => {
      expect(reduceBillingEvent(null, statusEvent('subscription_updated', 'active'), ctx)).toEqual({
        kind: 'skipped',
        reason: 'subscription_not_found',
      });
    });

    it('should deactivate on past_due and cancel on deletion', () => {
      const current = state({ status: 'active' });

      const pastDue = applied(reduceBillingEvent(current, statusEvent('subscription_updated', 'past_due'), ctx));
      expect(pastDue.next.status).toBe('past_due');
      expect(pastDue.classification).toBe('deactivated');

      const deleted = applied(reduceBillingEvent(current, statusEvent('subscription_deleted', 'active'), ctx));
      expect(deleted.next.status).toBe('canceled');
      expect(deleted.classification).toBe('deactivated');
    });

    it('should activate a past_due subscription that recovered', () => {
      const outcome = applied(
        reduceBillingEvent(state({ status: 'past_due' }), statusEvent('subscription_updated', 'active'), ctx)
      );
      expect(outcome.classification).toBe('activated');
    });

    it('should leave removed members untouched', () => {
      const current = state({ status: 'manually_removed' });
      const outcome = applied(reduceBillingEvent(current, statusEvent('subscription_updated', 'active'), ctx));

      expect(outcome.changed).toBe(false);
      expect(outcome.classification).toBe('unchanged');
      expect(outcome.next.status).toBe('manually_removed');
    });

    it('should keep the expiry so paid time is honored after cancellation', () => {
      const expiresAt = new Date('2024-06-01T00:00:00Z');
      const outcome = applied(
        reduceBillingEvent(state({ status: 'active', expiresAt }), statusEvent('subscription_deleted', 'canceled'), ctx)
      );
      expect(outcome.next.expiresAt).toEqual(expiresAt);
    });
  });

  it('should skip event types it does not handle', () => {
    expect(reduceBillingEvent(null, { kind: 'ignored', eventId: 'evt_x', type: 'charge.refunded' }, ctx)).toEqual({
      kind: 'skipped',
      reason: 'ignored_event_type',
    });
  });
});
