import { extractMemberIdHint, parseBillingEvent, type BillingEvent } from '../src/services/billingEvents';
import { checkoutCompleted, invoicePaid, subscriptionEvent } from './support/events';

function parsed(raw: unknown): BillingEvent {
  const result = parseBillingEvent(raw);
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.event;
}

describe('Billing event parsing', () => {
  it('should reject payloads without an event envelope', () => {
    const result = parseBillingEvent({ type: 'invoice.paid' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatch(/^Invalid event envelope: /);
    }
  });

  it('should parse a completed checkout session', () => {
    const event = parsed(checkoutCompleted({}, 'evt_checkout'));

    expect(event).toEqual({
      kind: 'checkout_completed',
      eventId: 'evt_checkout',
      type: 'checkout.session.completed',
      session: {
        sessionId: 'cs_test_1',
        email: 'member@example.com',
        fullName: 'Test Member',
        memberIdHint: '123456789',
        mode: 'subscription',
        paid: true,
        stripeCustomerId: 'cus_1',
        stripeSubscriptionId: 'sub_1',
      },
    });
  });

  it('should fall back to customer_email and accept expanded ids', () => {
    const event = parsed(
      checkoutCompleted({
        customer_details: null,
        customer_email: ' Other@Example.com ',
        customer: { id: 'cus_expanded' },
        payment_status: 'unpaid',
      })
    );

    if (event.kind !== 'checkout_completed') throw new Error('unexpected kind');
    expect(event.session.email).toBe('other@example.com');
    expect(event.session.stripeCustomerId).toBe('cus_expanded');
    expect(event.session.paid).toBe(false);
    expect(event.session.fullName).toBeNull();
  });

  it('should parse a paid invoice', () => {
    const event = parsed(invoicePaid({}, 'evt_invoice'));

    expect(event).toEqual({
      kind: 'invoice_paid',
      eventId: 'evt_invoice',
      type: 'invoice.paid',
      invoice: {
        invoiceId: 'in_1',
        email: 'member@example.com',
        stripeCustomerId: 'cus_1',
        stripeSubscriptionId: 'sub_1',
        priceId: 'price_month',
        periodEnd: new Date(1717200000 * 1000),
        description: '1 × VIP (at $30.00 / month)',
      },
    });
  });

  it('should read the subscription and price from newer invoice layouts', () => {
    const event = parsed(
      invoicePaid({
        subscription: undefined,
        parent: { subscription_details: { subscription: 'sub_parent' } },
        lines: { data: [{ pricing: { price_details: { price: 'price_nested' } } }] },
      })
    );

    if (event.kind !== 'invoice_paid') throw new Error('unexpected kind');
    expect(event.invoice.stripeSubscriptionId).toBe('sub_parent');
    expect(event.invoice.priceId).toBe('price_nested');
    expect(event.invoice.periodEnd).toBeNull();
    expect(event.invoice.description).toBeNull();
  });

  it('should treat invoice.payment_succeeded like invoice.paid', () => {
    const raw = { ...invoicePaid(), type: 'invoice.payment_succeeded' };
    expect(parsed(raw).kind).toBe('invoice_paid');
  });

  it('should parse subscription updates and deletions', () => {
    const updated = parsed(subscriptionEvent('customer.subscription.updated', 'past_due'));
    const deleted = parsed(subscriptionEvent('customer.subscription.deleted', 'canceled'));

    expect(updated.kind).toBe('subscription_updated');
    expect(deleted.kind).toBe('subscription_deleted');
    if (updated.kind === 'subscription_updated') {
      expect(updated.subscription).toEqual({ stripeSubscriptionId: 'sub_1', stripeCustomerId: 'cus_1', status: 'past_due' });
    }
  });

  it('should reject a subscription object without an id', () => {
    const result = parseBillingEvent({
      id: 'evt_bad',
      type: 'customer.subscription.updated',
      data: { object: { status: 'active' } },
    });

    expect(result).toEqual({ ok: false, error: 'Invalid subscription: id: Required' });
  });

  it('should mark other event types as ignored', () => {
    expect(parsed({ id: 'evt_x', type: 'charge.refunded', data: { object: {} } })).toEqual({
      kind: 'ignored',
      eventId: 'evt_x',
      type: 'charge.refunded',
    });
  });

  describe('extractMemberIdHint', () => {
    it('should prefer the text value of a telegram field', () => {
      expect(
        extractMemberIdHint({
          custom_fields: [
            { key: 'other', text: { value: '999' } },
            { key: 'x', label: { custom: 'Your Telegram ID' }, numeric: { value: '555' } },
            { key: 'telegram_id', text: { value: 'id: 777' } },
          ],
        })
      ).toBe('777');
    });

    it('should use the numeric value when no text value has digits', () => {
      expect(
        extractMemberIdHint({ custom_fields: [{ key: 'telegram', text: { value: 'n/a' }, numeric: { value: '4242' } }] })
      ).toBe('4242');
    });

    it('should fall back to metadata', () => {
      expect(extractMemberIdHint({ metadata: { telegram_id: '@ 31337' } })).toBe('31337');
      expect(extractMemberIdHint({})).toBeNull();
    });
  });
});
