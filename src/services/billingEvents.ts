import { z } from 'zod';
import { digitsOnly } from '../utils/helpers';
import { normalizeEmail } from '../types/subscription';

/**
 * Billing event parsing
 *
 * Turns a verified Stripe event (plain JSON) into a closed union of the event kinds the
 * reducer understands. Only the fields the reducer needs survive; everything else in the
 * payload is dropped here.
 */

export interface CheckoutSessionPayload {
  sessionId: string | null;
  email: string | null;
  fullName: string | null;
  memberIdHint: string | null;
  mode: string | null;
  paid: boolean;
  stripeCustomerId: string | null;
  stripeSubscriptionId: string | null;
}

export interface InvoicePayload {
  invoiceId: string | null;
  email: string | null;
  stripeCustomerId: string | null;
  stripeSubscriptionId: string | null;
  priceId: string | null;
  periodEnd: Date | null;
  description: string | null;
}

export interface SubscriptionPayload {
  stripeSubscriptionId: string;
  stripeCustomerId: string | null;
  status: string;
}

export type BillingEvent =
  | { kind: 'checkout_completed'; eventId: string; type: string; session: CheckoutSessionPayload }
  | { kind: 'invoice_paid'; eventId: string; type: string; invoice: InvoicePayload }
  | { kind: 'subscription_updated'; eventId: string; type: string; subscription: SubscriptionPayload }
  | { kind: 'subscription_deleted'; eventId: string; type: string; subscription: SubscriptionPayload }
  | { kind: 'ignored'; eventId: string; type: string };

export type BillingEventKind = BillingEvent['kind'];

export type ParseBillingEventResult = { ok: true; event: BillingEvent } | { ok: false; error: string };

const optionalString = z.string().nullish();

// Stripe sends ids as strings, or as objects when the field was expanded
const expandableId = z
  .union([z.string(), z.object({ id: z.string() })])
  .nullish()
  .transform((value) => (typeof value === 'string' ? value : value?.id ?? null));

const customFieldSchema = z.object({
  key: optionalString,
  label: z.object({ custom: optionalString }).nullish(),
  text: z.object({ value: optionalString }).nullish(),
  numeric: z.object({ value: optionalString }).nullish(),
});

const checkoutSessionSchema = z.object({
  id: optionalString,
  mode: optionalString,
  payment_status: optionalString,
  customer: expandableId,
  subscription: expandableId,
  customer_email: optionalString,
  customer_details: z.object({ email: optionalString, name: optionalString }).nullish(),
  custom_fields: z.array(customFieldSchema).nullish(),
  metadata: z.record(z.string()).nullish(),
});

const invoiceLineSchema = z.object({
  description: optionalString,
  price: z.object({ id: z.string() }).nullish(),
  pricing: z.object({ price_details: z.object({ price: expandableId }).nullish() }).nullish(),
  period: z.object({ end: z.number().nullish() }).nullish(),
});

const invoiceSchema = z.object({
  id: optionalString,
  customer: expandableId,
  customer_email: optionalString,
  subscription: expandableId,
  parent: z
    .object({ subscription_details: z.object({ subscription: expandableId }).nullish() })
    .nullish(),
  lines: z.object({ data: z.array(invoiceLineSchema) }).nullish(),
});

const subscriptionSchema = z.object({
  id: z.string().min(1),
  customer: expandableId,
  status: z.string(),
});

const eventEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  data: z.object({ object: z.unknown() }),
});

type CustomField = z.infer<typeof customFieldSchema>;

function isMemberIdField(field: CustomField): boolean {
  const key = (field.key || '').toLowerCase();
  const label = (field.label?.custom || '').toLowerCase();
  return key.includes('telegram') || label.includes('telegram');
}

/**
 * Member id hint from the checkout form: a "telegram" custom field (text value first,
 * then numeric), falling back to `metadata.telegram_id`. Digits only.
 */
export function extractMemberIdHint(
  session: Pick<z.infer<typeof checkoutSessionSchema>, 'custom_fields' | 'metadata'>
): string | null {
  const fields = (session.custom_fields || []).filter(isMemberIdField);

  for (const field of fields) {
    const fromText = digitsOnly(field.text?.value);
    if (fromText) return fromText;
  }
  for (const field of fields) {
    const fromNumeric = digitsOnly(field.numeric?.value);
    if (fromNumeric) return fromNumeric;
  }

  return digitsOnly(session.metadata?.telegram_id);
}

function cleanEmail(value: string | null | undefined): string | null {
  if (!value) return null;
  const email = normalizeEmail(value);
  return email.length > 0 ? email : null;
}

function cleanText(value: string | null | undefined): string | null {
  const text = (value || '').trim();
  return text.length > 0 ? text : null;
}

function toCheckoutPayload(session: z.infer<typeof checkoutSessionSchema>): CheckoutSessionPayload {
  return {
    sessionId: session.id ?? null,
    email: cleanEmail(session.customer_details?.email) ?? cleanEmail(session.customer_email),
    fullName: cleanText(session.customer_details?.name),
    memberIdHint: extractMemberIdHint(session),
    mode: session.mode ?? null,
    paid: session.payment_status === 'paid',
    stripeCustomerId: session.customer,
    stripeSubscriptionId: session.subscription,
  };
}

function toInvoicePayload(invoice: z.infer<typeof invoiceSchema>): InvoicePayload {
  const line = invoice.lines?.data[0];
  const periodEnd = line?.period?.end;

  return {
    invoiceId: invoice.id ?? null,
    email: cleanEmail(invoice.customer_email),
    stripeCustomerId: invoice.customer,
    stripeSubscriptionId: invoice.subscription ?? invoice.parent?.subscription_details?.subscription ?? null,
    priceId: line?.price?.id ?? line?.pricing?.price_details?.price ?? null,
    periodEnd: typeof periodEnd === 'number' ? new Date(periodEnd * 1000) : null,
    description: cleanText(line?.description),
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseBillingEvent(raw: unknown): ParseBillingEventResult {
  const envelope = eventEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return { ok: false, error: `Invalid event envelope: ${describeIssues(envelope.error)}` };
  }

  const { id: eventId, type, data } = envelope.data;

  switch (type) {
    case 'checkout.session.completed': {
      const session = checkoutSessionSchema.safeParse(data.object);
      if (!session.success) {
        return { ok: false, error: `Invalid checkout session: ${describeIssues(session.error)}` };
      }
      return { ok: true, event: { kind: 'checkout_completed', eventId, type, session: toCheckoutPayload(session.data) } };
    }

    case 'invoice.paid':
    case 'invoice.payment_succeeded': {
      const invoice = invoiceSchema.safeParse(data.object);
      if (!invoice.success) {
        return { ok: false, error: `Invalid invoice: ${describeIssues(invoice.error)}` };
      }
      return { ok: true, event: { kind: 'invoice_paid', eventId, type, invoice: toInvoicePayload(invoice.data) } };
    }

    case 'customer.subscription.updated':
    case 'customer.subscription.deleted': {
      const subscription = subscriptionSchema.safeParse(data.object);
      if (!subscription.success) {
        return { ok: false, error: `Invalid subscription: ${describeIssues(subscription.error)}` };
      }
      const payload: SubscriptionPayload = {
        stripeSubscriptionId: subscription.data.id,
        stripeCustomerId: subscription.data.customer,
        status: subscription.data.status,
      };
      return {
        ok: true,
        event:
          type === 'customer.subscription.updated'
            ? { kind: 'subscription_updated', eventId, type, subscription: payload }
            : { kind: 'subscription_deleted', eventId, type, subscription: payload },
      };
    }

    default:
      return { ok: true, event: { kind: 'ignored', eventId, type } };
  }
}
