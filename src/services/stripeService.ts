import Stripe from 'stripe';
import { config } from '../config';
import { logger } from '../utils/logger';
import { recordBillingEvent } from '../utils/metrics';
import { redactObject } from '../utils/redact';
import { parseBillingEvent } from './billingEvents';
import type { BillingEventService, IngestResult } from './billingEventService';

interface StripeHealthResponse {
  enabled: boolean;
  keyPresent: boolean;
  webhookSecretPresent: boolean;
}

export type WebhookResponse =
  | { received: true; status: IngestResult['status']; eventId: string; eventType: string }
  | { received: true; status: 'invalid'; error: string };

export class WebhookSignatureError extends Error {
  constructor(
    message: string,
    public readonly statusCode: 400 | 503 = 400
  ) {
    super(message);
    this.name = 'WebhookSignatureError';
  }
}

let stripeClient: Stripe | null = null;

function getStripeClient(): Stripe {
  if (!stripeClient) {
    stripeClient = new Stripe(config.stripeApiKey || '');
  }
  return stripeClient;
}

export function getStripeHealth(): StripeHealthResponse {
  const webhookSecretPresent = config.stripeWebhookSecret.trim() !== '';

  return {
    enabled: webhookSecretPresent,
    keyPresent: config.stripeApiKey.trim() !== '',
    webhookSecretPresent,
  };
}

/**
 * Verify the `Stripe-Signature` header against the raw request body and return the
 * decoded event. Throws `WebhookSignatureError` when the event must not be processed.
 */
export function verifyStripeEvent(
  rawPayload: string | Buffer,
  signature: string | undefined,
  webhookSecret: string = config.stripeWebhookSecret
): unknown {
  if (!webhookSecret.trim()) {
    logger.error('stripe.webhook secret not configured, rejecting event');
    throw new WebhookSignatureError('Webhook secret not configured', 503);
  }
  if (!signature) {
    throw new WebhookSignatureError('Missing Stripe-Signature header');
  }

  try {
    return getStripeClient().webhooks.constructEvent(rawPayload, signature, webhookSecret);
  } catch (error) {
    logger.warn('stripe.webhook signature validation failed', {
      error: error instanceof Error ? error.message : 'unknown',
    });
    throw new WebhookSignatureError('Invalid signature');
  }
}

/**
 * Verify, parse and ingest one webhook delivery. Malformed events are acknowledged so
 * Stripe stops re-sending them; storage errors propagate so it keeps re-sending.
 */
export async function handleStripeWebhook(
  rawPayload: string | Buffer,
  signature: string | undefined,
  billingEvents: BillingEventService
): Promise<WebhookResponse> {
  const verified = verifyStripeEvent(rawPayload, signature);

  const parsed = parseBillingEvent(verified);
  if (!parsed.ok) {
    logger.warn('stripe.webhook malformed event dropped', {
      error: parsed.error,
      payload: redactObject(verified),
    });
    recordBillingEvent('unknown', 'invalid');
    return { received: true, status: 'invalid', error: parsed.error };
  }

  const result = await billingEvents.ingest(parsed.event);
  return {
    received: true,
    status: result.status,
    eventId: result.eventId,
    eventType: result.eventType,
  };
}
