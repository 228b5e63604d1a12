import type { ReconcilerConfig } from '../config';
import type { SubscriptionRepository } from '../repositories';
import type { SubscriptionRecord } from '../types/subscription';
import { logger } from '../utils/logger';
import { recordBillingEvent, recordSubscriptionChange } from '../utils/metrics';
import { redactEmail } from '../utils/redact';
import type { BillingEvent } from './billingEvents';
import type { EventDeduplicator } from './eventDeduplicator';
import { reduceBillingEvent, type ReduceClassification, type SkipReason } from './eventReducer';

export type IngestResult =
  | { status: 'duplicate'; eventId: string; eventType: string }
  | { status: 'skipped'; eventId: string; eventType: string; reason: SkipReason }
  | {
      status: 'applied';
      eventId: string;
      eventType: string;
      classification: ReduceClassification;
      subscriptionId: number;
      changed: boolean;
    };

const MAX_WRITE_ATTEMPTS = 2;

/** The target record changed under every attempt; the provider re-delivers the event. */
export class SubscriptionConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SubscriptionConflictError';
  }
}

export interface BillingEventServiceDeps {
  subscriptions: SubscriptionRepository;
  deduplicator: EventDeduplicator;
  config: Pick<ReconcilerConfig, 'pricePlans'>;
  now?: () => Date;
}

/**
 * Billing event ingestion
 *
 * dedup check → resolve the target record → reduce → save → record the event id.
 * The event id is written last, so a crash in between leads to a re-delivery that the
 * reducer absorbs. Saves are conditional on the record's `updatedAt`: when the sweep or
 * another event wrote first, the record is re-read and the event reduced again once.
 * Storage errors propagate to the caller.
 */
export class BillingEventService {
  private readonly subscriptions: SubscriptionRepository;
  private readonly deduplicator: EventDeduplicator;
  private readonly config: Pick<ReconcilerConfig, 'pricePlans'>;
  private readonly now: () => Date;

  constructor(deps: BillingEventServiceDeps) {
    this.subscriptions = deps.subscriptions;
    this.deduplicator = deps.deduplicator;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  async ingest(event: BillingEvent): Promise<IngestResult> {
    const { eventId, type: eventType } = event;

    if (await this.deduplicator.alreadyProcessed(eventId)) {
      recordBillingEvent(eventType, 'duplicate');
      return { status: 'duplicate', eventId, eventType };
    }

    let current = await this.resolveTarget(event);
    for (let attempt = 1; ; attempt++) {
      const result = await this.apply(event, current);
      if (result) {
        return result;
      }

      // Only reachable with a stored record: creates never conflict this way
      const conflictedId = current ? current.id : null;
      if (conflictedId === null || attempt >= MAX_WRITE_ATTEMPTS) {
        throw new SubscriptionConflictError(
          `Subscription ${conflictedId ?? 'unknown'} kept changing while applying ${eventType} ${eventId}`
        );
      }
      logger.warn(`[Billing] Subscription ${conflictedId} changed while applying ${eventType}, re-reading`, {
        eventId,
        attempt,
      });
      current = await this.subscriptions.findById(conflictedId);
    }
  }

  /**
   * Reduce one event against `current` and persist the result. Resolves null when the
   * stored record moved on since it was read.
   */
  private async apply(event: BillingEvent, current: SubscriptionRecord | null): Promise<IngestResult | null> {
    const { eventId, type: eventType } = event;
    const outcome = reduceBillingEvent(current, event, {
      now: this.now(),
      pricePlans: this.config.pricePlans,
    });

    if (outcome.kind === 'skipped') {
      if (outcome.reason !== 'ignored_event_type') {
        logger.warn(`[Billing] Skipped ${eventType} ${eventId}: ${outcome.reason}`);
      }
      await this.deduplicator.record(eventId, eventType);
      recordBillingEvent(eventType, 'skipped');
      return { status: 'skipped', eventId, eventType, reason: outcome.reason };
    }

    let saved: SubscriptionRecord | null;
    if (!current) {
      saved = await this.subscriptions.create(outcome.next);
    } else if (outcome.changed) {
      saved = await this.subscriptions.updateIfUnchanged(current.id, current.updatedAt, outcome.next);
    } else {
      saved = current;
    }

    if (!saved) {
      return null;
    }

    const email = redactEmail(outcome.next.email);
    if (outcome.planSource === 'description') {
      logger.warn(`[Billing] Plan for ${email} inferred from invoice description`, {
        eventId,
        plan: outcome.next.plan,
      });
    }
    if (outcome.expiryUnknown) {
      logger.warn(`[Billing] Invoice ${eventId} for ${email} has no period end and no known plan; expiry unchanged`);
    }

    await this.deduplicator.record(eventId, eventType);

    recordBillingEvent(eventType, 'applied');
    recordSubscriptionChange(outcome.classification);

    const subscriptionId = saved.id;
    logger.info(`[Billing] ${eventType} → ${outcome.classification}`, {
      eventId,
      subscriptionId,
      email,
      status: outcome.next.status,
      expiresAt: outcome.next.expiresAt ? outcome.next.expiresAt.toISOString() : null,
    });

    return {
      status: 'applied',
      eventId,
      eventType,
      classification: outcome.classification,
      subscriptionId,
      changed: outcome.changed,
    };
  }

  /**
   * Which stored record an event targets. Checkout sessions and invoices are keyed by
   * email; invoices and subscription events fall back to the Stripe ids.
   */
  private async resolveTarget(event: BillingEvent): Promise<SubscriptionRecord | null> {
    switch (event.kind) {
      case 'checkout_completed':
        return event.session.email ? this.subscriptions.findByEmail(event.session.email) : null;

      case 'invoice_paid': {
        const { email, stripeSubscriptionId } = event.invoice;
        const byEmail = email ? await this.subscriptions.findByEmail(email) : null;
        if (byEmail) return byEmail;
        return stripeSubscriptionId ? this.subscriptions.findByStripeSubscriptionId(stripeSubscriptionId) : null;
      }

      case 'subscription_updated':
      case 'subscription_deleted': {
        const { stripeSubscriptionId, stripeCustomerId } = event.subscription;
        const bySubscription = await this.subscriptions.findByStripeSubscriptionId(stripeSubscriptionId);
        if (bySubscription) return bySubscription;
        return stripeCustomerId ? this.subscriptions.findByStripeCustomerId(stripeCustomerId) : null;
      }

      case 'ignored':
        return null;
    }
  }
}
