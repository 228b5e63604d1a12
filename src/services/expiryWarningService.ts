import type { ReconcilerConfig } from '../config';
import type { SubscriptionRepository } from '../repositories';
import type { SubscriptionRecord } from '../types/subscription';
import { DAY_MS, formatError } from '../utils/helpers';
import { logger } from '../utils/logger';
import { recordWarning } from '../utils/metrics';
import type { Notifier } from './directory/types';
import { renderExpiryWarning } from './messages';
import type { ReconciliationLogService } from './reconciliationLogService';

export type WarningConfig = Pick<ReconcilerConfig, 'warningLeadDays' | 'renewUrl' | 'supportContact'>;

export interface WarningLeadResult {
  leadDays: number;
  due: number;
  sent: number;
  failed: number;
  alreadySent: number;
}

export type WarningRunResult =
  | { status: 'skipped'; reason: 'already_running' }
  | { status: 'completed'; startedAt: Date; leads: WarningLeadResult[]; sent: number; failed: number };

export interface ExpiryWarningServiceDeps {
  subscriptions: SubscriptionRepository;
  logs: ReconciliationLogService;
  notifier: Notifier;
  config: WarningConfig;
  now?: () => Date;
}

/**
 * Warns members ahead of expiry, once per lead time and expiry date. A renewal moves the
 * expiry, so the next period gets its own set of warnings. Failed sends are retried on
 * the next run while the subscription is still inside the window.
 */
export class ExpiryWarningService {
  private readonly subscriptions: SubscriptionRepository;
  private readonly logs: ReconciliationLogService;
  private readonly notifier: Notifier;
  private readonly config: WarningConfig;
  private readonly now: () => Date;
  private running = false;

  constructor(deps: ExpiryWarningServiceDeps) {
    this.subscriptions = deps.subscriptions;
    this.logs = deps.logs;
    this.notifier = deps.notifier;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  async run(): Promise<WarningRunResult> {
    if (this.running) {
      logger.warn('[Warnings] Previous run still in progress, skipping');
      return { status: 'skipped', reason: 'already_running' };
    }

    this.running = true;
    try {
      const startedAt = this.now();
      const leads: WarningLeadResult[] = [];

      for (const leadDays of this.config.warningLeadDays) {
        leads.push(await this.runLead(leadDays, startedAt));
      }

      const sent = leads.reduce((sum, lead) => sum + lead.sent, 0);
      const failed = leads.reduce((sum, lead) => sum + lead.failed, 0);
      logger.info(`[Warnings] Sent ${sent} warning(s), ${failed} failed`);

      return { status: 'completed', startedAt, leads, sent, failed };
    } finally {
      this.running = false;
    }
  }

  private async runLead(leadDays: number, now: Date): Promise<WarningLeadResult> {
    const from = new Date(now.getTime() + leadDays * DAY_MS);
    const to = new Date(from.getTime() + DAY_MS);
    const due = await this.subscriptions.findActiveExpiringBetween(from, to);

    const result: WarningLeadResult = { leadDays, due: due.length, sent: 0, failed: 0, alreadySent: 0 };

    for (const subscription of due) {
      const outcome = await this.warn(subscription, leadDays);
      if (outcome === 'sent') result.sent++;
      else if (outcome === 'failed') result.failed++;
      else if (outcome === 'already_sent') result.alreadySent++;
    }

    return result;
  }

  private async warn(
    subscription: SubscriptionRecord,
    leadDays: number
  ): Promise<'sent' | 'failed' | 'already_sent' | 'not_eligible'> {
    const { memberId, expiresAt } = subscription;
    if (!memberId || !expiresAt) {
      return 'not_eligible';
    }

    if (await this.logs.warningAlreadySent(subscription.id, leadDays, expiresAt)) {
      return 'already_sent';
    }

    let error: string | null = null;
    try {
      const response = await this.notifier.sendDirectMessage(
        memberId,
        renderExpiryWarning(this.config, leadDays, expiresAt)
      );
      if (!response.ok) {
        error = response.error;
      }
    } catch (sendError) {
      error = formatError(sendError);
    }

    const status = error ? 'failed' : 'sent';
    await this.logs.logNotification({
      subscriptionId: subscription.id,
      email: subscription.email,
      memberId,
      leadDays,
      expiresAt,
      status,
      error,
    });
    recordWarning(leadDays, status);

    if (error) {
      logger.warn(`[Warnings] ${leadDays}d warning for subscription ${subscription.id} failed: ${error}`);
    }
    return status;
  }
}
