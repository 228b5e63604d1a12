import { Counter, Histogram, Gauge, Registry, register as defaultRegister } from 'prom-client';
import { logger } from './logger';

export const metricsRegistry: Registry = defaultRegister;

/**
 * Billing events by type and ingestion outcome
 */
export const billingEventsCounter = new Counter({
  name: 'membership_billing_events_total',
  help: 'Billing events received, by event type and outcome',
  labelNames: ['eventType', 'outcome'], // 'applied', 'duplicate', 'skipped', 'invalid', 'error'
  registers: [metricsRegistry],
});

/**
 * Subscription changes by reducer classification
 */
export const subscriptionChangesCounter = new Counter({
  name: 'membership_subscription_changes_total',
  help: 'Subscription state changes caused by billing events',
  labelNames: ['classification'], // 'created', 'extended', 'activated', 'deactivated', 'unchanged'
  registers: [metricsRegistry],
});

/**
 * Sweep candidate outcomes
 */
export const sweepOutcomesCounter = new Counter({
  name: 'membership_sweep_outcomes_total',
  help: 'Removal sweep outcomes per candidate',
  labelNames: ['status'], // 'success', 'failed', 'whitelisted', 'no_member_id', 'invalid_member_id', 'error', 'superseded'
  registers: [metricsRegistry],
});

export const sweepRunsCounter = new Counter({
  name: 'membership_sweep_runs_total',
  help: 'Removal sweep runs by trigger and result',
  labelNames: ['trigger', 'result'], // result: 'completed', 'disabled', 'already_running', 'no_groups'
  registers: [metricsRegistry],
});

export const warningsCounter = new Counter({
  name: 'membership_expiry_warnings_total',
  help: 'Advance expiry warnings by lead days and status',
  labelNames: ['leadDays', 'status'], // status: 'sent', 'failed'
  registers: [metricsRegistry],
});

export const invitesCounter = new Counter({
  name: 'membership_invites_total',
  help: 'Invite links handed out by source',
  labelNames: ['source'], // 'created', 'reused', 'fallback', 'failed'
  registers: [metricsRegistry],
});

export const slackAlertsSentCounter = new Counter({
  name: 'membership_slack_alerts_sent_total',
  help: 'Total number of Slack alerts sent',
  labelNames: ['alertType'],
  registers: [metricsRegistry],
});

// ===== Histograms =====

export const sweepDurationHistogram = new Histogram({
  name: 'membership_sweep_duration_seconds',
  help: 'Duration of removal sweep runs in seconds',
  buckets: [0.5, 1, 5, 10, 30, 60, 120, 300, 600],
  registers: [metricsRegistry],
});

/**
 * Queue job processing time
 */
export const queueJobDurationHistogram = new Histogram({
  name: 'membership_queue_job_duration_ms',
  help: 'Maintenance job processing duration in milliseconds',
  labelNames: ['jobType', 'status'],
  buckets: [100, 500, 1000, 2000, 5000, 10000, 30000, 120000],
  registers: [metricsRegistry],
});

// ===== Gauges =====

export const gracePeriodGauge = new Gauge({
  name: 'membership_grace_period_subscriptions',
  help: 'Active subscriptions currently inside the grace period',
  registers: [metricsRegistry],
});

export const lastHeartbeatGauge = new Gauge({
  name: 'membership_last_heartbeat_timestamp_seconds',
  help: 'Unix time of the last scheduler heartbeat',
  registers: [metricsRegistry],
});

// ===== Helper Functions =====

export function recordBillingEvent(eventType: string, outcome: string): void {
  try {
    billingEventsCounter.labels(eventType, outcome).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording billing event', { error });
  }
}

export function recordSubscriptionChange(classification: string): void {
  try {
    subscriptionChangesCounter.labels(classification).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording subscription change', { error });
  }
}

export function recordSweepOutcome(status: string): void {
  try {
    sweepOutcomesCounter.labels(status).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording sweep outcome', { error });
  }
}

/**
 * Record a finished (or skipped) sweep run
 */
export function recordSweepRun(trigger: string, result: string, durationSeconds?: number): void {
  try {
    sweepRunsCounter.labels(trigger, result).inc();
    if (durationSeconds !== undefined) {
      sweepDurationHistogram.observe(durationSeconds);
    }
  } catch (error) {
    logger.error('[Metrics] Error recording sweep run', { error });
  }
}

export function recordWarning(leadDays: number, status: 'sent' | 'failed'): void {
  try {
    warningsCounter.labels(String(leadDays), status).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording warning', { error });
  }
}

export function recordInvite(source: 'created' | 'reused' | 'fallback' | 'failed'): void {
  try {
    invitesCounter.labels(source).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording invite', { error });
  }
}

/**
 * Record a Slack alert sent
 */
export function recordSlackAlert(alertType: string): void {
  try {
    slackAlertsSentCounter.labels(alertType).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording Slack alert', { error });
  }
}

export function recordJobDuration(jobType: string, status: 'completed' | 'failed', durationMs: number): void {
  try {
    queueJobDurationHistogram.labels(jobType, status).observe(durationMs);
  } catch (error) {
    logger.error('[Metrics] Error recording job duration', { error });
  }
}

export function updateGracePeriodCount(count: number): void {
  try {
    gracePeriodGauge.set(count);
  } catch (error) {
    logger.error('[Metrics] Error updating grace period gauge', { error });
  }
}

export function recordHeartbeat(at: Date): void {
  try {
    lastHeartbeatGauge.set(Math.floor(at.getTime() / 1000));
  } catch (error) {
    logger.error('[Metrics] Error recording heartbeat', { error });
  }
}

/**
 * Get all metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}
