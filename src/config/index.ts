import type { PlanType } from '../types/subscription';

export const config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '8000', 10),
  logLevel: process.env.LOG_LEVEL || 'info',

  // Database configuration
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    database: process.env.DB_NAME || 'membership_gate',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || undefined,
    maxConnections: parseInt(process.env.DB_MAX_CONNECTIONS || '10', 10),
  },

  // Redis configuration (BullMQ scheduler)
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD || undefined,
    db: parseInt(process.env.REDIS_DB || '0', 10),
  },

  bullmq: {
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { age: 2 * 24 * 60 * 60 },
      removeOnFail: { age: 7 * 24 * 60 * 60 },
    },
  },

  // Admin routes
  admin: {
    enabled: process.env.ADMIN_ENABLED === 'true',
    username: process.env.ADMIN_USERNAME || 'admin',
    password: process.env.ADMIN_PASSWORD || 'admin',
  },

  // External services
  slackWebhookUrl: process.env.SLACK_WEBHOOK_URL || '',
  stripeApiKey: process.env.STRIPE_API_KEY || '',
  stripeWebhookSecret: process.env.STRIPE_WEBHOOK_SECRET || '',
  telegram: {
    botToken: process.env.TELEGRAM_BOT_TOKEN || '',
    apiBaseUrl: process.env.TELEGRAM_API_URL || 'https://api.telegram.org',
    timeoutMs: parseInt(process.env.TELEGRAM_TIMEOUT_MS || '10000', 10),
  },
};

/**
 * Settings the reconciliation engine runs with. Built once at startup and
 * handed to each service; nothing below reads the environment on its own.
 */
export interface ReconcilerConfig {
  gracePeriodDays: number;
  sweepHour: number;
  notifyHour: number;
  timezone: string;
  autoRemovalEnabled: boolean;
  fallbackInviteEnabled: boolean;
  fallbackInviteLink: string | null;
  groupIds: string[];
  pricePlans: Record<string, PlanType>;
  renewUrl: string;
  supportContact: string;
  inviteTtlHours: number;
  inviteCooldownSeconds: number;
  heartbeatMinutes: number;
  eventRetentionDays: number;
  warningLeadDays: number[];
}

type Env = Record<string, string | undefined>;

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function hourFrom(value: string | undefined, fallback: number): number {
  const hour = intFrom(value, fallback);
  return hour >= 0 && hour <= 23 ? hour : fallback;
}

/**
 * Parse a comma separated list of chat ids. Telegram group ids are signed
 * integers; anything else is dropped.
 */
export function parseGroupIds(raw: string | undefined): string[] {
  return (raw || '')
    .split(',')
    .map((part) => part.trim())
    .filter((part) => /^-?\d+$/.test(part));
}

function buildPricePlans(env: Env): Record<string, PlanType> {
  const entries: Array<[string, PlanType]> = [
    [(env.PRICE_MONTHLY_ID || '').trim(), 'monthly'],
    [(env.PRICE_QUARTERLY_ID || '').trim(), 'quarterly'],
    [(env.PRICE_ANNUAL_ID || '').trim(), 'annual'],
  ];

  const plans: Record<string, PlanType> = {};
  for (const [priceId, plan] of entries) {
    if (priceId) {
      plans[priceId] = plan;
    }
  }
  return plans;
}

export function loadReconcilerConfig(env: Env = process.env): ReconcilerConfig {
  return {
    gracePeriodDays: Math.max(0, intFrom(env.GRACE_PERIOD_DAYS, 3)),
    sweepHour: hourFrom(env.SWEEP_HOUR, 3),
    notifyHour: hourFrom(env.NOTIFY_HOUR, 10),
    timezone: env.TIMEZONE || 'UTC',
    autoRemovalEnabled: env.AUTO_REMOVAL_ENABLED !== 'false',
    fallbackInviteEnabled: env.FALLBACK_INVITE_ENABLED === 'true',
    fallbackInviteLink: env.FALLBACK_INVITE_LINK || null,
    groupIds: parseGroupIds(env.GROUP_IDS),
    pricePlans: buildPricePlans(env),
    renewUrl: env.RENEW_URL || '',
    supportContact: env.SUPPORT_CONTACT || '',
    inviteTtlHours: Math.max(1, intFrom(env.INVITE_TTL_HOURS, 24)),
    inviteCooldownSeconds: Math.max(0, intFrom(env.INVITE_COOLDOWN_SECONDS, 300)),
    heartbeatMinutes: Math.max(1, intFrom(env.HEARTBEAT_MINUTES, 15)),
    eventRetentionDays: Math.max(1, intFrom(env.EVENT_RETENTION_DAYS, 90)),
    warningLeadDays: [7, 3, 1, 0],
  };
}
