import { loadReconcilerConfig, type ReconcilerConfig } from '../config';
import { db } from '../db';
import { createDrizzleRepositories, type Repositories } from '../repositories';
import { logger } from '../utils/logger';
import { AccessService } from './accessService';
import { BillingEventService } from './billingEventService';
import { getDirectory } from './directory';
import type { MembershipDirectory, Notifier } from './directory/types';
import { EventDeduplicator } from './eventDeduplicator';
import { ExpiryWarningService } from './expiryWarningService';
import { ReconciliationLogService } from './reconciliationLogService';
import { sendSweepSummary } from './slackService';
import { SweepService, type CompletedSweep } from './sweepService';
import { WhitelistService } from './whitelistService';

export interface Reconciler {
  config: ReconcilerConfig;
  repositories: Repositories;
  deduplicator: EventDeduplicator;
  billingEvents: BillingEventService;
  whitelist: WhitelistService;
  logs: ReconciliationLogService;
  sweep: SweepService;
  warnings: ExpiryWarningService;
  access: AccessService;
}

export interface ReconcilerOptions {
  config: ReconcilerConfig;
  repositories: Repositories;
  directory: MembershipDirectory;
  notifier: Notifier;
  onSweepCompleted?: (result: CompletedSweep) => Promise<void>;
  now?: () => Date;
}

/**
 * Build every service of the engine over one set of repositories and one directory.
 */
export function createReconciler(options: ReconcilerOptions): Reconciler {
  const { config, repositories, directory, notifier, now } = options;

  const deduplicator = new EventDeduplicator(repositories.processedEvents);
  const whitelist = new WhitelistService(repositories.whitelist);
  const logs = new ReconciliationLogService(repositories.removalLogs, repositories.notificationLogs);

  return {
    config,
    repositories,
    deduplicator,
    whitelist,
    logs,
    billingEvents: new BillingEventService({
      subscriptions: repositories.subscriptions,
      deduplicator,
      config,
      now,
    }),
    sweep: new SweepService({
      subscriptions: repositories.subscriptions,
      whitelist,
      logs,
      directory,
      notifier,
      config,
      onCompleted: options.onSweepCompleted,
      now,
    }),
    warnings: new ExpiryWarningService({
      subscriptions: repositories.subscriptions,
      logs,
      notifier,
      config,
      now,
    }),
    access: new AccessService({
      subscriptions: repositories.subscriptions,
      inviteLogs: repositories.inviteLogs,
      directory,
      config,
      now,
    }),
  };
}

let reconciler: Reconciler | null = null;

/**
 * Set up the process-wide engine. Without an argument it runs on Postgres, Telegram and
 * the environment configuration.
 */
export function initializeReconciler(instance?: Reconciler): Reconciler {
  if (instance) {
    reconciler = instance;
    return reconciler;
  }

  const config = loadReconcilerConfig();
  const directory = getDirectory();

  reconciler = createReconciler({
    config,
    repositories: createDrizzleRepositories(db),
    directory,
    notifier: directory,
    onSweepCompleted: sendSweepSummary,
  });

  logger.info('[Reconciler] Initialized', {
    groups: config.groupIds.length,
    gracePeriodDays: config.gracePeriodDays,
    autoRemovalEnabled: config.autoRemovalEnabled,
    timezone: config.timezone,
  });
  if (config.groupIds.length === 0) {
    logger.warn('[Reconciler] GROUP_IDS is empty; sweeps and invites will do nothing');
  }
  if (Object.keys(config.pricePlans).length === 0) {
    logger.warn('[Reconciler] No PRICE_*_ID configured; plans will be inferred from invoice descriptions');
  }

  return reconciler;
}

export function getReconciler(): Reconciler {
  if (!reconciler) {
    throw new Error('Reconciler not initialized. Call initializeReconciler() first.');
  }
  return reconciler;
}
