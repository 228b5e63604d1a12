import type { DbType } from '../db';
import { DrizzleProcessedEventRepository, DrizzleWhitelistRepository } from './eventAndWhitelistRepositories';
import {
  DrizzleInviteLogRepository,
  DrizzleNotificationLogRepository,
  DrizzleRemovalLogRepository,
} from './logRepositories';
import { DrizzleSubscriptionRepository } from './subscriptionRepository';
import type { Repositories } from './types';

export function createDrizzleRepositories(db: DbType): Repositories {
  return {
    subscriptions: new DrizzleSubscriptionRepository(db),
    processedEvents: new DrizzleProcessedEventRepository(db),
    whitelist: new DrizzleWhitelistRepository(db),
    removalLogs: new DrizzleRemovalLogRepository(db),
    notificationLogs: new DrizzleNotificationLogRepository(db),
    inviteLogs: new DrizzleInviteLogRepository(db),
  };
}

export * from './types';
