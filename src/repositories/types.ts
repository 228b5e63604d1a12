import type {
  InviteLogEntry,
  NewInviteLogEntry,
  NewNotificationLogEntry,
  NewRemovalLogEntry,
  NotificationLogEntry,
  RemovalLogEntry,
  SubscriptionRecord,
  SubscriptionState,
  SubscriptionStatus,
  WhitelistEntry,
} from '../types/subscription';

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface SubscriptionListOptions extends ListOptions {
  status?: SubscriptionStatus;
}

/**
 * Durable subscription table. One record per normalized email; lookups by the Stripe
 * subscription and customer ids are secondary.
 */
export interface SubscriptionRepository {
  findById(id: number): Promise<SubscriptionRecord | null>;
  findByEmail(email: string): Promise<SubscriptionRecord | null>;
  findByStripeSubscriptionId(stripeSubscriptionId: string): Promise<SubscriptionRecord | null>;
  findByStripeCustomerId(stripeCustomerId: string): Promise<SubscriptionRecord | null>;
  create(state: SubscriptionState): Promise<SubscriptionRecord>;
  update(id: number, state: SubscriptionState): Promise<SubscriptionRecord>;
  /**
   * Optimistic write: applies only while the stored `updatedAt` still equals
   * `expectedUpdatedAt`. Resolves null when another writer got there first.
   */
  updateIfUnchanged(id: number, expectedUpdatedAt: Date, state: SubscriptionState): Promise<SubscriptionRecord | null>;
  /** Status-only variant of `updateIfUnchanged`; resolves whether the row was written. */
  updateStatusIfUnchanged(id: number, expectedUpdatedAt: Date, status: SubscriptionStatus): Promise<boolean>;
  delete(id: number): Promise<boolean>;
  list(options?: SubscriptionListOptions): Promise<SubscriptionRecord[]>;
  /** Active records past expiry + grace, and canceled records with no remaining paid time. */
  findRemovalCandidates(now: Date, gracePeriodDays: number): Promise<SubscriptionRecord[]>;
  findInGracePeriod(now: Date, gracePeriodDays: number): Promise<SubscriptionRecord[]>;
  /** Active records with a member id whose expiry falls in [from, to). */
  findActiveExpiringBetween(from: Date, to: Date): Promise<SubscriptionRecord[]>;
}

export interface ProcessedEventRepository {
  exists(eventId: string): Promise<boolean>;
  insert(eventId: string, eventType: string): Promise<void>;
  deleteOlderThan(cutoff: Date): Promise<number>;
}

export interface WhitelistRepository {
  findByMemberId(memberId: string): Promise<WhitelistEntry | null>;
  findByEmail(email: string): Promise<WhitelistEntry | null>;
  list(): Promise<WhitelistEntry[]>;
  upsert(entry: Omit<WhitelistEntry, 'createdAt'>): Promise<WhitelistEntry>;
  remove(memberId: string): Promise<boolean>;
}

export interface RemovalLogListOptions extends ListOptions {
  subscriptionId?: number;
  runId?: string;
}

export interface RemovalLogRepository {
  append(entry: NewRemovalLogEntry): Promise<RemovalLogEntry>;
  list(options?: RemovalLogListOptions): Promise<RemovalLogEntry[]>;
}

export interface NotificationLogRepository {
  append(entry: NewNotificationLogEntry): Promise<NotificationLogEntry>;
  hasSent(subscriptionId: number, leadDays: number, expiresAt: Date): Promise<boolean>;
  list(options?: ListOptions & { subscriptionId?: number }): Promise<NotificationLogEntry[]>;
}

export interface InviteLogRepository {
  append(entry: NewInviteLogEntry): Promise<InviteLogEntry>;
  findRecent(email: string, groupId: string, since: Date): Promise<InviteLogEntry | null>;
}

export interface Repositories {
  subscriptions: SubscriptionRepository;
  processedEvents: ProcessedEventRepository;
  whitelist: WhitelistRepository;
  removalLogs: RemovalLogRepository;
  notificationLogs: NotificationLogRepository;
  inviteLogs: InviteLogRepository;
}
