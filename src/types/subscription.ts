export const SUBSCRIPTION_STATUSES = [
  'pending',
  'active',
  'past_due',
  'canceled',
  'auto_removed',
  'manually_removed',
] as const;

export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

/** Set only by the sweep or an administrator; billing events do not overwrite them. */
export const TERMINAL_STATUSES: readonly SubscriptionStatus[] = ['auto_removed', 'manually_removed'];

export const PLAN_TYPES = ['monthly', 'quarterly', 'annual'] as const;

export type PlanType = (typeof PLAN_TYPES)[number];

export const PLAN_DURATION_DAYS: Record<PlanType, number> = {
  monthly: 30,
  quarterly: 90,
  annual: 365,
};

/**
 * Everything about a subscription that billing events can change.
 * `expiresAt === null` means no known expiry: such a record is never auto-removed
 * while active.
 */
export interface SubscriptionState {
  email: string;
  fullName: string | null;
  memberId: string | null;
  stripeCustomerId: string | null;
  stripeSessionId: string | null;
  stripeSubscriptionId: string | null;
  lastInvoiceId: string | null;
  plan: PlanType | null;
  status: SubscriptionStatus;
  expiresAt: Date | null;
}

export interface SubscriptionRecord extends SubscriptionState {
  id: number;
  createdAt: Date;
  updatedAt: Date;
}

export type RemovalReason = 'expired' | 'cancelled';

export const REMOVAL_LOG_STATUSES = [
  'processing',
  'success',
  'failed',
  'whitelisted',
  'no_member_id',
  'invalid_member_id',
  'error',
  // Removed from groups, but a billing event changed the record before it was marked
  'superseded',
] as const;

export type RemovalLogStatus = (typeof REMOVAL_LOG_STATUSES)[number];

export interface RemovalLogEntry {
  id: number;
  runId: string;
  subscriptionId: number;
  email: string;
  memberId: string | null;
  reason: RemovalReason;
  status: RemovalLogStatus;
  groupsRemoved: string[];
  groupsFailed: string[];
  notificationSent: boolean;
  error: string | null;
  createdAt: Date;
}

export type NewRemovalLogEntry = Omit<RemovalLogEntry, 'id' | 'createdAt'>;

export type NotificationLogStatus = 'sent' | 'failed';

export interface NotificationLogEntry {
  id: number;
  subscriptionId: number;
  email: string;
  memberId: string;
  leadDays: number;
  expiresAt: Date;
  status: NotificationLogStatus;
  error: string | null;
  createdAt: Date;
}

export type NewNotificationLogEntry = Omit<NotificationLogEntry, 'id' | 'createdAt'>;

export interface WhitelistEntry {
  memberId: string;
  email: string | null;
  reason: string;
  addedBy: string;
  createdAt: Date;
}

export interface InviteLogEntry {
  id: number;
  email: string;
  memberId: string | null;
  groupId: string;
  inviteLink: string;
  memberLimit: number;
  isTemporary: boolean;
  expiresAt: Date | null;
  createdAt: Date;
}

export type NewInviteLogEntry = Omit<InviteLogEntry, 'id' | 'createdAt'>;

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * `updated_at` for a write that replaces the version stamped `previous`. Always moves
 * forward, so two writes inside the same millisecond still carry different versions.
 */
export function nextUpdatedAt(previous: Date, now: Date): Date {
  return now.getTime() > previous.getTime() ? now : new Date(previous.getTime() + 1);
}

export function isTerminalStatus(status: SubscriptionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isSubscriptionStatus(value: string): value is SubscriptionStatus {
  return (SUBSCRIPTION_STATUSES as readonly string[]).includes(value);
}

export function isPlanType(value: string): value is PlanType {
  return (PLAN_TYPES as readonly string[]).includes(value);
}
