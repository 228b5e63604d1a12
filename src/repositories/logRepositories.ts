import { and, desc, eq, gte } from 'drizzle-orm';
import type { DbType } from '../db';
import {
  inviteLogs,
  notificationLogs,
  removalLogs,
  type InviteLogRow,
  type NotificationLogRow,
  type RemovalLogRow,
} from '../db/schema';
import {
  REMOVAL_LOG_STATUSES,
  normalizeEmail,
  type InviteLogEntry,
  type NewInviteLogEntry,
  type NewNotificationLogEntry,
  type NewRemovalLogEntry,
  type NotificationLogEntry,
  type RemovalLogEntry,
  type RemovalLogStatus,
} from '../types/subscription';
import type {
  InviteLogRepository,
  ListOptions,
  NotificationLogRepository,
  RemovalLogListOptions,
  RemovalLogRepository,
} from './types';

function toRemovalLogStatus(value: string): RemovalLogStatus {
  const match = REMOVAL_LOG_STATUSES.find((status) => status === value);
  return match ?? 'error';
}

function toRemovalLogEntry(row: RemovalLogRow): RemovalLogEntry {
  return {
    id: row.id,
    runId: row.runId,
    subscriptionId: row.subscriptionId,
    email: row.email,
    memberId: row.memberId,
    reason: row.reason === 'cancelled' ? 'cancelled' : 'expired',
    status: toRemovalLogStatus(row.status),
    groupsRemoved: row.groupsRemoved,
    groupsFailed: row.groupsFailed,
    notificationSent: row.notificationSent,
    error: row.error,
    createdAt: row.createdAt,
  };
}

export class DrizzleRemovalLogRepository implements RemovalLogRepository {
  constructor(private readonly db: DbType) {}

  async append(entry: NewRemovalLogEntry): Promise<RemovalLogEntry> {
    const [row] = await this.db.insert(removalLogs).values(entry).returning();
    return toRemovalLogEntry(row);
  }

  async list(options: RemovalLogListOptions = {}): Promise<RemovalLogEntry[]> {
    const filters = [
      options.subscriptionId !== undefined ? eq(removalLogs.subscriptionId, options.subscriptionId) : undefined,
      options.runId ? eq(removalLogs.runId, options.runId) : undefined,
    ];
    const rows = await this.db
      .select()
      .from(removalLogs)
      .where(and(...filters))
      .orderBy(desc(removalLogs.id))
      .limit(options.limit ?? 100)
      .offset(options.offset ?? 0);
    return rows.map(toRemovalLogEntry);
  }
}

function toNotificationLogEntry(row: NotificationLogRow): NotificationLogEntry {
  return {
    id: row.id,
    subscriptionId: row.subscriptionId,
    email: row.email,
    memberId: row.memberId,
    leadDays: row.leadDays,
    expiresAt: row.expiresAt,
    status: row.status === 'sent' ? 'sent' : 'failed',
    error: row.error,
    createdAt: row.createdAt,
  };
}

export class DrizzleNotificationLogRepository implements NotificationLogRepository {
  constructor(private readonly db: DbType) {}

  async append(entry: NewNotificationLogEntry): Promise<NotificationLogEntry> {
    const [row] = await this.db.insert(notificationLogs).values(entry).returning();
    return toNotificationLogEntry(row);
  }

  async hasSent(subscriptionId: number, leadDays: number, expiresAt: Date): Promise<boolean> {
    const rows = await this.db
      .select({ id: notificationLogs.id })
      .from(notificationLogs)
      .where(
        and(
          eq(notificationLogs.subscriptionId, subscriptionId),
          eq(notificationLogs.leadDays, leadDays),
          eq(notificationLogs.expiresAt, expiresAt),
          eq(notificationLogs.status, 'sent')
        )
      )
      .limit(1);
    return rows.length > 0;
  }

  async list(options: ListOptions & { subscriptionId?: number } = {}): Promise<NotificationLogEntry[]> {
    const rows = await this.db
      .select()
      .from(notificationLogs)
      .where(
        options.subscriptionId !== undefined
          ? eq(notificationLogs.subscriptionId, options.subscriptionId)
          : undefined
      )
      .orderBy(desc(notificationLogs.id))
      .limit(options.limit ?? 100)
      .offset(options.offset ?? 0);
    return rows.map(toNotificationLogEntry);
  }
}

function toInviteLogEntry(row: InviteLogRow): InviteLogEntry {
  return { ...row };
}

export class DrizzleInviteLogRepository implements InviteLogRepository {
  constructor(private readonly db: DbType) {}

  async append(entry: NewInviteLogEntry): Promise<InviteLogEntry> {
    const [row] = await this.db
      .insert(inviteLogs)
      .values({ ...entry, email: normalizeEmail(entry.email) })
      .returning();
    return toInviteLogEntry(row);
  }

  async findRecent(email: string, groupId: string, since: Date): Promise<InviteLogEntry | null> {
    const [row] = await this.db
      .select()
      .from(inviteLogs)
      .where(
        and(
          eq(inviteLogs.email, normalizeEmail(email)),
          eq(inviteLogs.groupId, groupId),
          gte(inviteLogs.createdAt, since)
        )
      )
      .orderBy(desc(inviteLogs.createdAt))
      .limit(1);
    return row ? toInviteLogEntry(row) : null;
  }
}
