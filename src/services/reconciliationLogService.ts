import type {
  ListOptions,
  NotificationLogRepository,
  RemovalLogListOptions,
  RemovalLogRepository,
} from '../repositories';
import type {
  NewNotificationLogEntry,
  NewRemovalLogEntry,
  NotificationLogEntry,
  RemovalLogEntry,
  RemovalLogStatus,
} from '../types/subscription';

export interface RunSummary {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  counts: Partial<Record<RemovalLogStatus, number>>;
  entries: RemovalLogEntry[];
}

/**
 * Append-only audit trail of removal attempts and expiry warnings.
 */
export class ReconciliationLogService {
  constructor(
    private readonly removalLogs: RemovalLogRepository,
    private readonly notificationLogs: NotificationLogRepository
  ) {}

  async logRemoval(entry: NewRemovalLogEntry): Promise<RemovalLogEntry> {
    return this.removalLogs.append(entry);
  }

  async listRemovals(options: RemovalLogListOptions = {}): Promise<RemovalLogEntry[]> {
    return this.removalLogs.list(options);
  }

  async logNotification(entry: NewNotificationLogEntry): Promise<NotificationLogEntry> {
    return this.notificationLogs.append(entry);
  }

  async warningAlreadySent(subscriptionId: number, leadDays: number, expiresAt: Date): Promise<boolean> {
    return this.notificationLogs.hasSent(subscriptionId, leadDays, expiresAt);
  }

  async listNotifications(options: ListOptions & { subscriptionId?: number } = {}): Promise<NotificationLogEntry[]> {
    return this.notificationLogs.list(options);
  }

  /**
   * Final outcome per subscription of the most recent sweep that logged anything.
   * `processing` rows are superseded by the row written after them.
   */
  async lastRunSummary(): Promise<RunSummary | null> {
    const [latest] = await this.removalLogs.list({ limit: 1 });
    if (!latest) return null;

    const entries = await this.removalLogs.list({ runId: latest.runId, limit: 10_000 });
    const finalEntries = new Map<number, RemovalLogEntry>();
    // Newest first, so the first row seen per subscription is its final state
    for (const entry of entries) {
      if (!finalEntries.has(entry.subscriptionId)) {
        finalEntries.set(entry.subscriptionId, entry);
      }
    }

    const counts: Partial<Record<RemovalLogStatus, number>> = {};
    for (const entry of finalEntries.values()) {
      counts[entry.status] = (counts[entry.status] ?? 0) + 1;
    }

    const times = entries.map((entry) => entry.createdAt.getTime());
    return {
      runId: latest.runId,
      startedAt: new Date(Math.min(...times)),
      finishedAt: new Date(Math.max(...times)),
      counts,
      entries: [...finalEntries.values()],
    };
  }
}
