import { eq, lt } from 'drizzle-orm';
import type { DbType } from '../db';
import { processedEvents, whitelist, type WhitelistRow } from '../db/schema';
import { normalizeEmail, type WhitelistEntry } from '../types/subscription';
import type { ProcessedEventRepository, WhitelistRepository } from './types';

export class DrizzleProcessedEventRepository implements ProcessedEventRepository {
  constructor(private readonly db: DbType) {}

  async exists(eventId: string): Promise<boolean> {
    const rows = await this.db
      .select({ eventId: processedEvents.eventId })
      .from(processedEvents)
      .where(eq(processedEvents.eventId, eventId))
      .limit(1);
    return rows.length > 0;
  }

  async insert(eventId: string, eventType: string): Promise<void> {
    await this.db.insert(processedEvents).values({ eventId, eventType }).onConflictDoNothing();
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const deleted = await this.db
      .delete(processedEvents)
      .where(lt(processedEvents.receivedAt, cutoff))
      .returning({ eventId: processedEvents.eventId });
    return deleted.length;
  }
}

function toWhitelistEntry(row: WhitelistRow): WhitelistEntry {
  return {
    memberId: row.memberId,
    email: row.email,
    reason: row.reason,
    addedBy: row.addedBy,
    createdAt: row.createdAt,
  };
}

export class DrizzleWhitelistRepository implements WhitelistRepository {
  constructor(private readonly db: DbType) {}

  async findByMemberId(memberId: string): Promise<WhitelistEntry | null> {
    const [row] = await this.db.select().from(whitelist).where(eq(whitelist.memberId, memberId)).limit(1);
    return row ? toWhitelistEntry(row) : null;
  }

  async findByEmail(email: string): Promise<WhitelistEntry | null> {
    const [row] = await this.db
      .select()
      .from(whitelist)
      .where(eq(whitelist.email, normalizeEmail(email)))
      .limit(1);
    return row ? toWhitelistEntry(row) : null;
  }

  async list(): Promise<WhitelistEntry[]> {
    const rows = await this.db.select().from(whitelist).orderBy(whitelist.createdAt);
    return rows.map(toWhitelistEntry);
  }

  async upsert(entry: Omit<WhitelistEntry, 'createdAt'>): Promise<WhitelistEntry> {
    const values = {
      memberId: entry.memberId,
      email: entry.email ? normalizeEmail(entry.email) : null,
      reason: entry.reason,
      addedBy: entry.addedBy,
    };
    const [row] = await this.db
      .insert(whitelist)
      .values(values)
      .onConflictDoUpdate({
        target: whitelist.memberId,
        set: { email: values.email, reason: values.reason, addedBy: values.addedBy },
      })
      .returning();
    return toWhitelistEntry(row);
  }

  async remove(memberId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(whitelist)
      .where(eq(whitelist.memberId, memberId))
      .returning({ memberId: whitelist.memberId });
    return deleted.length > 0;
  }
}
