import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { WhitelistRepository } from '../repositories';
import { normalizeEmail, type WhitelistEntry } from '../types/subscription';
import { digitsOnly, formatError } from '../utils/helpers';
import { logger } from '../utils/logger';

export interface WhitelistInput {
  memberId: string;
  email?: string | null;
  reason?: string | null;
  addedBy: string;
}

export interface WhitelistImportResult {
  imported: number;
  skipped: number;
  errors: string[];
}

const csvRowSchema = z.object({
  member_id: z.string().optional(),
  email: z.string().optional(),
  reason: z.string().optional(),
});

const csvRowsSchema = z.array(csvRowSchema);

export class WhitelistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WhitelistError';
  }
}

/**
 * Members exempt from automatic removal. A subscription is whitelisted when its member id
 * has an entry, or when an entry carries the subscription's email.
 */
export class WhitelistService {
  constructor(private readonly repository: WhitelistRepository) {}

  async findMatch(memberId: string | null, email: string | null): Promise<WhitelistEntry | null> {
    if (memberId) {
      const byMember = await this.repository.findByMemberId(memberId);
      if (byMember) return byMember;
    }
    if (email) {
      return this.repository.findByEmail(normalizeEmail(email));
    }
    return null;
  }

  async list(): Promise<WhitelistEntry[]> {
    return this.repository.list();
  }

  async add(input: WhitelistInput): Promise<WhitelistEntry> {
    const memberId = digitsOnly(input.memberId);
    if (!memberId) {
      throw new WhitelistError('memberId must contain digits');
    }

    const email = input.email ? normalizeEmail(input.email) : null;
    const entry = await this.repository.upsert({
      memberId,
      email: email || null,
      reason: (input.reason || '').trim() || 'manual',
      addedBy: input.addedBy,
    });

    logger.info(`[Whitelist] Added member ${memberId}`, { addedBy: input.addedBy });
    return entry;
  }

  async remove(memberId: string): Promise<boolean> {
    const normalized = digitsOnly(memberId);
    if (!normalized) return false;

    const removed = await this.repository.remove(normalized);
    if (removed) {
      logger.info(`[Whitelist] Removed member ${normalized}`);
    }
    return removed;
  }

  /**
   * Import rows of `member_id,email,reason` (header required). Existing entries are
   * overwritten; rows without a usable member id are reported and skipped.
   */
  async importCsv(content: string, addedBy: string): Promise<WhitelistImportResult> {
    const rows = parseWhitelistCsv(content);
    const result: WhitelistImportResult = { imported: 0, skipped: 0, errors: [] };

    for (const [index, row] of rows.entries()) {
      const line = index + 2; // header is line 1
      if (!digitsOnly(row.member_id)) {
        result.skipped++;
        result.errors.push(`line ${line}: missing member_id`);
        continue;
      }

      await this.add({
        memberId: row.member_id || '',
        email: row.email,
        reason: row.reason,
        addedBy,
      });
      result.imported++;
    }

    logger.info(`[Whitelist] Imported ${result.imported} entr${result.imported === 1 ? 'y' : 'ies'}`, {
      skipped: result.skipped,
    });
    return result;
  }
}

export function parseWhitelistCsv(content: string): z.infer<typeof csvRowsSchema> {
  let text = content;

  // Spreadsheet exports often start with a BOM
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }

  let records: unknown;
  try {
    records = parse(text, {
      columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new WhitelistError(`Invalid whitelist CSV: ${formatError(error)}`);
  }

  const parsed = csvRowsSchema.safeParse(records);
  if (!parsed.success) {
    throw new WhitelistError(`Invalid whitelist CSV: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}
