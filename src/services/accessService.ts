import type { ReconcilerConfig } from '../config';
import type { InviteLogRepository, SubscriptionRepository } from '../repositories';
import { normalizeEmail } from '../types/subscription';
import { digitsOnly } from '../utils/helpers';
import { logger } from '../utils/logger';
import { recordInvite } from '../utils/metrics';
import { redactEmail } from '../utils/redact';
import type { MembershipDirectory } from './directory/types';
import { pickState } from './eventReducer';
import { escapeHtml, renderAccessApology, renderInviteMessage } from './messages';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const MAX_LINK_ATTEMPTS = 2;

export type AccessConfig = Pick<
  ReconcilerConfig,
  | 'groupIds'
  | 'inviteTtlHours'
  | 'inviteCooldownSeconds'
  | 'fallbackInviteEnabled'
  | 'fallbackInviteLink'
  | 'supportContact'
  | 'renewUrl'
>;

export type UnlockFailureReason =
  | 'invalid_email'
  | 'invalid_member_id'
  | 'not_found'
  | 'inactive'
  | 'expired'
  | 'member_mismatch'
  | 'no_invites';

export interface IssuedInvite {
  groupId: string;
  inviteLink: string;
  expiresAt: Date | null;
  reused: boolean;
}

export type UnlockResult =
  | { ok: true; email: string; invites: IssuedInvite[]; fallbackLink: string | null; message: string }
  | { ok: false; reason: UnlockFailureReason; message: string };

export interface AccessServiceDeps {
  subscriptions: SubscriptionRepository;
  inviteLogs: InviteLogRepository;
  directory: MembershipDirectory;
  config: AccessConfig;
  now?: () => Date;
}

/**
 * Access unlock: a member proves a paid subscription by its email and receives single-use
 * invite links to every group. Links issued within the cooldown are handed out again
 * instead of creating new ones.
 */
export class AccessService {
  private readonly subscriptions: SubscriptionRepository;
  private readonly inviteLogs: InviteLogRepository;
  private readonly directory: MembershipDirectory;
  private readonly config: AccessConfig;
  private readonly now: () => Date;

  constructor(deps: AccessServiceDeps) {
    this.subscriptions = deps.subscriptions;
    this.inviteLogs = deps.inviteLogs;
    this.directory = deps.directory;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  async unlock(rawEmail: string, rawMemberId: string): Promise<UnlockResult> {
    const email = normalizeEmail(rawEmail);
    if (!EMAIL_PATTERN.test(email)) {
      return { ok: false, reason: 'invalid_email', message: "⚠️ That doesn't look like a valid email." };
    }

    const memberId = digitsOnly(rawMemberId);
    if (!memberId || !this.directory.isValidMemberId(memberId)) {
      return { ok: false, reason: 'invalid_member_id', message: renderAccessApology(this.config) };
    }

    const now = this.now();
    // Linking is a conditional write; a record that changed meanwhile is checked again once
    for (let attempt = 1; ; attempt++) {
      const record = await this.subscriptions.findByEmail(email);
      if (!record) {
        return this.noActiveSubscription('not_found');
      }

      if (record.status !== 'active') {
        return this.noActiveSubscription('inactive');
      }
      if (record.expiresAt && record.expiresAt.getTime() <= now.getTime()) {
        return this.noActiveSubscription('expired');
      }

      if (record.memberId && record.memberId !== memberId) {
        logger.warn(`[Access] Member id mismatch for ${redactEmail(email)}`, { subscriptionId: record.id });
        return { ok: false, reason: 'member_mismatch', message: renderAccessApology(this.config) };
      }
      if (record.memberId) {
        break;
      }

      const linked = await this.subscriptions.updateIfUnchanged(record.id, record.updatedAt, {
        ...pickState(record),
        memberId,
      });
      if (linked) {
        logger.info(`[Access] Linked member ${memberId} to subscription ${record.id}`);
        break;
      }
      if (attempt >= MAX_LINK_ATTEMPTS) {
        throw new Error(`Subscription ${record.id} kept changing while linking member ${memberId}`);
      }
      logger.warn(`[Access] Subscription ${record.id} changed while linking, re-reading`);
    }

    const invites: IssuedInvite[] = [];
    for (const groupId of this.config.groupIds) {
      const invite = await this.inviteFor(email, memberId, groupId, now);
      if (invite) {
        invites.push(invite);
      }
    }

    if (invites.length > 0) {
      return {
        ok: true,
        email,
        invites,
        fallbackLink: null,
        message: renderInviteMessage(
          email,
          invites.map((invite) => invite.inviteLink),
          this.config.inviteTtlHours
        ),
      };
    }

    if (this.config.fallbackInviteEnabled && this.config.fallbackInviteLink) {
      recordInvite('fallback');
      logger.warn(`[Access] No invites created for ${redactEmail(email)}, handing out the fallback link`);
      return {
        ok: true,
        email,
        invites: [],
        fallbackLink: this.config.fallbackInviteLink,
        message: `✅ Access granted for <b>${escapeHtml(email)}</b>!\nHere is your VIP invite:\n${escapeHtml(
          this.config.fallbackInviteLink
        )}`,
      };
    }

    logger.error(`[Access] Could not create any invite for ${redactEmail(email)}`);
    return { ok: false, reason: 'no_invites', message: renderAccessApology(this.config) };
  }

  private async inviteFor(email: string, memberId: string, groupId: string, now: Date): Promise<IssuedInvite | null> {
    const since = new Date(now.getTime() - this.config.inviteCooldownSeconds * 1000);
    const recent = await this.inviteLogs.findRecent(email, groupId, since);
    if (recent && (!recent.expiresAt || recent.expiresAt.getTime() > now.getTime())) {
      recordInvite('reused');
      return { groupId, inviteLink: recent.inviteLink, expiresAt: recent.expiresAt, reused: true };
    }

    const created = await this.directory.createInvite(groupId, {
      ttlSeconds: this.config.inviteTtlHours * 3600,
      maxUses: 1,
      name: `member ${memberId}`,
    });
    if (!created.ok) {
      recordInvite('failed');
      logger.warn(`[Access] Invite for group ${groupId} failed: ${created.error}`);
      return null;
    }

    await this.inviteLogs.append({
      email,
      memberId,
      groupId,
      inviteLink: created.inviteLink,
      memberLimit: 1,
      isTemporary: true,
      expiresAt: created.expiresAt,
    });
    recordInvite('created');

    return { groupId, inviteLink: created.inviteLink, expiresAt: created.expiresAt, reused: false };
  }

  private noActiveSubscription(reason: 'not_found' | 'inactive' | 'expired'): UnlockResult {
    const renew = this.config.renewUrl ? `\n🔁 Renew here: ${escapeHtml(this.config.renewUrl)}` : '';
    return {
      ok: false,
      reason,
      message: `❌ I couldn't find an active subscription for this email.${renew}`,
    };
  }
}
