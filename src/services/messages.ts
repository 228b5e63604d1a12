import type { ReconcilerConfig } from '../config';

type MessageConfig = Pick<ReconcilerConfig, 'renewUrl' | 'supportContact'>;

export function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function renewLine(config: MessageConfig): string {
  return config.renewUrl ? `🔁 Renew here: ${escapeHtml(config.renewUrl)}` : '🔁 Renew your subscription to get back in.';
}

function supportLine(config: MessageConfig): string {
  return config.supportContact ? `Questions? Contact ${escapeHtml(config.supportContact)}.` : '';
}

function joinLines(lines: string[]): string {
  return lines.filter((line) => line.length > 0).join('\n');
}

/** Sent after the sweep removed a member from the groups. */
export function renderRemovalNotice(config: MessageConfig): string {
  return joinLines([
    '⛔ <b>Your VIP access has ended</b>',
    '',
    'Your subscription expired and the grace period is over, so you were removed from the VIP groups.',
    renewLine(config),
    'After renewing, use Unlock Access with your Stripe email to get new invite links.',
    supportLine(config),
  ]);
}

export function renderExpiryWarning(config: MessageConfig, leadDays: number, expiresAt: Date): string {
  const when =
    leadDays === 0 ? '<b>today</b>' : `in <b>${leadDays} day${leadDays === 1 ? '' : 's'}</b> (${formatDate(expiresAt)})`;

  return joinLines([
    '⏰ <b>Your VIP subscription is about to expire</b>',
    '',
    `Your access expires ${when}.`,
    renewLine(config),
    supportLine(config),
  ]);
}

export function renderInviteMessage(email: string, links: string[], ttlHours: number): string {
  return joinLines([
    `✅ Access granted for <b>${escapeHtml(email)}</b>!`,
    `🔗 Your VIP invites (1 use each, valid ${ttlHours}h):`,
    ...links.map((link) => `• ${escapeHtml(link)}`),
  ]);
}

/** Shown to the member when an access request fails for a reason they cannot fix. */
export function renderAccessApology(config: MessageConfig): string {
  return joinLines(["😕 Sorry, we couldn't complete your request right now.", supportLine(config)]);
}
