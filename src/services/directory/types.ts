/**
 * Capabilities the reconciliation engine needs from the chat platform. Every call reports
 * failure in its result instead of throwing, so one bad group or member never aborts a run.
 */

export type DirectoryFailure = { ok: false; error: string };

export type RemoveMemberResult = { ok: true } | DirectoryFailure;

export type CreateInviteResult = { ok: true; inviteLink: string; expiresAt: Date | null } | DirectoryFailure;

export type SendMessageResult = { ok: true } | DirectoryFailure;

export interface InviteOptions {
  /** Link lifetime; the platform drops the link after this. */
  ttlSeconds: number;
  /** How many people may join through the link. */
  maxUses: number;
  /** Label shown to group admins. */
  name?: string;
}

export interface MembershipDirectory {
  /** Remove a member from a group without keeping them banned. */
  removeMember(groupId: string, memberId: string): Promise<RemoveMemberResult>;
  createInvite(groupId: string, options: InviteOptions): Promise<CreateInviteResult>;
  /** Format check only; does not ask the platform. */
  isValidMemberId(memberId: string): boolean;
}

export interface Notifier {
  sendDirectMessage(memberId: string, text: string): Promise<SendMessageResult>;
}

export interface DirectoryAdapterOptions {
  botToken: string;
  apiBaseUrl: string;
  timeoutMs: number;
}
