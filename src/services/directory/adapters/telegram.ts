import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../../../utils/logger';
import { redactString } from '../../../utils/redact';
import type {
  CreateInviteResult,
  DirectoryAdapterOptions,
  InviteOptions,
  MembershipDirectory,
  Notifier,
  RemoveMemberResult,
  SendMessageResult,
} from '../types';

export type TelegramHttpClient = Pick<AxiosInstance, 'post'>;

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const inviteLinkSchema = z.object({
  invite_link: z.string().min(1),
  expire_date: z.number().optional(),
});

type ApiCallResult = { ok: true; result: unknown } | { ok: false; error: string };

const MEMBER_ID_PATTERN = /^[1-9]\d{0,15}$/;

/**
 * Telegram Bot API adapter
 *
 * Removal is a ban immediately followed by an unban (`only_if_banned`), which kicks the
 * member out while letting them rejoin later through a fresh invite. Every request runs
 * with the configured axios timeout; a timeout is a failure of that single call.
 */
export class TelegramDirectory implements MembershipDirectory, Notifier {
  private readonly http: TelegramHttpClient;

  constructor(options: DirectoryAdapterOptions, client?: TelegramHttpClient) {
    this.http =
      client ??
      axios.create({
        baseURL: `${options.apiBaseUrl.replace(/\/+$/, '')}/bot${options.botToken}`,
        timeout: options.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  isValidMemberId(memberId: string): boolean {
    return MEMBER_ID_PATTERN.test(memberId);
  }

  async removeMember(groupId: string, memberId: string): Promise<RemoveMemberResult> {
    const ban = await this.call('banChatMember', {
      chat_id: groupId,
      user_id: Number(memberId),
      revoke_messages: false,
    });
    if (!ban.ok) {
      return ban;
    }

    const unban = await this.call('unbanChatMember', {
      chat_id: groupId,
      user_id: Number(memberId),
      only_if_banned: true,
    });
    if (!unban.ok) {
      // The member is out of the group either way; they just cannot rejoin until unbanned
      logger.warn(`[Telegram] Member ${memberId} removed from ${groupId} but unban failed: ${unban.error}`);
    }

    return { ok: true };
  }

  async createInvite(groupId: string, options: InviteOptions): Promise<CreateInviteResult> {
    const expireDate = Math.floor(Date.now() / 1000) + options.ttlSeconds;
    const response = await this.call('createChatInviteLink', {
      chat_id: groupId,
      expire_date: expireDate,
      member_limit: options.maxUses,
      ...(options.name ? { name: options.name.slice(0, 32) } : {}),
    });
    if (!response.ok) {
      return response;
    }

    const link = inviteLinkSchema.safeParse(response.result);
    if (!link.success) {
      return { ok: false, error: 'Unexpected createChatInviteLink response' };
    }

    return {
      ok: true,
      inviteLink: link.data.invite_link,
      expiresAt: new Date((link.data.expire_date ?? expireDate) * 1000),
    };
  }

  async sendDirectMessage(memberId: string, text: string): Promise<SendMessageResult> {
    const response = await this.call('sendMessage', {
      chat_id: memberId,
      text,
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
    return response.ok ? { ok: true } : response;
  }

  private async call(method: string, params: Record<string, unknown>): Promise<ApiCallResult> {
    try {
      const response = await this.http.post(`/${method}`, params);
      return interpretResponse(method, response.data);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.response) {
          return interpretResponse(method, error.response.data);
        }
        const reason = error.code === 'ECONNABORTED' ? 'timeout' : error.code || error.message;
        logger.warn(`[Telegram] ${method} failed: ${reason}`);
        return { ok: false, error: `${method}: ${reason}` };
      }

      const message = error instanceof Error ? error.message : String(error);
      logger.error(`[Telegram] ${method} failed: ${redactString(message)}`);
      return { ok: false, error: `${method}: ${redactString(message)}` };
    }
  }
}

function interpretResponse(method: string, data: unknown): ApiCallResult {
  const parsed = apiResponseSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: `${method}: unexpected response` };
  }
  if (!parsed.data.ok) {
    const description = parsed.data.description || `error ${parsed.data.error_code ?? 'unknown'}`;
    return { ok: false, error: `${method}: ${description}` };
  }
  return { ok: true, result: parsed.data.result };
}

export function createTelegramDirectory(options: DirectoryAdapterOptions): TelegramDirectory {
  return new TelegramDirectory(options);
}
