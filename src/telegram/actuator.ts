import type { Api } from 'grammy';
import type { ChatPermissions } from 'grammy/types';
import { describePlatformError, isPlatformError } from './errors.js';
import { MEMBER_STATUSES } from './updates.js';
import type { MemberStatus } from './updates.js';

/** The slice of grammY's Api the daemon calls. */
export type BotApi = Pick<
  Api,
  'getUpdates' | 'getMe' | 'getChatMember' | 'restrictChatMember' | 'deleteMessage' | 'getChatAdministrators'
>;

export type ActionResult = { ok: true } | { ok: false; error: string };

export type ChatAdministrator = {
  id: number;
  username?: string;
  isBot: boolean;
  status: MemberStatus;
};

/**
 * Outbound moderation calls. Each is a single request with no internal retry;
 * failures come back as values so the caller decides whether they matter.
 */
export type PlatformActuator = {
  getChatMember(groupId: number, userId: number): Promise<MemberStatus | null>;
  restrictChatMember(groupId: number, userId: number, permissions: ChatPermissions): Promise<ActionResult>;
  deleteMessage(groupId: number, messageId: number): Promise<ActionResult>;
  getChatAdministrators(groupId: number): Promise<ChatAdministrator[] | null>;
};

/** Mutes a member completely: no messages, media, polls, invites, pins, topics or info changes. */
export const DENY_ALL_PERMISSIONS = {
  can_send_messages: false,
  can_send_audios: false,
  can_send_documents: false,
  can_send_photos: false,
  can_send_videos: false,
  can_send_video_notes: false,
  can_send_voice_notes: false,
  can_send_polls: false,
  can_send_other_messages: false,
  can_add_web_page_previews: false,
  can_change_info: false,
  can_invite_users: false,
  can_pin_messages: false,
  can_manage_topics: false,
} as const satisfies ChatPermissions;

function toMemberStatus(value: string): MemberStatus | null {
  return MEMBER_STATUSES.find((s) => s === value) ?? null;
}

export type ActuatorFailureHook = (op: string, error: string) => void;

export class TelegramActuator implements PlatformActuator {
  private api: BotApi;
  private onFailure?: ActuatorFailureHook;

  constructor(api: BotApi, opts?: { onFailure?: ActuatorFailureHook }) {
    this.api = api;
    this.onFailure = opts?.onFailure;
  }

  async getChatMember(groupId: number, userId: number): Promise<MemberStatus | null> {
    try {
      const member = await this.api.getChatMember(groupId, userId);
      return toMemberStatus(member.status);
    } catch (err) {
      this.fail('getChatMember', err);
      return null;
    }
  }

  async restrictChatMember(groupId: number, userId: number, permissions: ChatPermissions): Promise<ActionResult> {
    try {
      await this.api.restrictChatMember(groupId, userId, permissions);
      return { ok: true };
    } catch (err) {
      return { ok: false, error: this.fail('restrictChatMember', err) };
    }
  }

  async deleteMessage(groupId: number, messageId: number): Promise<ActionResult> {
    try {
      await this.api.deleteMessage(groupId, messageId);
      return { ok: true };
    } catch (err) {
      return { ok: false, error: this.fail('deleteMessage', err) };
    }
  }

  async getChatAdministrators(groupId: number): Promise<ChatAdministrator[] | null> {
    try {
      const members = await this.api.getChatAdministrators(groupId);
      return members.map((m) => ({
        id: m.user.id,
        username: m.user.username,
        isBot: m.user.is_bot,
        status: m.status,
      }));
    } catch (err) {
      this.fail('getChatAdministrators', err);
      return null;
    }
  }

  /** Platform errors become a message; anything else is a bug and propagates. */
  private fail(op: string, err: unknown): string {
    if (!isPlatformError(err)) throw err;
    const message = describePlatformError(err);
    this.onFailure?.(op, message);
    return message;
  }
}
