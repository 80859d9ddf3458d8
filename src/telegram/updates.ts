/**
 * Ingestion: turn raw Bot API updates into a tagged union once, so handlers
 * receive narrowly typed payloads instead of probing for optional fields.
 */

export const ALLOWED_UPDATES = ['chat_member', 'message', 'my_chat_member'] as const;

export const CHAT_KINDS = ['private', 'group', 'supergroup', 'channel'] as const;
export type ChatKind = (typeof CHAT_KINDS)[number];

export const MEMBER_STATUSES = ['creator', 'administrator', 'member', 'restricted', 'left', 'kicked'] as const;
export type MemberStatus = (typeof MEMBER_STATUSES)[number];

export type EventUser = {
  id: number;
  username?: string;
  isBot: boolean;
};

export type BotMembershipChanged = {
  kind: 'bot-membership';
  updateId: number;
  groupId: number;
  chatKind: ChatKind;
  status: MemberStatus;
};

export type UserMembershipChanged = {
  kind: 'user-membership';
  updateId: number;
  groupId: number;
  chatKind: ChatKind;
  user: EventUser;
  status: MemberStatus;
};

export type MessagePosted = {
  kind: 'message';
  updateId: number;
  groupId: number;
  chatKind: ChatKind;
  messageId: number;
  authorId: number;
};

export type DaemonEvent = BotMembershipChanged | UserMembershipChanged | MessagePosted;

function asObjectRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return null;
  return value as Record<string, unknown>;
}

function asInteger(value: unknown): number | null {
  return typeof value === 'number' && Number.isSafeInteger(value) ? value : null;
}

function asChatKind(value: unknown): ChatKind | null {
  return CHAT_KINDS.find((k) => k === value) ?? null;
}

function asMemberStatus(value: unknown): MemberStatus | null {
  return MEMBER_STATUSES.find((s) => s === value) ?? null;
}

function parseChat(value: unknown): { groupId: number; chatKind: ChatKind } | null {
  const chat = asObjectRecord(value);
  if (!chat) return null;
  const groupId = asInteger(chat.id);
  const chatKind = asChatKind(chat.type);
  if (groupId == null || chatKind == null) return null;
  return { groupId, chatKind };
}

function parseUser(value: unknown): EventUser | null {
  const user = asObjectRecord(value);
  if (!user) return null;
  const id = asInteger(user.id);
  if (id == null) return null;
  return {
    id,
    username: typeof user.username === 'string' ? user.username : undefined,
    isBot: user.is_bot === true,
  };
}

/** Shared shape of `my_chat_member` and `chat_member` payloads. */
function parseMemberUpdate(
  value: unknown,
): { groupId: number; chatKind: ChatKind; user: EventUser; status: MemberStatus } | null {
  const payload = asObjectRecord(value);
  if (!payload) return null;
  const chat = parseChat(payload.chat);
  const member = asObjectRecord(payload.new_chat_member);
  if (!chat || !member) return null;
  const user = parseUser(member.user);
  const status = asMemberStatus(member.status);
  if (!user || !status) return null;
  return { ...chat, user, status };
}

function parseMessage(updateId: number, value: unknown): MessagePosted | null {
  const message = asObjectRecord(value);
  if (!message) return null;
  const chat = parseChat(message.chat);
  const messageId = asInteger(message.message_id);
  // Anonymous admins and channel posts carry no `from`.
  const author = parseUser(message.from);
  if (!chat || messageId == null || !author) return null;
  return { kind: 'message', updateId, ...chat, messageId, authorId: author.id };
}

/** Read `update_id` without interpreting the rest of the update. */
export function readUpdateId(raw: unknown): number | null {
  return asInteger(asObjectRecord(raw)?.update_id);
}

/**
 * Map one raw update to a DaemonEvent. Returns null for update kinds the
 * daemon does not subscribe to and for payloads missing a required field.
 */
export function parseUpdate(raw: unknown): DaemonEvent | null {
  const update = asObjectRecord(raw);
  if (!update) return null;
  const updateId = asInteger(update.update_id);
  if (updateId == null) return null;

  if (update.my_chat_member !== undefined) {
    const parsed = parseMemberUpdate(update.my_chat_member);
    if (!parsed) return null;
    return { kind: 'bot-membership', updateId, groupId: parsed.groupId, chatKind: parsed.chatKind, status: parsed.status };
  }

  if (update.chat_member !== undefined) {
    const parsed = parseMemberUpdate(update.chat_member);
    if (!parsed) return null;
    return { kind: 'user-membership', updateId, ...parsed };
  }

  if (update.message !== undefined) {
    return parseMessage(updateId, update.message);
  }

  return null;
}
