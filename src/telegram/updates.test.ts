import { describe, expect, it } from 'vitest';
import { parseUpdate, readUpdateId } from './updates.js';

const group = { id: -100123, type: 'supergroup', title: 'Test group' };
const admin = { id: 1, is_bot: false, first_name: 'Admin' };

function memberUpdate(user: Record<string, unknown>, status: string, chat: Record<string, unknown> = group) {
  return {
    chat,
    from: admin,
    date: 1_700_000_000,
    old_chat_member: { user, status: 'left' },
    new_chat_member: { user, status },
  };
}

describe('parseUpdate', () => {
  it('maps my_chat_member to a bot-membership event', () => {
    const bot = { id: 999, is_bot: true, first_name: 'Gate', username: 'gate_bot' };
    expect(parseUpdate({ update_id: 10, my_chat_member: memberUpdate(bot, 'administrator') })).toEqual({
      kind: 'bot-membership',
      updateId: 10,
      groupId: -100123,
      chatKind: 'supergroup',
      status: 'administrator',
    });
  });

  it('maps chat_member to a user-membership event', () => {
    const user = { id: 42, is_bot: false, first_name: 'Ana', username: 'ana' };
    expect(parseUpdate({ update_id: 11, chat_member: memberUpdate(user, 'member') })).toEqual({
      kind: 'user-membership',
      updateId: 11,
      groupId: -100123,
      chatKind: 'supergroup',
      user: { id: 42, username: 'ana', isBot: false },
      status: 'member',
    });
  });

  it('leaves username undefined when the user has none', () => {
    const user = { id: 42, is_bot: false, first_name: 'Ana' };
    const event = parseUpdate({ update_id: 11, chat_member: memberUpdate(user, 'member') });
    expect(event?.kind).toBe('user-membership');
    if (event?.kind !== 'user-membership') return;
    expect(event.user.username).toBeUndefined();
  });

  it('maps message to a message event', () => {
    const update = {
      update_id: 12,
      message: { message_id: 555, date: 1_700_000_000, chat: group, from: { id: 7, is_bot: false, first_name: 'Bo' }, text: 'hi' },
    };
    expect(parseUpdate(update)).toEqual({
      kind: 'message',
      updateId: 12,
      groupId: -100123,
      chatKind: 'supergroup',
      messageId: 555,
      authorId: 7,
    });
  });

  it('skips messages without an author', () => {
    const update = { update_id: 13, message: { message_id: 556, date: 1_700_000_000, chat: group, sender_chat: group } };
    expect(parseUpdate(update)).toBeNull();
  });

  it('skips update kinds the daemon does not subscribe to', () => {
    expect(parseUpdate({ update_id: 14, edited_message: { message_id: 1, chat: group } })).toBeNull();
  });

  it('passes known statuses through even when no handler acts on them', () => {
    const owner = { id: 1, is_bot: false, first_name: 'Owner' };
    expect(parseUpdate({ update_id: 14, chat_member: memberUpdate(owner, 'creator') })).toMatchObject({
      kind: 'user-membership',
      status: 'creator',
    });
  });

  it('skips unknown statuses and chat kinds', () => {
    const user = { id: 42, is_bot: false, first_name: 'Ana' };
    expect(parseUpdate({ update_id: 15, chat_member: memberUpdate(user, 'banished') })).toBeNull();
    expect(
      parseUpdate({ update_id: 16, chat_member: memberUpdate(user, 'member', { id: -1, type: 'forum' }) }),
    ).toBeNull();
  });

  it('skips payloads with missing or mistyped fields', () => {
    expect(parseUpdate(null)).toBeNull();
    expect(parseUpdate([])).toBeNull();
    expect(parseUpdate({ update_id: '17', message: {} })).toBeNull();
    expect(parseUpdate({ update_id: 18, chat_member: { chat: group } })).toBeNull();
    expect(parseUpdate({ update_id: 19, chat_member: memberUpdate({ id: '42' }, 'member') })).toBeNull();
    expect(parseUpdate({ update_id: 20, message: { message_id: 1.5, chat: group, from: { id: 7 } } })).toBeNull();
  });
});

describe('readUpdateId', () => {
  it('reads update_id from any object', () => {
    expect(readUpdateId({ update_id: 99, poll: {} })).toBe(99);
  });

  it('returns null when update_id is missing or not an integer', () => {
    expect(readUpdateId({})).toBeNull();
    expect(readUpdateId({ update_id: 'x' })).toBeNull();
    expect(readUpdateId('nope')).toBeNull();
  });
});
