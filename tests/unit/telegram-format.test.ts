/// <reference types="jest" />
import type TelegramBot from 'node-telegram-bot-api';
import {
  displayName,
  escapeMarkdownV2,
  isConflictError,
  parseCommand,
  toInboundEvent,
  toMembershipEvent,
  toSpoilerMarkdown,
} from '../../src/platform/telegram-format';
import { redactSegments } from '../../src/moderation/redact';

const user = (overrides: Partial<TelegramBot.User> = {}): TelegramBot.User => ({
  id: 7,
  is_bot: false,
  first_name: 'Ann',
  ...overrides,
});

const tgMessage = (overrides: Partial<TelegramBot.Message> = {}): TelegramBot.Message => ({
  message_id: 42,
  date: 0,
  chat: { id: -100, type: 'supergroup' },
  from: user({ username: 'ann' }),
  ...overrides,
});

describe('parseCommand', () => {
  it('splits the name and arguments', () => {
    expect(parseCommand('/add_keyword big  leak')).toEqual({ command: 'add_keyword', args: ['big', 'leak'] });
    expect(parseCommand('/list_keywords')).toEqual({ command: 'list_keywords', args: [] });
  });

  it('accepts commands addressed to this bot', () => {
    expect(parseCommand('/Help@SpoilerBot', 'spoilerbot')).toEqual({ command: 'help', args: [] });
  });

  it('ignores commands addressed to another bot', () => {
    expect(parseCommand('/help@OtherBot', 'spoilerbot')).toBeNull();
  });

  it('rejects text that is not a command', () => {
    expect(parseCommand('hello /help')).toBeNull();
    expect(parseCommand('/')).toBeNull();
  });
});

describe('MarkdownV2 rendering', () => {
  it('escapes reserved characters', () => {
    expect(escapeMarkdownV2('a.b!')).toBe('a\\.b\\!');
    expect(escapeMarkdownV2('(x)')).toBe('\\(x\\)');
  });

  it('keeps spoiler spans and escapes around them', () => {
    const segments = [
      { text: '@bob_1: no ', hidden: false },
      { text: 'LEAK', hidden: true },
      { text: ' here.', hidden: false },
    ];
    expect(toSpoilerMarkdown(segments)).toBe('@bob\\_1: no ||LEAK|| here\\.');
    expect(toSpoilerMarkdown([{ text: 'v2.0', hidden: true }])).toBe('||v2\\.0||');
  });

  it('escapes bars the author typed so they cannot open a spoiler', () => {
    const rendered = toSpoilerMarkdown([
      { text: 'U: ', hidden: false },
      ...redactSegments('a || leak', ['leak'], false),
    ]);
    expect(rendered).toBe('U: a \\|\\| ||leak||');
    expect(toSpoilerMarkdown(redactSegments('see ||the leak', ['leak'], false))).toBe('see \\|\\|the ||leak||');
  });
});

describe('displayName', () => {
  it('prefers the username', () => {
    expect(displayName(user({ username: 'ann' }))).toBe('@ann');
    expect(displayName(user({ last_name: 'Lee' }))).toBe('Ann Lee');
  });
});

describe('toInboundEvent', () => {
  it('turns plain text into a text event', () => {
    expect(toInboundEvent(tgMessage({ text: 'hi' }), 'spoilerbot')).toEqual({
      kind: 'text',
      message: {
        chatId: -100,
        chatType: 'supergroup',
        threadId: undefined,
        messageId: 42,
        text: 'hi',
        sender: { id: 7, username: 'ann', firstName: 'Ann', isBot: false, senderChatTitle: undefined },
      },
    });
  });

  it('keeps the thread only for forum topics', () => {
    const topic = toInboundEvent(tgMessage({ text: 'hi', message_thread_id: 3, is_topic_message: true }));
    const reply = toInboundEvent(tgMessage({ text: 'hi', message_thread_id: 3 }));
    expect(topic?.kind === 'text' && topic.message.threadId).toBe(3);
    expect(reply?.kind === 'text' && reply.message.threadId).toBeUndefined();
  });

  it('parses commands', () => {
    const event = toInboundEvent(tgMessage({ text: '/add_admin@spoilerbot 123' }), 'spoilerbot');
    expect(event?.kind).toBe('command');
    if (event?.kind === 'command') {
      expect(event.invocation.command).toBe('add_admin');
      expect(event.invocation.args).toEqual(['123']);
      expect(event.invocation.sender.id).toBe(7);
    }
  });

  it('drops messages without text and other bots\' commands', () => {
    expect(toInboundEvent(tgMessage())).toBeNull();
    expect(toInboundEvent(tgMessage({ text: '/help@otherbot' }), 'spoilerbot')).toBeNull();
  });
});

describe('toMembershipEvent', () => {
  it('carries the status transition', () => {
    const update: TelegramBot.ChatMemberUpdated = {
      chat: { id: -100, type: 'supergroup', title: 'Movies' },
      from: user(),
      date: 0,
      old_chat_member: { user: user({ id: 99, is_bot: true }), status: 'member' },
      new_chat_member: { user: user({ id: 99, is_bot: true }), status: 'administrator' },
    };
    expect(toMembershipEvent(update)).toEqual({
      kind: 'membership',
      change: { chatId: -100, chatTitle: 'Movies', userId: 99, oldStatus: 'member', newStatus: 'administrator' },
    });
  });
});

describe('isConflictError', () => {
  it('recognizes the duplicate poller answer', () => {
    expect(isConflictError(new Error('ETELEGRAM: 409 Conflict: terminated by other getUpdates request'))).toBe(true);
    expect(isConflictError(new Error('ETELEGRAM: 400 Bad Request: chat not found'))).toBe(false);
    expect(isConflictError('409 Conflict')).toBe(false);
  });
});
