import type TelegramBot from 'node-telegram-bot-api';
import { InboundEvent, InboundMessage, Sender, TextSegment } from '../types';

const COMMAND = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s+([\s\S]*))?$/;
// MarkdownV2 reserves these everywhere outside code spans.
const MARKDOWN_V2_SPECIAL = /[_*[\]()~`>#+\-=|{}.!\\]/g;

export type ParsedCommand = { command: string; args: string[] };

/**
 * Parses `/name@bot arg1 arg2`. Commands addressed to another bot yield null.
 */
export function parseCommand(text: string, botUsername?: string): ParsedCommand | null {
    const match = COMMAND.exec(text.trim());
    if (!match) return null;
    const [, name, mention, rest] = match;
    if (mention && (!botUsername || mention.toLowerCase() !== botUsername.toLowerCase())) return null;
    const args = (rest ?? '').trim().split(/\s+/).filter(Boolean);
    return { command: name.toLowerCase(), args };
}

export function escapeMarkdownV2(text: string): string {
    return text.replace(MARKDOWN_V2_SPECIAL, '\\$&');
}

/** MarkdownV2 body: every run escaped, hidden runs inside spoiler markers. */
export function toSpoilerMarkdown(segments: TextSegment[]): string {
    return segments
        .map(({ text, hidden }) => (hidden ? `||${escapeMarkdownV2(text)}||` : escapeMarkdownV2(text)))
        .join('');
}

export function displayName(user: TelegramBot.User): string {
    if (user.username) return `@${user.username}`;
    return [user.first_name, user.last_name].filter(Boolean).join(' ');
}

function toSender(msg: TelegramBot.Message): Sender {
    return {
        id: msg.from?.id,
        username: msg.from?.username,
        firstName: msg.from?.first_name,
        isBot: msg.from?.is_bot,
        senderChatTitle: msg.sender_chat?.title,
    };
}

export function toInboundMessage(msg: TelegramBot.Message): InboundMessage {
    return {
        chatId: msg.chat.id,
        chatType: msg.chat.type,
        // only forum topics carry a thread that sendMessage accepts
        threadId: msg.is_topic_message ? msg.message_thread_id : undefined,
        messageId: msg.message_id,
        text: msg.text,
        sender: toSender(msg),
    };
}

/** Null for messages the bot has nothing to do with (no text, other bot's command). */
export function toInboundEvent(msg: TelegramBot.Message, botUsername?: string): InboundEvent | null {
    if (!msg.text) return null;
    const message = toInboundMessage(msg);
    if (msg.text.startsWith('/')) {
        const parsed = parseCommand(msg.text, botUsername);
        if (!parsed) return null;
        return { kind: 'command', invocation: { ...message, ...parsed } };
    }
    return { kind: 'text', message };
}

export function toMembershipEvent(update: TelegramBot.ChatMemberUpdated): InboundEvent {
    return {
        kind: 'membership',
        change: {
            chatId: update.chat.id,
            chatTitle: update.chat.title,
            userId: update.new_chat_member.user.id,
            oldStatus: update.old_chat_member.status,
            newStatus: update.new_chat_member.status,
        },
    };
}

/** Telegram answers getUpdates with 409 Conflict when another poller uses the token. */
export function isConflictError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    return /\b409\b/.test(error.message) && /conflict/i.test(error.message);
}
