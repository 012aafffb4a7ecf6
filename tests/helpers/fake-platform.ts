import fs from 'fs';
import os from 'os';
import path from 'path';
import { ChatId, CommandInvocation, InboundMessage, MessageTarget } from '../../src/types';
import { ChatAdministrator, ChatInfo, ChatPlatform, SendOptions } from '../../src/platform/types';

export type SentMessage = { target: MessageTarget; text: string; options?: SendOptions };

/** In-process stand-in for the Telegram transport. */
export class FakePlatform implements ChatPlatform {
    sent: SentMessage[] = [];
    deleted: Array<{ chatId: ChatId; messageId: number }> = [];
    sendAttempts = 0;
    adminLookups = 0;
    administrators = new Map<ChatId, ChatAdministrator[]>();
    chats = new Map<ChatId, ChatInfo>();
    deleteError?: Error;
    /** Returns the error a given send should fail with, if any. */
    sendError?: (text: string) => Error | undefined;

    async deleteMessage(chatId: ChatId, messageId: number): Promise<void> {
        if (this.deleteError) throw this.deleteError;
        this.deleted.push({ chatId, messageId });
    }

    async sendMessage(target: MessageTarget, text: string, options?: SendOptions): Promise<void> {
        this.sendAttempts += 1;
        const error = this.sendError?.(text);
        if (error) throw error;
        this.sent.push(options ? { target, text, options } : { target, text });
    }

    async getChatAdministrators(chatId: ChatId): Promise<ChatAdministrator[]> {
        this.adminLookups += 1;
        return this.administrators.get(chatId) ?? [];
    }

    async getChat(chatId: ChatId): Promise<ChatInfo> {
        const chat = this.chats.get(chatId);
        if (!chat) throw new Error('Bad Request: chat not found');
        return chat;
    }

    texts(): string[] {
        return this.sent.map(m => m.text);
    }
}

export function tempConfigPath(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'spoiler-guard-'));
    return path.join(dir, 'spoiler_config.json');
}

export function message(overrides: Partial<InboundMessage> = {}): InboundMessage {
    return {
        chatId: -100,
        chatType: 'supergroup',
        messageId: 42,
        text: 'hello',
        sender: { id: 7, firstName: 'U' },
        ...overrides,
    };
}

export function invocation(command: string, args: string[] = [], overrides: Partial<InboundMessage> = {}): CommandInvocation {
    return { ...message({ text: `/${command} ${args.join(' ')}`.trim(), ...overrides }), command, args };
}
