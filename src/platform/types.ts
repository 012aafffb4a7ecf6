import { AdminDescriptor, ChatId, MessageTarget, TextSegment } from '../types';

export type ChatAdministrator = AdminDescriptor & {
    isBot: boolean;
};

export type ChatInfo = {
    id: ChatId;
    title?: string;
    type: string;
};

export type SendOptions = {
    /**
     * Structured body with spoiler runs. When given, the platform renders these
     * instead of `text`, which stays the plain form used for logs and fallbacks.
     */
    segments?: TextSegment[];
};

/**
 * Outbound operations the bot needs from the chat platform. Every call may
 * reject (missing rights, network, platform timeouts).
 */
export interface ChatPlatform {
    deleteMessage(chatId: ChatId, messageId: number): Promise<void>;
    sendMessage(target: MessageTarget, text: string, options?: SendOptions): Promise<void>;
    getChatAdministrators(chatId: ChatId): Promise<ChatAdministrator[]>;
    getChat(chatId: ChatId): Promise<ChatInfo>;
}
