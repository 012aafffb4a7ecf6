import TelegramBot from 'node-telegram-bot-api';
import { ChatId, InboundEvent, MessageTarget } from '../types';
import { ChatAdministrator, ChatInfo, ChatPlatform, SendOptions } from './types';
import { DuplicateInstanceError, describeError } from '../errors';
import { childLogger } from '../utils/logger';
import { setPollingUp } from '../utils/metrics';
import { displayName, isConflictError, toInboundEvent, toMembershipEvent, toSpoilerMarkdown } from './telegram-format';

export type TelegramPlatformOptions = {
    token: string;
    pollingIntervalMs?: number;
};

export type EventSink = (event: InboundEvent) => Promise<void>;
export type FatalSink = (error: DuplicateInstanceError) => void;

/**
 * Long-polling Telegram transport. Updates are handed to the sink as they
 * arrive, without waiting for earlier ones to finish.
 */
export class TelegramPlatform implements ChatPlatform {
    private readonly bot: TelegramBot;
    private readonly log = childLogger('telegram');
    private username?: string;
    private polling = false;

    constructor(options: TelegramPlatformOptions) {
        this.bot = new TelegramBot(options.token, {
            polling: {
                autoStart: false,
                interval: options.pollingIntervalMs,
                params: { allowed_updates: ['message', 'my_chat_member'] },
            },
        });
    }

    isPolling(): boolean {
        return this.polling;
    }

    async start(onEvent: EventSink, onFatal: FatalSink): Promise<void> {
        const me = await this.bot.getMe();
        this.username = me.username;
        this.log.info(`Authorized as @${me.username ?? me.id}`);

        this.bot.on('message', (msg: TelegramBot.Message) => {
            const event = toInboundEvent(msg, this.username);
            if (event) this.deliver(onEvent, event);
        });
        this.bot.on('my_chat_member', (update: TelegramBot.ChatMemberUpdated) => {
            this.deliver(onEvent, toMembershipEvent(update));
        });
        this.bot.on('polling_error', (error: Error) => {
            if (!isConflictError(error)) {
                this.log.warn('Polling error', { error: error.message });
                return;
            }
            this.log.error('Another instance is polling with this token; stopping', { error: error.message });
            this.stop()
                .catch((e: unknown) => this.log.error('Failed to stop polling', { error: describeError(e) }))
                .finally(() => onFatal(new DuplicateInstanceError(error.message)));
        });

        await this.bot.startPolling();
        this.polling = true;
        setPollingUp(true);
        this.log.info('Polling started');
    }

    async stop(): Promise<void> {
        if (!this.polling) return;
        this.polling = false;
        setPollingUp(false);
        await this.bot.stopPolling();
        this.log.info('Polling stopped');
    }

    async deleteMessage(chatId: ChatId, messageId: number): Promise<void> {
        await this.bot.deleteMessage(chatId, messageId);
    }

    async sendMessage(target: MessageTarget, text: string, options: SendOptions = {}): Promise<void> {
        const { segments } = options;
        await this.bot.sendMessage(target.chatId, segments ? toSpoilerMarkdown(segments) : text, {
            message_thread_id: target.threadId,
            parse_mode: segments ? 'MarkdownV2' : undefined,
        });
    }

    async getChatAdministrators(chatId: ChatId): Promise<ChatAdministrator[]> {
        const members = await this.bot.getChatAdministrators(chatId);
        return members.map(member => ({
            id: member.user.id,
            displayName: displayName(member.user),
            isBot: member.user.is_bot,
        }));
    }

    async getChat(chatId: ChatId): Promise<ChatInfo> {
        const chat = await this.bot.getChat(chatId);
        return { id: chat.id, title: chat.title, type: chat.type };
    }

    private deliver(onEvent: EventSink, event: InboundEvent): void {
        onEvent(event).catch((e: unknown) => {
            this.log.error('Event sink rejected', { kind: event.kind, error: describeError(e) });
        });
    }
}
