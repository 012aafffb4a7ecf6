import { ChatId, InboundMessage, Sender, TextSegment } from '../types';
import { ChatPlatform } from '../platform/types';
import { RepublishError, describeError } from '../errors';
import { childLogger } from '../utils/logger';
import { recordMessageScanned, recordPipelineOutcome } from '../utils/metrics';
import { findMatches } from './matcher';
import { joinSegments, redactSegments } from './redact';

export type PipelineState =
    | 'RECEIVED'
    | 'GATE_CHECKED'
    | 'SKIPPED'
    | 'MATCHED'
    | 'REWRITTEN'
    | 'REPUBLISH_ATTEMPTED'
    | 'SUCCEEDED'
    | 'DEGRADED';

export type SkipReason = 'chat-disabled' | 'no-keywords' | 'no-text' | 'no-match';

export type PipelineResult = {
    state: 'SKIPPED' | 'SUCCEEDED' | 'DEGRADED';
    /** Every state the message went through, in order. */
    trail: PipelineState[];
    matches: string[];
    /** Attributed, redacted text; set once the message was rewritten. */
    text?: string;
    skipReason?: SkipReason;
    failure?: RepublishError;
};

export interface PipelineConfig {
    isEnabled(chatId: ChatId): boolean;
    getChatKeywords(chatId: ChatId): Set<string>;
    isCaseSensitive(): boolean;
}

export const PERMISSION_WARNING =
    '⚠️ I need admin rights to delete messages and post in this chat before I can apply spoiler tags automatically.';

/** `@handle` when the sender has one, otherwise their display name. */
export function senderLabel(sender: Sender): string {
    if (sender.username) return `@${sender.username}`;
    if (sender.firstName) return sender.firstName;
    if (sender.senderChatTitle) return sender.senderChatTitle;
    return 'someone';
}

/**
 * Replaces messages containing a chat's keywords with a spoiler-tagged copy.
 * Delete and repost are tried once; if either fails the chat gets a single
 * warning and the message ends DEGRADED.
 */
export class MessagePipeline {
    private readonly log = childLogger('pipeline');

    constructor(
        private readonly config: PipelineConfig,
        private readonly platform: ChatPlatform,
    ) {}

    async process(message: InboundMessage): Promise<PipelineResult> {
        recordMessageScanned();
        const trail: PipelineState[] = ['RECEIVED'];
        const result = await this.run(message, trail);
        recordPipelineOutcome(result.state);
        return result;
    }

    private async run(message: InboundMessage, trail: PipelineState[]): Promise<PipelineResult> {
        const skip = (skipReason: SkipReason, matches: string[] = []): PipelineResult => {
            trail.push('SKIPPED');
            return { state: 'SKIPPED', trail, matches, skipReason };
        };

        trail.push('GATE_CHECKED');
        if (!this.config.isEnabled(message.chatId)) return skip('chat-disabled');
        const keywords = this.config.getChatKeywords(message.chatId);
        if (keywords.size === 0) return skip('no-keywords');
        if (!message.text) return skip('no-text');

        const caseSensitive = this.config.isCaseSensitive();
        const matches = findMatches(message.text, keywords, caseSensitive);
        if (matches.length === 0) return skip('no-match');
        trail.push('MATCHED');

        const segments: TextSegment[] = [
            { text: `${senderLabel(message.sender)}: `, hidden: false },
            ...redactSegments(message.text, matches, caseSensitive),
        ];
        const text = joinSegments(segments);
        trail.push('REWRITTEN');
        this.log.info('Found spoiler keywords', {
            chatId: message.chatId,
            messageId: message.messageId,
            from: message.sender.username ?? message.sender.id,
            keywords: matches,
        });

        trail.push('REPUBLISH_ATTEMPTED');
        const failure = await this.republish(message, text, segments);
        if (!failure) {
            trail.push('SUCCEEDED');
            return { state: 'SUCCEEDED', trail, matches, text };
        }

        this.log.warn('Could not replace message', { chatId: message.chatId, step: failure.step, error: failure.message });
        await this.warn(message);
        trail.push('DEGRADED');
        return { state: 'DEGRADED', trail, matches, text, failure };
    }

    private async republish(message: InboundMessage, text: string, segments: TextSegment[]): Promise<RepublishError | undefined> {
        try {
            await this.platform.deleteMessage(message.chatId, message.messageId);
        } catch (e: unknown) {
            return new RepublishError('delete', e);
        }
        try {
            await this.platform.sendMessage({ chatId: message.chatId, threadId: message.threadId }, text, { segments });
        } catch (e: unknown) {
            return new RepublishError('send', e);
        }
        return undefined;
    }

    private async warn(message: InboundMessage): Promise<void> {
        try {
            await this.platform.sendMessage({ chatId: message.chatId, threadId: message.threadId }, PERMISSION_WARNING);
        } catch (e: unknown) {
            this.log.error('Could not send permission warning', { chatId: message.chatId, error: describeError(e) });
        }
    }
}
