import { InboundEvent, MembershipChange } from '../types';
import { CommandRouter } from '../commands/router';
import { MessagePipeline } from '../moderation/pipeline';
import { AdminSyncService } from '../admins/sync';
import { describeError } from '../errors';
import { childLogger } from '../utils/logger';
import { recordEventFailure } from '../utils/metrics';

/**
 * Entry point for every inbound event. `handle` never rejects: a failure is
 * logged and confined to the event that caused it.
 */
export class EventDispatcher {
    private readonly log = childLogger('dispatcher');

    constructor(
        private readonly router: CommandRouter,
        private readonly pipeline: MessagePipeline,
        private readonly sync: AdminSyncService,
    ) {}

    async handle(event: InboundEvent): Promise<void> {
        try {
            await this.route(event);
        } catch (e: unknown) {
            recordEventFailure(event.kind);
            this.log.error('Unexpected error while handling event', {
                kind: event.kind,
                chatId: chatOf(event),
                error: describeError(e),
                stack: e instanceof Error ? e.stack : undefined,
            });
        }
    }

    private async route(event: InboundEvent): Promise<void> {
        switch (event.kind) {
            case 'command':
                // unknown commands are neither answered nor scanned for keywords
                await this.router.dispatch(event.invocation);
                return;
            case 'text':
                await this.pipeline.process(event.message);
                return;
            case 'membership':
                await this.onOwnMembershipChange(event.change);
                return;
        }
    }

    /** Promotion to administrator pulls in the chat's human admins. */
    private async onOwnMembershipChange(change: MembershipChange): Promise<void> {
        this.log.info('Bot membership changed', {
            chatId: change.chatId,
            chat: change.chatTitle,
            from: change.oldStatus,
            to: change.newStatus,
        });
        if (change.newStatus !== 'administrator' || change.oldStatus === 'administrator') return;
        await this.sync.syncFromPlatform(change.chatId);
    }
}

function chatOf(event: InboundEvent): number {
    switch (event.kind) {
        case 'command':
            return event.invocation.chatId;
        case 'text':
            return event.message.chatId;
        case 'membership':
            return event.change.chatId;
    }
}
