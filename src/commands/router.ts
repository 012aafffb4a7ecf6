import { CommandInvocation, UserId } from '../types';
import { ChatPlatform } from '../platform/types';
import { AuthorizationGate } from '../auth/gate';
import { PermissionDeniedError, ValidationError } from '../errors';
import { recordCommand } from '../utils/metrics';
import { DENIED_DEFAULT } from './texts';

/**
 * `public`: anyone. `admin`: bot administrators. `bootstrap`: administrators,
 * or anyone while no administrator exists.
 */
export type CommandAccess = 'public' | 'admin' | 'bootstrap';

/** Every handler has the same shape: an invocation in, the reply text out. */
export type CommandHandler = (invocation: CommandInvocation) => Promise<string>;

export type CommandEntry = {
    access: CommandAccess;
    run: CommandHandler;
    deniedText?: string;
};

export type CommandTable = ReadonlyMap<string, CommandEntry>;

export type DispatchOutcome = 'ok' | 'denied' | 'usage' | 'ignored';

export class CommandRouter {
    constructor(
        private readonly table: CommandTable,
        private readonly gate: AuthorizationGate,
        private readonly platform: ChatPlatform,
    ) {}

    /**
     * Runs one command and replies in the invoking chat and topic. Errors other
     * than denied/usage propagate to the caller after being counted.
     */
    async dispatch(invocation: CommandInvocation): Promise<DispatchOutcome> {
        const entry = this.table.get(invocation.command);
        if (!entry) return 'ignored';

        const { command } = invocation;
        if (!this.permits(entry.access, invocation.sender.id)) {
            recordCommand(command, 'denied');
            await this.reply(invocation, entry.deniedText ?? DENIED_DEFAULT);
            return 'denied';
        }

        let text: string;
        try {
            text = await entry.run(invocation);
        } catch (e: unknown) {
            if (e instanceof ValidationError) {
                recordCommand(command, 'usage');
                await this.reply(invocation, e.message);
                return 'usage';
            }
            if (e instanceof PermissionDeniedError) {
                recordCommand(command, 'denied');
                await this.reply(invocation, e.message);
                return 'denied';
            }
            recordCommand(command, 'error');
            throw e;
        }
        recordCommand(command, 'ok');
        await this.reply(invocation, text);
        return 'ok';
    }

    private permits(access: CommandAccess, userId: UserId | undefined): boolean {
        switch (access) {
            case 'public':
                return true;
            case 'admin':
                return this.gate.canManage(userId);
            case 'bootstrap':
                return this.gate.canAddAdmin(userId);
        }
    }

    private reply(invocation: CommandInvocation, text: string): Promise<void> {
        return this.platform.sendMessage({ chatId: invocation.chatId, threadId: invocation.threadId }, text);
    }
}
