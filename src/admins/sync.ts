import { AdminDescriptor, ChatId, UserId } from '../types';
import { ChatPlatform } from '../platform/types';
import { childLogger } from '../utils/logger';
import { recordAdminsSynced } from '../utils/metrics';

export interface AdminRegistry {
    addAdmins(userIds: UserId[]): Promise<UserId[]>;
}

/**
 * Copies a chat's human administrators into the bot administrator set.
 *
 * Accrual only: people who lose chat admin rights keep their bot rights until
 * removed from the configuration file by hand.
 */
export class AdminSyncService {
    private readonly log = childLogger('admin-sync');

    constructor(
        private readonly platform: ChatPlatform,
        private readonly registry: AdminRegistry,
    ) {}

    async syncFromPlatform(chatId: ChatId): Promise<AdminDescriptor[]> {
        const administrators = await this.platform.getChatAdministrators(chatId);
        const humans = administrators.filter(a => !a.isBot);
        const added = new Set(await this.registry.addAdmins(humans.map(a => a.id)));
        const report = humans
            .filter(a => added.has(a.id))
            .map(({ id, displayName }) => ({ id, displayName }));

        recordAdminsSynced(report.length);
        this.log.info('Synchronized chat administrators', {
            chatId,
            fetched: administrators.length,
            added: report.map(a => a.id),
        });
        return report;
    }
}
