import { AdminDescriptor, ChatId, CommandInvocation } from '../types';
import { ChatPlatform } from '../platform/types';
import { ConfigStore } from '../storage/config-store';
import { AuthorizationGate } from '../auth/gate';
import { AdminSyncService } from '../admins/sync';
import { PermissionDeniedError, ValidationError, describeError } from '../errors';
import { parseKeyword, parseUserId } from '../utils/validation';
import { childLogger } from '../utils/logger';
import { CommandEntry, CommandTable } from './router';
import {
    DENIED_ADD_ADMIN,
    DENIED_CHATS,
    DENIED_KEYWORDS,
    DENIED_SETTINGS,
    HELP_TEXT,
    SYNC_ADMINS_FAILED,
    USAGE_ADD_ADMIN,
    USAGE_ADD_KEYWORD,
    USAGE_REMOVE_KEYWORD,
    USAGE_SYNC_ADMINS,
    WELCOME_TEXT,
} from './texts';

export type CommandDeps = {
    store: ConfigStore;
    gate: AuthorizationGate;
    sync: AdminSyncService;
    platform: ChatPlatform;
};

const log = childLogger('commands');

const caseLabel = (caseSensitive: boolean) => (caseSensitive ? 'Case sensitive' : 'Case insensitive');

const bullets = (items: string[]) => items.map(item => `• ${item}`).join('\n');

/** Builds the command dispatch table once at startup. */
export function createCommandTable({ store, gate, sync, platform }: CommandDeps): CommandTable {
    const chatTitle = async (chatId: ChatId): Promise<string> => {
        try {
            const chat = await platform.getChat(chatId);
            return chat.title ? `${chat.title} (${chatId})` : String(chatId);
        } catch (e: unknown) {
            log.warn('Could not fetch chat metadata', { chatId, error: describeError(e) });
            return String(chatId);
        }
    };

    const entries: Array<[string, CommandEntry]> = [
        ['start', { access: 'public', run: async () => WELCOME_TEXT }],
        ['help', { access: 'public', run: async () => HELP_TEXT }],
        [
            'add_keyword',
            {
                access: 'admin',
                deniedText: DENIED_KEYWORDS,
                run: async ({ chatId, args }) => {
                    const keyword = parseKeyword(args, USAGE_ADD_KEYWORD);
                    const added = await store.addKeyword(chatId, keyword);
                    return added ? `✅ Added keyword: ${keyword}` : `ℹ️ Keyword already configured: ${keyword}`;
                },
            },
        ],
        [
            'remove_keyword',
            {
                access: 'admin',
                deniedText: DENIED_KEYWORDS,
                run: async ({ chatId, args }) => {
                    const keyword = parseKeyword(args, USAGE_REMOVE_KEYWORD);
                    const removed = await store.removeKeyword(chatId, keyword);
                    return removed ? `✅ Removed keyword: ${keyword}` : `❌ Keyword "${keyword}" not found.`;
                },
            },
        ],
        [
            'list_keywords',
            {
                access: 'public',
                run: async ({ chatId }) => {
                    const keywords = Array.from(store.getChatKeywords(chatId)).sort();
                    if (keywords.length === 0) return '📝 No spoiler keywords configured for this chat.';
                    return `📝 Spoiler keywords (${caseLabel(store.isCaseSensitive())}):\n\n${bullets(keywords)}`;
                },
            },
        ],
        [
            'list_all_keywords',
            {
                access: 'admin',
                deniedText: DENIED_KEYWORDS,
                run: async () => {
                    const chats = store.listAllKeywords();
                    if (chats.length === 0) return '📝 No spoiler keywords configured in any chat.';
                    const sections = await Promise.all(
                        chats.map(async ({ chatId, keywords }) => `${await chatTitle(chatId)}:\n${bullets(keywords)}`),
                    );
                    return `📝 All spoiler keywords (${caseLabel(store.isCaseSensitive())}):\n\n${sections.join('\n\n')}`;
                },
            },
        ],
        [
            'enable_chat',
            {
                access: 'admin',
                deniedText: DENIED_CHATS,
                run: async ({ chatId }) => {
                    await store.setEnabled(chatId, true);
                    return '✅ Spoiler detection enabled in this chat.';
                },
            },
        ],
        [
            'disable_chat',
            {
                access: 'admin',
                deniedText: DENIED_CHATS,
                run: async ({ chatId }) => {
                    await store.setEnabled(chatId, false);
                    return '✅ Spoiler detection disabled in this chat.';
                },
            },
        ],
        [
            'toggle_case',
            {
                access: 'admin',
                deniedText: DENIED_SETTINGS,
                run: async () => {
                    const caseSensitive = await store.toggleCaseSensitivity();
                    return `✅ Case sensitivity ${caseSensitive ? 'enabled' : 'disabled'}.`;
                },
            },
        ],
        [
            'add_admin',
            {
                access: 'bootstrap',
                deniedText: DENIED_ADD_ADMIN,
                run: async ({ sender, args }: CommandInvocation) => {
                    const userId = parseUserId(args[0], USAGE_ADD_ADMIN);
                    // the router checked already; this re-check runs inside the store's critical section
                    const outcome = await store.addAdmin(userId, admins => gate.canAddAdmin(sender.id, admins));
                    if (outcome === 'denied') throw new PermissionDeniedError(DENIED_ADD_ADMIN);
                    if (outcome === 'exists') return `ℹ️ ${userId} is already an administrator.`;
                    log.info('Administrator added', { userId, by: sender.id });
                    return `✅ Added administrator: ${userId}`;
                },
            },
        ],
        [
            'sync_admins',
            {
                access: 'admin',
                deniedText: DENIED_SETTINGS,
                run: async ({ chatId, chatType }) => {
                    if (chatType === 'private') throw new ValidationError(USAGE_SYNC_ADMINS);
                    let added: AdminDescriptor[];
                    try {
                        added = await sync.syncFromPlatform(chatId);
                    } catch (e: unknown) {
                        log.warn('Could not fetch chat administrators', { chatId, error: describeError(e) });
                        return SYNC_ADMINS_FAILED;
                    }
                    if (added.length === 0) return 'ℹ️ No new administrators to add.';
                    return `✅ Added ${added.length} administrator(s):\n${bullets(added.map(a => `${a.displayName} (${a.id})`))}`;
                },
            },
        ],
    ];

    return new Map(entries);
}
