import fs from 'fs';
import path from 'path';
import { ChatId, ConfigSnapshot, UserId } from '../types';
import { ConfigIOError, ValidationError, describeError } from '../errors';
import { SerialQueue } from '../utils/serial-queue';
import { childLogger } from '../utils/logger';
import { recordConfigSave } from '../utils/metrics';
import { PersistedConfig, parsePersistedConfig } from './schema';

export type AddAdminOutcome = 'added' | 'exists' | 'denied';

type Change<T> = { result: T; changed: boolean };

/**
 * Owns every piece of bot configuration: per-chat keyword sets, the global
 * case flag, bot administrators and the enabled-chat set.
 *
 * Reads are synchronous and return copies. Every mutation goes through one
 * serial queue and is written to disk before its promise resolves, so two
 * concurrent commands can never interleave a read-modify-write and a save
 * always serializes a complete state.
 */
export class ConfigStore {
    private keywords = new Map<ChatId, Set<string>>();
    private caseSensitive = false;
    private admins = new Set<UserId>();
    private enabledChats = new Set<ChatId>();
    private readonly queue = new SerialQueue();
    private readonly log = childLogger('config-store');

    constructor(private readonly filePath: string) {}

    get path(): string {
        return this.filePath;
    }

    /**
     * Reads the file. Never rejects: unreadable or invalid files leave the
     * store on empty defaults, a missing file is created with defaults.
     */
    load(): Promise<void> {
        return this.queue.run(() => this.loadFromDisk());
    }

    /** Writes the current state. Resolves `false` when the write failed. */
    save(): Promise<boolean> {
        return this.queue.run(() => this.writeToDisk());
    }

    getChatKeywords(chatId: ChatId): Set<string> {
        return new Set(this.keywords.get(chatId) ?? []);
    }

    isCaseSensitive(): boolean {
        return this.caseSensitive;
    }

    isEnabled(chatId: ChatId): boolean {
        return this.enabledChats.has(chatId);
    }

    isAdmin(userId: UserId): boolean {
        return this.admins.has(userId);
    }

    getAdmins(): Set<UserId> {
        return new Set(this.admins);
    }

    /** Every chat with keywords, each list sorted. */
    listAllKeywords(): Array<{ chatId: ChatId; keywords: string[] }> {
        return Array.from(this.keywords.entries()).map(([chatId, set]) => ({
            chatId,
            keywords: Array.from(set).sort(),
        }));
    }

    snapshot(): ConfigSnapshot {
        return {
            keywords: new Map(Array.from(this.keywords.entries()).map(([id, set]) => [id, new Set(set)])),
            caseSensitive: this.caseSensitive,
            admins: new Set(this.admins),
            enabledChats: new Set(this.enabledChats),
        };
    }

    /** Resolves `false` when the keyword was already present. */
    addKeyword(chatId: ChatId, keyword: string): Promise<boolean> {
        return this.mutate(() => {
            const value = this.applyCasePolicy(keyword.trim());
            if (!value) throw new ValidationError('Keyword cannot be empty.');
            const set = this.keywords.get(chatId) ?? new Set<string>();
            if (set.has(value)) return { result: false, changed: false };
            set.add(value);
            this.keywords.set(chatId, set);
            return { result: true, changed: true };
        });
    }

    /** Resolves `false` when the keyword was not configured for the chat. */
    removeKeyword(chatId: ChatId, keyword: string): Promise<boolean> {
        return this.mutate(() => {
            const value = this.applyCasePolicy(keyword.trim());
            const set = this.keywords.get(chatId);
            if (!set || !set.delete(value)) return { result: false, changed: false };
            if (set.size === 0) this.keywords.delete(chatId);
            return { result: true, changed: true };
        });
    }

    setEnabled(chatId: ChatId, enabled: boolean): Promise<boolean> {
        return this.mutate(() => {
            const changed = enabled !== this.enabledChats.has(chatId);
            if (enabled) this.enabledChats.add(chatId);
            else this.enabledChats.delete(chatId);
            return { result: changed, changed };
        });
    }

    /**
     * `authorize` sees the administrator set as it is inside the critical
     * section, so check-then-insert cannot race with another add.
     */
    addAdmin(userId: UserId, authorize?: (admins: ReadonlySet<UserId>) => boolean): Promise<AddAdminOutcome> {
        return this.mutate((): Change<AddAdminOutcome> => {
            if (authorize && !authorize(this.admins)) return { result: 'denied', changed: false };
            if (this.admins.has(userId)) return { result: 'exists', changed: false };
            this.admins.add(userId);
            return { result: 'added', changed: true };
        });
    }

    /** Adds the ids not yet present and resolves with exactly those. */
    addAdmins(userIds: UserId[]): Promise<UserId[]> {
        return this.mutate(() => {
            const added: UserId[] = [];
            for (const id of userIds) {
                if (this.admins.has(id)) continue;
                this.admins.add(id);
                added.push(id);
            }
            return { result: added, changed: added.length > 0 };
        });
    }

    /**
     * Flips the case flag. Switching to case-insensitive lower-cases every
     * stored keyword; duplicates collapse.
     */
    toggleCaseSensitivity(): Promise<boolean> {
        return this.mutate(() => {
            this.caseSensitive = !this.caseSensitive;
            if (!this.caseSensitive) {
                for (const [chatId, set] of this.keywords) {
                    this.keywords.set(chatId, new Set(Array.from(set, k => k.toLowerCase())));
                }
            }
            return { result: this.caseSensitive, changed: true };
        });
    }

    private mutate<T>(change: () => Change<T>): Promise<T> {
        return this.queue.run(async () => {
            const { result, changed } = change();
            if (changed) await this.writeToDisk();
            return result;
        });
    }

    private applyCasePolicy(keyword: string): string {
        return this.caseSensitive ? keyword : keyword.toLowerCase();
    }

    private async loadFromDisk(): Promise<void> {
        let text: string;
        try {
            text = await fs.promises.readFile(this.filePath, 'utf8');
        } catch (e: unknown) {
            this.apply(undefined);
            if (isMissingFile(e)) {
                this.log.info(`No configuration at ${this.filePath}, creating defaults`);
                await this.writeToDisk();
                return;
            }
            this.log.error(new ConfigIOError(this.filePath, e).message);
            return;
        }

        try {
            const parsed = parsePersistedConfig(JSON.parse(text));
            this.apply(parsed.config);
            if (parsed.legacyKeywords) {
                this.log.warn('Discarded legacy flat keyword list; keywords are now configured per chat', {
                    discarded: parsed.legacyKeywords.length,
                });
                await this.writeToDisk();
            }
            this.log.info('Loaded configuration', {
                chats: this.keywords.size,
                admins: this.admins.size,
                enabledChats: this.enabledChats.size,
                caseSensitive: this.caseSensitive,
            });
        } catch (e: unknown) {
            this.apply(undefined);
            this.log.error(`${new ConfigIOError(this.filePath, e).message}; continuing with empty defaults`);
        }
    }

    private async writeToDisk(): Promise<boolean> {
        // serialized before the first await: later mutations wait in the queue anyway
        const body = JSON.stringify(this.toPersisted(), null, 2);
        const tmp = `${this.filePath}.tmp`;
        try {
            await fs.promises.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
            await fs.promises.writeFile(tmp, body, 'utf8');
            await fs.promises.rename(tmp, this.filePath);
            recordConfigSave(true);
            this.log.debug('Configuration saved');
            return true;
        } catch (e: unknown) {
            recordConfigSave(false);
            this.log.error(`${new ConfigIOError(this.filePath, e).message}; keeping in-memory state`, {
                cause: describeError(e),
            });
            return false;
        }
    }

    private apply(config: PersistedConfig | undefined): void {
        this.keywords = new Map();
        for (const [key, list] of Object.entries(config?.spoiler_keywords ?? {})) {
            if (list.length === 0) continue;
            this.keywords.set(Number(key), new Set(list));
        }
        this.caseSensitive = config?.case_sensitive ?? false;
        this.admins = new Set(config?.admin_users ?? []);
        this.enabledChats = new Set(config?.enabled_chats ?? []);
    }

    private toPersisted(): PersistedConfig {
        const spoilerKeywords: Record<string, string[]> = {};
        for (const [chatId, set] of this.keywords) {
            if (set.size > 0) spoilerKeywords[String(chatId)] = Array.from(set);
        }
        return {
            spoiler_keywords: spoilerKeywords,
            case_sensitive: this.caseSensitive,
            admin_users: Array.from(this.admins),
            enabled_chats: Array.from(this.enabledChats),
        };
    }
}

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}
