import * as Joi from 'joi';
import { ValidationError } from '../errors';

/** On-disk layout of the configuration file. */
export type PersistedConfig = {
    spoiler_keywords: Record<string, string[]>;
    case_sensitive: boolean;
    admin_users: number[];
    enabled_chats: number[];
};

export type ParsedConfig = {
    config: PersistedConfig;
    /** Set when the file still had the old flat keyword list; its entries are dropped. */
    legacyKeywords?: string[];
};

const CHAT_ID_KEY = /^-?\d+$/;

const keywordMap = Joi.object().pattern(Joi.string().pattern(CHAT_ID_KEY), Joi.array().items(Joi.string()));

const persistedSchema = Joi.object({
    spoiler_keywords: Joi.alternatives().try(keywordMap, Joi.array().items(Joi.string())).default({}),
    case_sensitive: Joi.boolean().default(false),
    admin_users: Joi.array().items(Joi.number().integer()).default([]),
    enabled_chats: Joi.array().items(Joi.number().integer()).default([]),
}).unknown(true);

export function parsePersistedConfig(raw: unknown): ParsedConfig {
    const { error, value } = persistedSchema.validate(raw, { convert: true });
    if (error) throw new ValidationError(error.message);

    const keywords: unknown = value.spoiler_keywords;
    const base = {
        case_sensitive: Boolean(value.case_sensitive),
        admin_users: toNumbers(value.admin_users),
        enabled_chats: toNumbers(value.enabled_chats),
    };
    if (Array.isArray(keywords)) {
        return {
            config: { ...base, spoiler_keywords: {} },
            legacyKeywords: keywords.map(String),
        };
    }
    return { config: { ...base, spoiler_keywords: toKeywordRecord(keywords) } };
}

function toNumbers(list: unknown): number[] {
    return Array.isArray(list) ? list.filter((n): n is number => typeof n === 'number') : [];
}

function toKeywordRecord(input: unknown): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    if (!input || typeof input !== 'object') return out;
    for (const [chatId, list] of Object.entries(input)) {
        if (!Array.isArray(list)) continue;
        out[chatId] = list.filter((k): k is string => typeof k === 'string');
    }
    return out;
}
