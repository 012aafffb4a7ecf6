import { ValidationError } from '../errors';
import { UserId } from '../types';

export const MAX_KEYWORD_LENGTH = 100;

export function validateStringLength(input: string, minLength: number, maxLength: number): boolean {
    return input.length >= minLength && input.length <= maxLength;
}

/** Strict decimal user id; anything else is a usage error carrying `usage`. */
export function parseUserId(token: string | undefined, usage: string): UserId {
    const raw = (token ?? '').trim();
    if (!/^\d+$/.test(raw)) throw new ValidationError(usage);
    const id = Number(raw);
    if (!Number.isSafeInteger(id) || id <= 0) throw new ValidationError(usage);
    return id;
}

/** Command arguments form one keyword, words joined by single spaces. */
export function parseKeyword(args: string[], usage: string): string {
    const keyword = args.join(' ').trim();
    if (!keyword) throw new ValidationError(usage);
    if (!validateStringLength(keyword, 1, MAX_KEYWORD_LENGTH)) {
        throw new ValidationError(`❌ Keywords are limited to ${MAX_KEYWORD_LENGTH} characters.`);
    }
    return keyword;
}
