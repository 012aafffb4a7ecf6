// A keyword counts only as a whole word: no letter, digit or underscore
// directly before or after it (Unicode-aware, unlike \b).
const WORD_BEFORE = '(?<![\\p{L}\\p{N}_])';
const WORD_AFTER = '(?![\\p{L}\\p{N}_])';

export function escapeRegExp(literal: string): string {
    return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Source of a pattern matching any of `keywords` as a whole word. */
export function wholeWordSource(keywords: string[]): string {
    const alternatives = keywords.map(escapeRegExp).join('|');
    return `${WORD_BEFORE}(?:${alternatives})${WORD_AFTER}`;
}

export function caseFlags(caseSensitive: boolean): string {
    return caseSensitive ? 'u' : 'iu';
}

/**
 * Returns the keywords of `chatKeywords` that occur in `text`, in set order.
 */
export function findMatches(text: string, chatKeywords: ReadonlySet<string>, caseSensitive: boolean): string[] {
    if (chatKeywords.size === 0 || !text) return [];
    const flags = caseFlags(caseSensitive);
    const found: string[] = [];
    for (const keyword of chatKeywords) {
        if (!keyword) continue;
        if (new RegExp(wholeWordSource([keyword]), flags).test(text)) found.push(keyword);
    }
    return found;
}
