import { TextSegment } from '../types';
import { caseFlags, escapeRegExp, wholeWordSource } from './matcher';

export const SPOILER_MARK = '||';

/**
 * Splits `text` into plain runs and hidden runs, one hidden run per whole-word
 * occurrence of `keywords`, keeping the occurrence's own casing.
 *
 * All keywords go through one pass, longest first, so overlapping keywords
 * never nest. An occurrence that is already wrapped in `||…||` becomes a hidden
 * run of its inner text.
 */
export function redactSegments(text: string, keywords: string[], caseSensitive: boolean): TextSegment[] {
    const unique = Array.from(new Set(keywords.filter(Boolean))).sort((a, b) => b.length - a.length);
    if (unique.length === 0) return text ? [{ text, hidden: false }] : [];

    const alternatives = unique.map(escapeRegExp).join('|');
    const mark = escapeRegExp(SPOILER_MARK);
    const pattern = new RegExp(
        `${mark}(${alternatives})${mark}|${wholeWordSource(unique)}`,
        `g${caseFlags(caseSensitive)}`,
    );

    const segments: TextSegment[] = [];
    let last = 0;
    for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        if (start > last) segments.push({ text: text.slice(last, start), hidden: false });
        segments.push({ text: match[1] ?? match[0], hidden: true });
        last = start + match[0].length;
    }
    if (last < text.length) segments.push({ text: text.slice(last), hidden: false });
    return segments;
}

/** Flattens segments to plain text with `||…||` around hidden runs. */
export function joinSegments(segments: TextSegment[]): string {
    return segments.map(s => (s.hidden ? `${SPOILER_MARK}${s.text}${SPOILER_MARK}` : s.text)).join('');
}

/** `redactSegments` flattened; idempotent. */
export function redact(text: string, keywords: string[], caseSensitive: boolean): string {
    return joinSegments(redactSegments(text, keywords, caseSensitive));
}
