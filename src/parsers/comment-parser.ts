/**
 * Page and figure counts from arXiv `comment` annotations.
 *
 * Authors write these free-form: "12 pages, 3 figures", "5+3 pages",
 * "10pages", "Accepted at QIP. 4 figures". The parser looks for the number
 * written just before the keyword and gives up (returns null) on anything
 * it cannot read with confidence.
 */

export type CountKeyword = 'page' | 'figure';

/**
 * Drop everything except ASCII letters, digits, spaces and '+', then lowercase.
 */
export function cleanComment(comment: string): string {
    return comment.replace(/[^a-zA-Z0-9 +]/g, '').toLowerCase();
}

/**
 * Extract the count attached to `keyword` from a comment string.
 *
 * @returns The integer count, or null when the comment is missing, the keyword
 *          is absent, or the token before it is not a number or a sum of numbers.
 */
export function extractCount(comment: string | null | undefined, keyword: CountKeyword): number | null {
    if (typeof comment !== 'string') return null;

    const cleaned = cleanComment(comment);
    if (!cleaned.includes(keyword)) return null;

    const candidate = findCandidate(cleaned.split(/\s+/).filter(Boolean), keyword);
    if (candidate === null) return null;

    return interpretCandidate(candidate);
}

export function getPages(comment: string | null | undefined): number | null {
    return extractCount(comment, 'page');
}

export function getFigures(comment: string | null | undefined): number | null {
    return extractCount(comment, 'figure');
}

// ─── Internal helpers ─────────────────────────────────────

/**
 * Locate the token holding the number for `keyword`.
 * Plural match wins over singular, which wins over a glued form like "10pages".
 */
function findCandidate(words: string[], keyword: CountKeyword): string | null {
    const plural = words.indexOf(`${keyword}s`);
    if (plural !== -1) return words[plural - 1] ?? null;

    const singular = words.indexOf(keyword);
    if (singular !== -1) return words[singular - 1] ?? null;

    // Keyword is only present inside a longer token
    const glued = words.find((word) => word.includes(keyword));
    if (glued === undefined) return null;

    return glued.slice(0, glued.indexOf(keyword));
}

function interpretCandidate(candidate: string): number | null {
    if (isDigits(candidate)) return parseInt(candidate, 10);

    if (!candidate.includes('+')) return null;

    let sum = 0;
    for (const part of candidate.split('+')) {
        if (part === '') continue;
        if (!isDigits(part)) return null;
        sum += parseInt(part, 10);
    }
    return sum;
}

function isDigits(token: string): boolean {
    return /^[0-9]+$/.test(token);
}
