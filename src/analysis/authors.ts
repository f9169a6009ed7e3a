import type { ArticleRecord } from '../types/index.js';

export interface AuthorCount {
    name: string;
    count: number;
}

/**
 * Authors appearing on more than `threshold` records, most prolific first
 * (or least, with `ascending`). Ties keep first-appearance order.
 */
export function findPrimeAuthors(
    records: Pick<ArticleRecord, 'authors'>[],
    threshold = 2,
    ascending = false
): AuthorCount[] {
    const counts = new Map<string, number>();
    for (const record of records) {
        for (const author of record.authors) {
            counts.set(author, (counts.get(author) ?? 0) + 1);
        }
    }

    const prime = [...counts.entries()]
        .filter(([, count]) => count > threshold)
        .map(([name, count]) => ({ name, count }));

    // Array.prototype.sort is stable, so equal counts stay in insertion order
    return prime.sort((a, b) => (ascending ? a.count - b.count : b.count - a.count));
}

/**
 * Records whose concatenated author list contains `query`, case-insensitive.
 */
export function nameQuery<T extends Pick<ArticleRecord, 'authors'>>(records: T[], query: string): T[] {
    const needle = query.toLowerCase();
    return records.filter((record) => record.authors.join('').toLowerCase().includes(needle));
}
