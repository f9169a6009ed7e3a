/**
 * Shared utilities for sources and lookups.
 */

/**
 * Normalize a single value or a list into a list.
 * "quant-ph" → ["quant-ph"]
 */
export function toList<T>(value: T | T[]): T[] {
    return Array.isArray(value) ? value : [value];
}

/**
 * Remove the version suffix from an arXiv identifier.
 * "2101.00001v2" → "2101.00001"
 * "quant-ph/0101001v1" → "quant-ph/0101001"
 */
export function stripArxivVersion(arxivId: string): string {
    return arxivId.replace(/v\d+$/, '');
}

/**
 * Lowercase and drop everything but ASCII letters and digits, for title matching.
 * "Quantum Walks: A Review" → "quantumwalksareview"
 */
export function compactTitle(title: string): string {
    return title.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Count whitespace-separated words.
 */
export function wordCount(text: string): number {
    return text.split(/\s+/).filter(Boolean).length;
}
