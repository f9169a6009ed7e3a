import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Transport } from '../types/index.js';

export function readFixture(name: string): string {
    return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');
}

export interface FeedEntry {
    id: string;
    title: string;
    published?: string;
    authors?: string[];
    comment?: string;
}

/**
 * Minimal arXiv-shaped Atom document for the given entries.
 */
export function atomFeed(entries: FeedEntry[]): string {
    const body = entries
        .map((e) => {
            const authors = (e.authors ?? ['Test Author'])
                .map((name) => `<author><name>${name}</name></author>`)
                .join('');
            const comment = e.comment
                ? `<arxiv:comment xmlns:arxiv="http://arxiv.org/schemas/atom">${e.comment}</arxiv:comment>`
                : '';
            const published = e.published ?? '2021-01-01T00:00:00Z';
            return `<entry><id>http://arxiv.org/abs/${e.id}</id><updated>${published}</updated>` +
                `<published>${published}</published><title>${e.title}</title><summary>s</summary>` +
                `${authors}${comment}<category term="quant-ph"/></entry>`;
        })
        .join('');
    return `<?xml version="1.0" encoding="UTF-8"?><feed xmlns="http://www.w3.org/2005/Atom">${body}</feed>`;
}

/**
 * In-process transport: answers from a URL → body function and records every URL asked for.
 */
export class FakeTransport implements Transport {
    readonly urls: string[] = [];

    constructor(private readonly respond: (url: string) => string | Promise<string>) {}

    async get(url: string): Promise<string> {
        this.urls.push(url);
        return this.respond(url);
    }
}

/**
 * `search_query` parameter of an arXiv request URL.
 */
export function searchQueryOf(url: string): string {
    return new URL(url).searchParams.get('search_query') ?? '';
}
