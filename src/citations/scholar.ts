import * as cheerio from 'cheerio';
import type { ArticleRow, Transport } from '../types/index.js';
import { compactTitle, stripArxivVersion } from '../sources/utils.js';
import { CitationLookupError, TransportError } from '../utils/errors.js';
import { getHttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const SCHOLAR_BASE = 'https://scholar.google.com/scholar?';

/** Text Scholar shows on its captcha / rate-limit page */
const BLOCK_MARKER = 'Why did this happen';

export type CitationKey = 'arxiv_id' | 'title';

interface ScholarResult {
    title: string;
    text: string;
}

/**
 * Whether a scraped result title matches the target title.
 * Compares the first third of both titles after dropping non-alphanumerics.
 */
export function checkTitle(scraped: string, target: string): boolean {
    const a = compactTitle(scraped);
    const b = compactTitle(target);
    if (a === '' || b === '') return false;

    const checkLength = Math.floor(Math.min(a.length, b.length) / 3);
    return a.slice(0, checkLength) === b.slice(0, checkLength);
}

/**
 * The count in "Cited by N", or null when the text has no such link.
 */
export function parseCitedBy(text: string): number | null {
    const match = text.match(/Cited by (\d+)/);
    return match?.[1] ? parseInt(match[1], 10) : null;
}

export function buildScholarUrl(query: string): string {
    const params = new URLSearchParams({
        hl: 'en',
        as_sdt: '0,47',
        q: query,
        btnG: '',
    });
    return `${SCHOLAR_BASE}${params.toString()}`;
}

/**
 * Best-effort citation counts scraped from Google Scholar result pages.
 * Scholar actively blocks scripted clients, so every failure surfaces as
 * CitationLookupError and callers must treat the feature as optional.
 */
export class ScholarClient {
    private transport: Transport;

    constructor(transport?: Transport) {
        this.transport = transport ?? getHttpClient();
    }

    /**
     * Citation count of the first result whose title matches.
     * 0 when it matched without a "Cited by" link, null when nothing matched.
     */
    async citationsByTitle(title: string): Promise<number | null> {
        const results = await this.search(title);

        const match = results.find((result) => checkTitle(result.title, title));
        if (!match) return null;

        return parseCitedBy(match.text) ?? 0;
    }

    /**
     * Citation count of the first result carrying a "Cited by" link, else 0.
     */
    async citationsByArxivId(arxivId: string): Promise<number> {
        const results = await this.search(stripArxivVersion(arxivId));

        for (const result of results) {
            const count = parseCitedBy(result.text);
            if (count !== null) return count;
        }
        return 0;
    }

    private async search(query: string): Promise<ScholarResult[]> {
        let html: string;
        try {
            html = await this.transport.get(buildScholarUrl(query));
        } catch (error) {
            if (error instanceof TransportError) {
                const refused = error.status === 403 || error.status === 429;
                throw new CitationLookupError(`Scholar request failed: ${error.message}`, query, refused, { cause: error });
            }
            throw error;
        }

        const $ = cheerio.load(html);
        if ($.root().text().includes(BLOCK_MARKER)) {
            throw new CitationLookupError('Scholar refused the request (captcha page)', query, true);
        }

        return $('div.gs_ri')
            .toArray()
            .map((el) => {
                const entry = $(el);
                return { title: entry.find('h3').first().text(), text: entry.text() };
            });
    }
}

/**
 * Add a `citations` column to every row. Never throws for lookup failures:
 * a failed row gets null, and once Scholar starts refusing requests the
 * remaining rows are not attempted.
 */
export async function attachCitations(
    rows: ArticleRow[],
    client: ScholarClient,
    by: CitationKey = 'arxiv_id'
): Promise<ArticleRow[]> {
    const logger = getLogger();
    const enriched: ArticleRow[] = [];
    let blocked = false;

    for (const row of rows) {
        if (blocked) {
            enriched.push({ ...row, citations: null });
            continue;
        }

        try {
            const citations = by === 'title'
                ? await client.citationsByTitle(row.title)
                : await client.citationsByArxivId(row.arxiv_id);
            enriched.push({ ...row, citations });
        } catch (error) {
            if (!(error instanceof CitationLookupError)) throw error;
            logger.warn({ arxivId: row.arxiv_id, reason: error.message }, 'Citation lookup failed');
            blocked = error.blocked;
            enriched.push({ ...row, citations: null });
        }
    }

    const found = enriched.filter((row) => row.citations !== null).length;
    logger.info({ found, total: rows.length, blocked }, 'Citation lookup finished');

    return enriched;
}
