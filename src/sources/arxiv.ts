import type { ArticleRecord, Transport } from '../types/index.js';
import { getHttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { extractRecords, parseFeed } from './atom.js';

export const ARXIV_API_BASE = 'http://export.arxiv.org/api/query?';

/**
 * Build the `search_query` expression for one (query, category) pair.
 *
 * A string query is split on whitespace; a list is used as given. Terms are
 * AND-ed and restricted to titles. An empty query searches the whole category.
 *
 * @example
 * buildSearchQuery('quantum walk', 'quant-ph') // 'ti:quantum AND walk AND cat:quant-ph'
 * buildSearchQuery('', 'cs.LG')                // 'cat:cs.LG'
 */
export function buildSearchQuery(queryTerms: string | string[], category: string): string {
    const terms = typeof queryTerms === 'string' ? queryTerms.split(/\s+/).filter(Boolean) : queryTerms;
    const joined = terms.join(' AND ');

    if (joined === '') {
        return `cat:${category}`;
    }
    return `ti:${joined} AND cat:${category}`;
}

/**
 * Full request URL for one (query, category) pair, newest updates first.
 */
export function buildQueryUrl(queryTerms: string | string[], category: string, maxResults: number): string {
    const params = new URLSearchParams({
        search_query: buildSearchQuery(queryTerms, category),
        sortBy: 'lastUpdatedDate',
        sortOrder: 'descending',
        start: '0',
        max_results: String(maxResults),
    });

    return `${ARXIV_API_BASE}${params.toString()}`;
}

/**
 * arXiv export API source. One `fetch` call is one network round-trip;
 * there is no paging, so at most `maxResults` records come back.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivSource {
    private transport: Transport;

    constructor(transport?: Transport) {
        this.transport = transport ?? getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setTransport(transport: Transport): void {
        this.transport = transport;
    }

    /**
     * Fetch and extract the records for one (query, category) pair.
     * Transport failures propagate as TransportError.
     */
    async fetch(
        queryTerms: string | string[],
        category: string,
        maxResults = 1000,
        verbose = true
    ): Promise<ArticleRecord[]> {
        const logger = getLogger();
        const url = buildQueryUrl(queryTerms, category, maxResults);

        if (verbose) {
            logger.info(`Fetching from ${url}`);
        } else {
            logger.debug({ url }, 'arXiv query');
        }

        const body = await this.transport.get(url);
        const feed = parseFeed(body);
        const records = extractRecords(feed.entries);

        logger.debug(
            { category, entries: feed.entries.length, records: records.length, totalResults: feed.totalResults },
            'arXiv response parsed'
        );

        return records;
    }
}
