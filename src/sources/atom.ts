import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { ArticleRecord } from '../types/index.js';
import { MalformedRecordError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Length of the "http://arxiv.org/abs/" prefix on entry ids.
 */
export const ARXIV_ID_PREFIX_LENGTH = 21;

const COMMENT_TAG = 'arxiv:comment';

export type AtomEntry = Cheerio<Element>;

export interface AtomFeed {
    entries: AtomEntry[];

    /** `opensearch:totalResults`, the hit count before `max_results` applies */
    totalResults: number | null;
}

/**
 * Parse an arXiv Atom response into its `<entry>` elements.
 */
export function parseFeed(xml: string): AtomFeed {
    const $ = cheerio.load(xml, { xml: true });

    const total = $('feed')
        .children()
        .filter((_, el) => el.tagName === 'opensearch:totalResults')
        .first()
        .text();
    const totalResults = parseInt(total, 10);

    return {
        entries: $('entry')
            .toArray()
            .map((el) => $(el)),
        totalResults: isNaN(totalResults) ? null : totalResults,
    };
}

/**
 * Flatten one Atom entry into an ArticleRecord.
 * Throws MalformedRecordError when a required element is missing.
 */
export function extractRecord(entry: AtomEntry): ArticleRecord {
    const rawId = requireText(entry, 'id');
    const arxivId = rawId.slice(ARXIV_ID_PREFIX_LENGTH);
    if (!arxivId) {
        throw new MalformedRecordError(`Entry id "${rawId}" has no identifier after the prefix`, 'id');
    }

    const authors: string[] = [];
    const authorEls = entry.children('author');
    for (let i = 0; i < authorEls.length; i++) {
        const name = authorEls.eq(i).children('name').first();
        if (name.length === 0) {
            throw new MalformedRecordError(`Author #${i + 1} of ${arxivId} has no name`, 'author');
        }
        authors.push(name.text());
    }

    const categories: string[] = [];
    const categoryEls = entry.children('category');
    for (let i = 0; i < categoryEls.length; i++) {
        const term = categoryEls.eq(i).attr('term');
        if (term === undefined) {
            throw new MalformedRecordError(`Category #${i + 1} of ${arxivId} has no term attribute`, 'category');
        }
        categories.push(term);
    }

    const comment = entry
        .children()
        .filter((_, el) => el.tagName === COMMENT_TAG)
        .first();

    return {
        arxiv_id: arxivId,
        updated_date: requireText(entry, 'updated'),
        published_date: requireText(entry, 'published'),
        title: requireText(entry, 'title'),
        summary: requireText(entry, 'summary'),
        authors,
        comment: comment.length > 0 ? comment.text() : null,
        categories,
    };
}

/**
 * Convert a batch of entries. Malformed entries are logged and skipped;
 * the rest come back in document order.
 */
export function extractRecords(entries: AtomEntry[]): ArticleRecord[] {
    const records: ArticleRecord[] = [];

    entries.forEach((entry, index) => {
        try {
            records.push(extractRecord(entry));
        } catch (error) {
            if (!(error instanceof MalformedRecordError)) throw error;
            getLogger().warn({ index, field: error.field, reason: error.message }, 'Skipping malformed entry');
        }
    });

    return records;
}

function requireText(entry: AtomEntry, tag: string): string {
    const el = entry.children(tag).first();
    if (el.length === 0) {
        throw new MalformedRecordError(`Entry has no <${tag}> element`, tag);
    }
    return el.text();
}
