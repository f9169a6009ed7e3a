import type { ArticleRecord, ArticleRow } from '../types/index.js';
import { getFigures, getPages } from '../parsers/comment-parser.js';
import { wordCount } from '../sources/utils.js';
import { MalformedDateError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface PublishedDateParts {
    year: number;
    month: number;
    day: number;
}

/**
 * Split the leading `YYYY-MM-DD` of an ISO-8601 timestamp by position.
 * Throws MalformedDateError when the string is shorter than 10 characters
 * or any of the year/month/day slices is not all digits.
 */
export function parsePublishedDate(value: string): PublishedDateParts {
    if (value.length < 10) {
        throw new MalformedDateError(value);
    }

    const year = value.slice(0, 4);
    const month = value.slice(5, 7);
    const day = value.slice(8, 10);

    if (![year, month, day].every((part) => /^[0-9]+$/.test(part))) {
        throw new MalformedDateError(value);
    }

    return {
        year: parseInt(year, 10),
        month: parseInt(month, 10),
        day: parseInt(day, 10),
    };
}

/**
 * Attach derived columns to one record. A malformed published date leaves
 * the three date columns null instead of failing the row.
 */
export function deriveFeatures(record: ArticleRecord): ArticleRow {
    let date: PublishedDateParts | null = null;
    try {
        date = parsePublishedDate(record.published_date);
    } catch (error) {
        if (!(error instanceof MalformedDateError)) throw error;
        getLogger().warn({ arxivId: record.arxiv_id, value: error.value }, 'Malformed published date');
    }

    return {
        ...record,
        pages: getPages(record.comment),
        figures: getFigures(record.comment),
        num_of_authors: record.authors.length,
        title_length: wordCount(record.title),
        year_of_publishing: date?.year ?? null,
        month_of_publishing: date?.month ?? null,
        date_of_publishing: date?.day ?? null,
    };
}

/**
 * Derive features for every record, preserving order.
 */
export function derive(records: ArticleRecord[]): ArticleRow[] {
    return records.map(deriveFeatures);
}
