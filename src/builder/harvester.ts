import type { ArticleRow, ExportFormat } from '../types/index.js';
import { ArxivSource } from '../sources/arxiv.js';
import { attachCitations, type CitationKey, type ScholarClient } from '../citations/scholar.js';
import { exportRows } from '../exporters/export.js';
import { HarvestError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { aggregate, type FetchFailure } from './aggregator.js';
import { derive } from './features.js';

export interface HarvesterOptions {
    source?: ArxivSource;
    concurrency?: number;
    failFast?: boolean;

    /** When set, every row gets a best-effort `citations` column */
    scholar?: ScholarClient;
    citationKey?: CitationKey;
}

/**
 * Entry point for library use:
 *
 * 1. Fetch every (query, category) pair and deduplicate
 * 2. Derive pages, figures, author count, title length and date parts
 * 3. Optionally look up citation counts
 *
 * The last result is kept so `save()` can write it out.
 */
export class ArxivHarvester {
    private readonly source: ArxivSource;
    private readonly options: HarvesterOptions;
    private rows: ArticleRow[] | null = null;
    private lastFailures: FetchFailure[] = [];

    constructor(options: HarvesterOptions = {}) {
        this.source = options.source ?? new ArxivSource();
        this.options = options;
    }

    async get(
        queries: string | string[],
        categories: string | string[] = 'quant-ph',
        maxResults = 1000,
        verbose = true
    ): Promise<ArticleRow[]> {
        const { records, failures } = await aggregate(this.source, queries, categories, {
            maxResults,
            verbose,
            concurrency: this.options.concurrency,
            failFast: this.options.failFast,
        });

        let rows = derive(records);
        if (this.options.scholar) {
            rows = await attachCitations(rows, this.options.scholar, this.options.citationKey);
        }

        this.rows = rows;
        this.lastFailures = failures;
        return rows;
    }

    /**
     * Fetches that failed during the last `get()` (only with `failFast: false`).
     */
    get failures(): FetchFailure[] {
        return this.lastFailures;
    }

    /**
     * Write the last result (or a filtered subset of it) to disk.
     * The format follows the extension unless given.
     * @returns The path written
     */
    save(fileName = 'arXiv_df.csv', format?: ExportFormat, rows?: ArticleRow[]): string {
        const toWrite = rows ?? this.rows;
        if (toWrite === null) {
            throw new HarvestError('Nothing to save: call get() first');
        }

        exportRows(toWrite, fileName, format ?? formatFromPath(fileName));
        getLogger().info(`Saved as ${fileName}`);
        return fileName;
    }
}

function formatFromPath(path: string): ExportFormat {
    return path.toLowerCase().endsWith('.json') ? 'json' : 'csv';
}
