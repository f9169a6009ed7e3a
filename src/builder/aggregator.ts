import type { ArticleRecord } from '../types/index.js';
import type { ArxivSource } from '../sources/arxiv.js';
import { toList } from '../sources/utils.js';
import { TransportError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface AggregateOptions {
    maxResults?: number;
    verbose?: boolean;

    /** Number of fetches in flight at once. Output order never depends on it. */
    concurrency?: number;

    /** Abort on the first TransportError (default) or record it and keep going. */
    failFast?: boolean;
}

/**
 * A (query, category) pair whose fetch failed under `failFast: false`.
 */
export interface FetchFailure {
    query: string;
    category: string;
    error: TransportError;
}

export interface AggregateResult {
    records: ArticleRecord[];
    failures: FetchFailure[];
}

interface FetchTask {
    query: string;
    category: string;
}

/**
 * Fetch every (query, category) pair of the full cross product, concatenate
 * in enumeration order (queries outer, categories inner) and keep the first
 * record seen for each arxiv_id.
 */
export async function aggregate(
    source: Pick<ArxivSource, 'fetch'>,
    queries: string | string[],
    categories: string | string[],
    options: AggregateOptions = {}
): Promise<AggregateResult> {
    const { maxResults = 1000, verbose = true, concurrency = 1, failFast = true } = options;
    const logger = getLogger();

    const tasks: FetchTask[] = [];
    for (const query of toList(queries)) {
        for (const category of toList(categories)) {
            tasks.push({ query, category });
        }
    }

    logger.info('Start fetching...');

    // One slot per task so completion order can't leak into concatenation order
    const results: Array<ArticleRecord[] | FetchFailure | undefined> = tasks.map(() => undefined);
    let next = 0;
    let aborted = false;

    const worker = async (): Promise<void> => {
        while (!aborted && next < tasks.length) {
            const index = next++;
            const task = tasks[index];
            if (!task) return;
            try {
                results[index] = await source.fetch(task.query, task.category, maxResults, verbose);
            } catch (error) {
                if (failFast || !(error instanceof TransportError)) {
                    aborted = true;
                    throw error;
                }
                logger.warn({ query: task.query, category: task.category, error: error.message }, 'Fetch failed, continuing');
                results[index] = { ...task, error };
            }
        }
    };

    const workerCount = Math.min(workerLimit(concurrency), Math.max(1, tasks.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const failures: FetchFailure[] = [];
    const batches: ArticleRecord[][] = [];
    for (const result of results) {
        if (result === undefined) continue;
        if (Array.isArray(result)) batches.push(result);
        else failures.push(result);
    }

    const records = dedupeById(batches.flat());
    logger.info(`Totally ${records.length} entries`);

    return { records, failures };
}

// Anything but a positive integer runs the pairs one at a time
function workerLimit(concurrency: number): number {
    return Number.isInteger(concurrency) && concurrency > 0 ? concurrency : 1;
}

/**
 * Keep the first record for each arxiv_id, preserving order.
 */
export function dedupeById(records: ArticleRecord[]): ArticleRecord[] {
    const seen = new Set<string>();
    const unique: ArticleRecord[] = [];

    for (const record of records) {
        if (!seen.has(record.arxiv_id)) {
            seen.add(record.arxiv_id);
            unique.push(record);
        }
    }

    return unique;
}
