import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger, isLogLevel } from '../utils/logger.js';
import { initHttpClient } from '../utils/http-client.js';
import { ArxivHarvester } from '../builder/harvester.js';
import { ArxivSource } from '../sources/arxiv.js';
import { ScholarClient, type CitationKey } from '../citations/scholar.js';
import { findPrimeAuthors, nameQuery } from '../analysis/authors.js';
import type { ExportFormat, HarvestConfig, LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

interface FetchOptions {
    category?: string[];
    maxResults?: number;
    out?: string;
    format?: ExportFormat;
    concurrency?: number;
    keepGoing?: boolean;
    citations?: boolean;
    citationsBy: CitationKey;
    quiet?: boolean;
    author?: string;
    topAuthors?: number;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

function positiveInt(value: string): number {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function nonNegativeInt(value: string): number {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function exportFormat(value: string): ExportFormat {
    const format = value.toLowerCase();
    if (format !== 'csv' && format !== 'json') {
        throw new InvalidArgumentError('Valid formats: csv, json.');
    }
    return format;
}

function citationKey(value: string): CitationKey {
    if (value !== 'arxiv_id' && value !== 'title') {
        throw new InvalidArgumentError('Valid keys: arxiv_id, title.');
    }
    return value;
}

function logLevel(value: string): LogLevel {
    if (!isLogLevel(value)) {
        throw new InvalidArgumentError('Valid levels: debug, info, warn, error.');
    }
    return value;
}

const program = new Command();

program
    .name('arxiv-harvest')
    .description('Collect arXiv article metadata into a deduplicated table with derived features.')
    .version(VERSION);

// ─── FETCH command ────────────────────────────────────────

program
    .command('fetch')
    .description('Fetch every query × category pair, derive features and save the table')
    .argument('[queries...]', 'Title queries (words in one query are AND-ed); omit to fetch whole categories')
    .option('-c, --category <categories...>', 'arXiv categories (default: quant-ph)')
    .option('-m, --max-results <n>', 'Maximum results per query/category pair', positiveInt)
    .option('-o, --out <path>', 'Output file path (default: arXiv_df.csv)')
    .option('-f, --format <format>', 'Output format: csv | json', exportFormat)
    .option('--concurrency <n>', 'Fetches in flight at once', positiveInt)
    .option('--keep-going', 'Skip failed fetches instead of aborting')
    .option('--citations', 'Look up citation counts on Google Scholar (slow, best effort)')
    .option('--citations-by <key>', 'Citation lookup key: arxiv_id | title', citationKey, 'arxiv_id')
    .option('-q, --quiet', 'Do not log each request URL')
    .option('--author <name>', 'Keep only records with a matching author')
    .option('--top-authors <threshold>', 'Print authors on more than <threshold> records', nonNegativeInt)
    .option('--log-level <level>', 'Log level: debug | info | warn | error', logLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (queries: string[], opts: FetchOptions) => {
        const cliConfig: Partial<HarvestConfig> = {
            queries: queries.length > 0 ? queries : undefined,
            categories: opts.category,
            maxResults: opts.maxResults,
            out: opts.out,
            format: opts.format,
            concurrency: opts.concurrency,
            failFast: opts.keepGoing ? false : undefined,
            citations: opts.citations,
            verbose: opts.quiet ? false : undefined,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
        };

        const config = await resolveConfig(cliConfig);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const http = initHttpClient({ timeout: config.timeout, version: VERSION });

        const logger = getLogger();
        logger.info({ queries: config.queries, categories: config.categories, maxResults: config.maxResults }, 'Starting harvest');

        try {
            const harvester = new ArxivHarvester({
                source: new ArxivSource(http),
                concurrency: config.concurrency,
                failFast: config.failFast,
                scholar: config.citations ? new ScholarClient(http) : undefined,
                citationKey: opts.citationsBy,
            });

            let rows = await harvester.get(config.queries, config.categories, config.maxResults, config.verbose);

            if (opts.author) {
                rows = nameQuery(rows, opts.author);
                logger.info({ author: opts.author, matches: rows.length }, 'Filtered by author');
            }

            if (opts.topAuthors !== undefined) {
                console.log(`\nAuthors on more than ${opts.topAuthors} records:\n`);
                for (const { name, count } of findPrimeAuthors(rows, opts.topAuthors)) {
                    console.log(`  ${count}\t${name}`);
                }
                console.log('');
            }

            if (harvester.failures.length > 0) {
                logger.warn({ failed: harvester.failures.length }, 'Some fetches failed; the table is partial');
            }

            harvester.save(config.out, config.format, rows);
        } catch (error) {
            logger.error({ error }, 'Harvest failed');
            process.exitCode = 1;
        }
    });

await program.parseAsync();
