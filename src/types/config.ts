/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Output formats supported by `save`.
 */
export type ExportFormat = 'csv' | 'json';

/**
 * Full harvest configuration merged from CLI flags, env vars, and config file.
 */
export interface HarvestConfig {
    // Input
    queries: string[];
    categories: string[];
    maxResults: number;

    // Fetching
    verbose: boolean;
    concurrency: number;
    failFast: boolean;
    timeout: number;

    // Enrichment
    citations: boolean;

    // Output
    out: string;
    /** Inferred from the `out` extension when unset */
    format?: ExportFormat;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: HarvestConfig = {
    queries: [''],
    categories: ['quant-ph'],
    maxResults: 1000,
    verbose: true,
    concurrency: 1,
    failFast: true,
    timeout: 30000,
    citations: false,
    out: 'arXiv_df.csv',
    logLevel: 'info',
    jsonLogs: false,
};
