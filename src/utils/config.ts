import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type HarvestConfig } from '../types/index.js';
import { envLogLevel, getLogger } from './logger.js';

/**
 * Load configuration from arxiv-harvest.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<HarvestConfig> | null> {
    const explorer = cosmiconfig('arxiv-harvest', {
        searchPlaces: ['arxiv-harvest.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return pickConfig(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Keep only recognised keys with the right primitive type.
 * Unknown or mistyped keys in the file are dropped with a warning.
 */
export function pickConfig(raw: unknown): Partial<HarvestConfig> {
    const picked: Partial<HarvestConfig> = {};
    if (typeof raw !== 'object' || raw === null) return picked;

    const source = new Map<string, unknown>(Object.entries(raw));
    const rejected: string[] = [];

    const stringList = (key: 'queries' | 'categories') => {
        const value = source.get(key);
        if (value === undefined) return;
        if (typeof value === 'string') picked[key] = [value];
        else if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) picked[key] = value;
        else rejected.push(key);
    };
    const num = (key: 'maxResults' | 'concurrency' | 'timeout') => {
        const value = source.get(key);
        if (value === undefined) return;
        if (typeof value === 'number' && Number.isInteger(value) && value > 0) picked[key] = value;
        else rejected.push(key);
    };
    const bool = (key: 'verbose' | 'failFast' | 'citations' | 'jsonLogs') => {
        const value = source.get(key);
        if (value === undefined) return;
        if (typeof value === 'boolean') picked[key] = value;
        else rejected.push(key);
    };

    stringList('queries');
    stringList('categories');
    num('maxResults');
    num('concurrency');
    num('timeout');
    bool('verbose');
    bool('failFast');
    bool('citations');
    bool('jsonLogs');

    const out = source.get('out');
    if (typeof out === 'string') picked.out = out;
    else if (out !== undefined) rejected.push('out');

    const format = source.get('format');
    if (format === 'csv' || format === 'json') picked.format = format;
    else if (format !== undefined) rejected.push('format');

    const logLevel = source.get('logLevel');
    if (logLevel === 'error' || logLevel === 'warn' || logLevel === 'info' || logLevel === 'debug') {
        picked.logLevel = logLevel;
    } else if (logLevel !== undefined) {
        rejected.push('logLevel');
    }

    if (rejected.length > 0) {
        getLogger().warn({ keys: rejected }, 'Ignoring invalid config values');
    }

    return picked;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(): Partial<HarvestConfig> {
    const env: Partial<HarvestConfig> = {};

    const timeout = parseInt(process.env['ARXIV_HARVEST_TIMEOUT'] ?? '', 10);
    if (!isNaN(timeout) && timeout > 0) {
        env.timeout = timeout;
    }

    const level = envLogLevel();
    if (level) {
        env.logLevel = level;
    }

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<HarvestConfig>,
    searchFrom?: string
): Promise<HarvestConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...stripUndefined(cliFlags),
    };
}

/**
 * Drop undefined values so unset CLI flags don't shadow lower-precedence sources.
 */
function stripUndefined(flags: Partial<HarvestConfig>): Partial<HarvestConfig> {
    const result: Partial<HarvestConfig> = {};
    let key: keyof HarvestConfig;
    for (key in flags) {
        if (flags[key] !== undefined) {
            copyKey(result, flags, key);
        }
    }
    return result;
}

function copyKey<K extends keyof HarvestConfig>(
    target: Partial<HarvestConfig>,
    source: Partial<HarvestConfig>,
    key: K
): void {
    target[key] = source[key];
}
