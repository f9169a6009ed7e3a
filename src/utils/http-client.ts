import type { Transport } from '../types/index.js';
import { TransportError } from './errors.js';
import { getLogger } from './logger.js';

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
}

/**
 * Plain GET client with a bounded timeout per request.
 * arXiv asks clients not to hammer the API, so failures are surfaced, never retried.
 */
export class HttpClient implements Transport {
    private readonly timeout: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.timeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        const email = options?.email ?? 'arxiv-harvest@example.com';
        this.userAgent = `arxiv-harvest/${version} (mailto:${email})`;
    }

    /**
     * Fetch a URL and return the body as text.
     */
    async get(url: string): Promise<string> {
        const timeout = this.timeout;
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: { 'User-Agent': this.userAgent },
                signal: controller.signal,
            });

            const body = await response.text();

            if (!response.ok) {
                getLogger().debug({ status: response.status, url }, 'HTTP error response');
                throw new TransportError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    url,
                    response.status
                );
            }

            return body;
        } catch (error) {
            if (error instanceof TransportError) throw error;

            if (error instanceof Error && error.name === 'AbortError') {
                throw new TransportError(`Request timeout after ${timeout}ms: ${url}`, url, 0, { cause: error });
            }

            throw new TransportError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                url,
                0,
                { cause: error }
            );
        } finally {
            clearTimeout(timeoutId);
        }
    }
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Replace the shared client. Call once at startup, before any source is built;
 * sources created earlier keep the client they were given.
 */
export function initHttpClient(options: HttpClientOptions): HttpClient {
    clientInstance = new HttpClient(options);
    return clientInstance;
}

/**
 * Get the shared HTTP client, creating one with defaults on first use.
 */
export function getHttpClient(): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient();
    }
    return clientInstance;
}
