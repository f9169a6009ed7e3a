/**
 * Minimal transport contract used by the arXiv source and the citation lookup.
 * `HttpClient` is the production implementation; tests supply in-process fakes.
 */
export interface Transport {
    /**
     * Issue a GET request and resolve with the response body as text.
     * Rejects with `TransportError` on network failure, timeout or non-2xx status.
     */
    get(url: string): Promise<string>;
}
