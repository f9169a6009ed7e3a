/**
 * Error taxonomy for the harvest pipeline.
 * Each class sets `name` so errors survive structured logging intact.
 */

/**
 * A request to a remote service failed, timed out, or returned a non-2xx status.
 * `status` is 0 for network errors and timeouts.
 */
export class TransportError extends Error {
    constructor(
        message: string,
        public readonly url: string,
        public readonly status: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'TransportError';
    }
}

/**
 * An Atom entry is missing a substructure the record extractor needs.
 */
export class MalformedRecordError extends Error {
    constructor(
        message: string,
        public readonly field: string
    ) {
        super(message);
        this.name = 'MalformedRecordError';
    }
}

/**
 * A published date too short or non-numeric to split into year/month/day.
 */
export class MalformedDateError extends Error {
    constructor(public readonly value: string) {
        super(`Malformed published date: "${value}"`);
        this.name = 'MalformedDateError';
    }
}

/**
 * The citation lookup was blocked or failed. Never escapes the enrichment step.
 * `blocked` marks a refusal (captcha page, 403/429) that later requests will hit too.
 */
export class CitationLookupError extends Error {
    constructor(
        message: string,
        public readonly query: string,
        public readonly blocked: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'CitationLookupError';
    }
}

/**
 * Misuse of the harvester facade, e.g. saving before anything was fetched.
 */
export class HarvestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'HarvestError';
    }
}
