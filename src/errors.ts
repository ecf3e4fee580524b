import type { ZodIssue } from 'zod';

/**
 * Base class for failures that abort a scrape run
 */
export class PricingScraperError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * An upstream endpoint could not be fetched or answered with an error status
 */
export class PricingFetchError extends PricingScraperError {
    readonly url: string;
    readonly status: number | null;

    constructor(url: string, status: number | null, options?: { cause?: unknown }) {
        super(
            status === null
                ? `Failed to fetch pricing data from ${url}`
                : `Failed to fetch pricing data from ${url}: HTTP ${status}`,
            options
        );
        this.url = url;
        this.status = status;
    }
}

/**
 * An upstream body could not be decoded into the expected structure
 */
export class PricingParseError extends PricingScraperError {
    readonly source: string;

    constructor(source: string, reason: string, options?: { cause?: unknown }) {
        super(`Unable to parse pricing data from ${source}: ${reason}`, options);
        this.source = source;
    }
}

/**
 * The on-disk catalog is not valid JSON or lacks the `updated`/`compute` shape
 */
export class CatalogFormatError extends PricingScraperError {
    readonly path: string;
    readonly issues: ZodIssue[];

    constructor(path: string, reason: string, issues: ZodIssue[] = [], options?: { cause?: unknown }) {
        super(`Invalid pricing catalog ${path}: ${reason}`, options);
        this.path = path;
        this.issues = issues;
    }
}
