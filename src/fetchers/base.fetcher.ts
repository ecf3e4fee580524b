import type { Logger } from 'pino';
import type { z } from 'zod';
import { config } from '../config/index.js';
import { PricingFetchError, PricingParseError } from '../errors.js';
import { createComponentLogger } from '../utils/logger.js';

export interface FetcherOptions {
    /** Per-request timeout in ms; 0 disables it */
    requestTimeout?: number;
}

/**
 * Base Fetcher for the public pricing endpoints
 *
 * Requests are plain GETs issued one at a time; there is no retry.
 */
export abstract class BaseFetcher {
    protected readonly log: Logger;
    protected readonly requestTimeout: number;

    constructor(component: string, options: FetcherOptions = {}) {
        this.log = createComponentLogger(component);
        this.requestTimeout = options.requestTimeout ?? config.http.requestTimeout;
    }

    /**
     * GET a URL. Network failures are raised; the status is left to the caller.
     */
    protected async request(url: string): Promise<Response> {
        this.log.debug({ url }, 'GET');

        try {
            const response = await fetch(url, {
                signal: this.requestTimeout > 0 ? AbortSignal.timeout(this.requestTimeout) : undefined,
            });
            this.log.debug({ url, status: response.status }, 'Response received');
            return response;
        } catch (error) {
            throw new PricingFetchError(url, null, { cause: error });
        }
    }

    /**
     * Read a response body as strict JSON
     */
    protected async readJson(response: Response, url: string): Promise<unknown> {
        const body = await response.text();
        try {
            const value: unknown = JSON.parse(body);
            return value;
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new PricingParseError(url, reason, { cause: error });
        }
    }

    /**
     * Check a decoded body against the fields the normalizers read
     */
    protected validate<T extends z.ZodTypeAny>(schema: T, value: unknown, url: string): z.output<T> {
        const result = schema.safeParse(value);
        if (!result.success) {
            const reason = result.error.errors
                .map((err) => `${err.path.join('.') || '<root>'}: ${err.message}`)
                .join('; ');
            throw new PricingParseError(url, reason, { cause: result.error });
        }
        return result.data;
    }
}
