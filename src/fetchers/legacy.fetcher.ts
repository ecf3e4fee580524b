import { BaseFetcher, type FetcherOptions } from './base.fetcher.js';
import { LEGACY_PRICING_URLS } from '../config/index.js';
import { PricingFetchError, PricingParseError } from '../errors.js';
import { extractCallbackArgument, parseRelaxedObject } from '../parsers/relaxed-json.js';
import {
    LegacyPricingDocumentSchema,
    type LegacyPricingDocument,
} from '../contracts/upstream.contract.js';

export type LegacyFormat = 'json' | 'js';

export interface LegacyPricingResponse {
    url: string;
    document: LegacyPricingDocument;
}

/**
 * Decide how a legacy endpoint's body is encoded from its URL suffix
 */
export function detectLegacyFormat(url: string): LegacyFormat | null {
    if (/\.json$/.test(url)) return 'json';
    if (/\.js$/.test(url)) return 'js';
    return null;
}

/**
 * Legacy Pricing Fetcher
 *
 * Fetches the older EC2 Linux on-demand feeds, served either as JSON or as a
 * JavaScript file wrapping an object literal in `callback(...)`.
 * Any failure here aborts the run.
 */
export class LegacyPricingFetcher extends BaseFetcher {
    constructor(options: FetcherOptions = {}) {
        super('legacy-fetcher', options);
    }

    async fetch(url: string): Promise<LegacyPricingDocument> {
        const format = detectLegacyFormat(url);
        if (!format) {
            throw new PricingParseError(url, 'unsupported endpoint format, expected a .json or .js URL');
        }

        const response = await this.request(url);
        if (!response.ok) {
            throw new PricingFetchError(url, response.status);
        }

        let data: unknown;
        if (format === 'json') {
            data = await this.readJson(response, url);
        } else {
            const body = await response.text();
            data = parseRelaxedObject(extractCallbackArgument(body, url), url);
        }

        const document = this.validate(LegacyPricingDocumentSchema, data, url);
        this.log.info({ url, format, regions: document.config.regions.length }, 'Fetched legacy pricing');
        return document;
    }

    /**
     * Fetch every legacy endpoint in order
     */
    async fetchAll(urls: readonly string[] = LEGACY_PRICING_URLS): Promise<LegacyPricingResponse[]> {
        const responses: LegacyPricingResponse[] = [];
        for (const url of urls) {
            responses.push({ url, document: await this.fetch(url) });
        }
        return responses;
    }
}
