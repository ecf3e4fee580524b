import { BaseFetcher, type FetcherOptions } from './base.fetcher.js';
import { CALCULATOR_PRICING_URL, type OperatingSystem } from '../config/index.js';
import {
    CalculatorPricingDocumentSchema,
    type CalculatorPricingDocument,
} from '../contracts/upstream.contract.js';

/**
 * Calculator Pricing Fetcher
 *
 * One JSON document per (region, OS). A region that does not answer 200 has
 * no data for that OS and is skipped.
 */
export class CalculatorPricingFetcher extends BaseFetcher {
    private readonly urlTemplate: string;

    constructor(options: FetcherOptions & { urlTemplate?: string } = {}) {
        super('calculator-fetcher', options);
        this.urlTemplate = options.urlTemplate ?? CALCULATOR_PRICING_URL;
    }

    getPricingUrl(region: string, os: OperatingSystem): string {
        return this.urlTemplate.replace('{region}', region).replace('{os}', os);
    }

    async fetchForRegion(region: string, os: OperatingSystem): Promise<CalculatorPricingDocument | null> {
        const url = this.getPricingUrl(region, os);
        const response = await this.request(url);

        if (response.status !== 200) {
            this.log.debug({ region, os, status: response.status }, 'No calculator pricing, skipping');
            await response.body?.cancel();
            return null;
        }

        const data = await this.readJson(response, url);
        return this.validate(CalculatorPricingDocumentSchema, data, url);
    }
}
