/**
 * EC2 Pricing Scraper
 *
 * Fetches the legacy feeds, then every (OS, region) calculator document, one
 * request at a time and in a fixed order. Legacy cells win; calculator data
 * only fills the gaps.
 */

import {
    EC2_REGIONS,
    LEGACY_FAMILY,
    LEGACY_PRICING_URLS,
    OPERATING_SYSTEMS,
    type OperatingSystem,
} from './config/index.js';
import type { ScrapedPricing } from './contracts/catalog.contract.js';
import { CalculatorPricingFetcher } from './fetchers/calculator.fetcher.js';
import { LegacyPricingFetcher } from './fetchers/legacy.fetcher.js';
import { CalculatorNormalizer } from './normalizers/calculator.normalizer.js';
import { LegacyNormalizer } from './normalizers/legacy.normalizer.js';
import { createComponentLogger } from './utils/logger.js';

const log = createComponentLogger('scraper');

export type ScrapeProgress =
    | { stage: 'legacy'; url: string; index: number; total: number }
    | { stage: 'calculator'; os: OperatingSystem; region: string; index: number; total: number };

export interface ScrapeOptions {
    legacyUrls?: readonly string[];
    regions?: readonly string[];
    operatingSystems?: readonly OperatingSystem[];
    legacyFetcher?: LegacyPricingFetcher;
    calculatorFetcher?: CalculatorPricingFetcher;
    onProgress?: (progress: ScrapeProgress) => void;
}

export async function scrapeEc2Pricing(options: ScrapeOptions = {}): Promise<ScrapedPricing> {
    const legacyUrls = options.legacyUrls ?? LEGACY_PRICING_URLS;
    const regions = options.regions ?? EC2_REGIONS;
    const operatingSystems = options.operatingSystems ?? OPERATING_SYSTEMS;
    const legacyFetcher = options.legacyFetcher ?? new LegacyPricingFetcher();
    const calculatorFetcher = options.calculatorFetcher ?? new CalculatorPricingFetcher();

    const scraped: ScrapedPricing = {
        ec2_linux: {},
        ec2_windows: {},
    };

    const legacyNormalizer = new LegacyNormalizer();
    for (const [index, url] of legacyUrls.entries()) {
        options.onProgress?.({ stage: 'legacy', url, index, total: legacyUrls.length });
        const document = await legacyFetcher.fetch(url);
        legacyNormalizer.normalize(document, scraped[LEGACY_FAMILY], url);
    }

    const calculatorNormalizer = new CalculatorNormalizer(regions);
    const total = operatingSystems.length * regions.length;
    let index = 0;
    let skipped = 0;

    for (const os of operatingSystems) {
        for (const region of regions) {
            options.onProgress?.({ stage: 'calculator', os, region, index, total });
            index++;

            const document = await calculatorFetcher.fetchForRegion(region, os);
            if (!document) {
                skipped++;
                continue;
            }
            calculatorNormalizer.add(os, region, document);
        }
    }

    calculatorNormalizer.fillGaps(scraped);

    log.info(
        {
            skippedRegions: skipped,
            instanceTypes: calculatorNormalizer.instanceTypes.size,
            rows: Object.fromEntries(
                Object.entries(scraped).map(([family, table]) => [family, Object.keys(table).length])
            ),
        },
        'Scraped EC2 pricing'
    );

    return scraped;
}
