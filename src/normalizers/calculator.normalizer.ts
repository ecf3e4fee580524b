import { BaseNormalizer } from './base.normalizer.js';
import { EC2_REGIONS, OPERATING_SYSTEMS, OS_FAMILIES, type OperatingSystem } from '../config/index.js';
import type { PriceTable, ScrapedPricing } from '../contracts/catalog.contract.js';
import {
    INSTANCE_TYPE_ATTRIBUTE,
    type CalculatorPricingDocument,
} from '../contracts/upstream.contract.js';

type RawPrice = string | number;

/**
 * Calculator Pricing Normalizer
 *
 * Collects the flat `prices[]` lists of every (OS, region) document, then
 * fills the gaps of already scraped tables. Every instance type seen anywhere
 * gets a row in every OS family, even when no region prices it.
 */
export class CalculatorNormalizer extends BaseNormalizer {
    private readonly observations = new Map<OperatingSystem, Map<string, Map<string, RawPrice>>>();
    private readonly instances = new Set<string>();

    constructor(private readonly regions: readonly string[] = EC2_REGIONS) {
        super('calculator-normalizer');
    }

    /**
     * Record the prices one region returned for one OS
     */
    add(os: OperatingSystem, region: string, document: CalculatorPricingDocument): void {
        let byRegion = this.observations.get(os);
        if (!byRegion) {
            byRegion = new Map();
            this.observations.set(os, byRegion);
        }

        const prices = new Map<string, RawPrice>();
        let missingPrice = 0;

        for (const entry of document.prices) {
            const instanceType = entry.attributes[INSTANCE_TYPE_ATTRIBUTE] ?? '';
            const usd = entry.price.USD;
            if (usd === undefined || usd === null) {
                missingPrice++;
            }

            this.instances.add(instanceType);
            prices.set(instanceType, usd ?? 0);
        }

        if (missingPrice > 0) {
            // Defaulted to 0, which the fill step treats as "no price"
            this.log.warn({ os, region, missingPrice }, 'Calculator entries without a USD price');
        }

        byRegion.set(region, prices);
    }

    /**
     * Every instance type observed across all OSes and regions
     */
    get instanceTypes(): ReadonlySet<string> {
        return this.instances;
    }

    /**
     * Fill cells missing from `scraped`. Existing cells are never overwritten.
     */
    fillGaps(scraped: ScrapedPricing): ScrapedPricing {
        for (const os of OPERATING_SYSTEMS) {
            const family = OS_FAMILIES[os];
            const table: PriceTable = scraped[family];
            const byRegion = this.observations.get(os);
            let filled = 0;

            for (const instance of this.instances) {
                const row = this.ensureRow(table, instance);

                for (const region of this.regions) {
                    const raw = byRegion?.get(region)?.get(instance);
                    if (raw === undefined || !isPresentPrice(raw) || Object.hasOwn(row, region)) {
                        continue;
                    }
                    row[region] = this.toPrice(raw, `calculator ${os} ${region}`);
                    filled++;
                }
            }

            this.log.debug({ family, filled }, 'Filled calculator pricing');
        }

        return scraped;
    }
}

/**
 * Zero and empty prices count as absent
 */
export function isPresentPrice(raw: RawPrice): boolean {
    return raw !== 0 && raw !== '';
}
