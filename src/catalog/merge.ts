import { isDeepStrictEqual } from 'node:util';
import type { PricingCatalog, ScrapedPricing } from '../contracts/catalog.contract.js';

export interface MergeResult {
    catalog: PricingCatalog;
    changed: boolean;
}

/**
 * Overlay scraped product families onto `compute`.
 *
 * Each scraped family replaces the existing one wholesale. `updated` moves to
 * `now` (Unix seconds) only when the merged document differs from the input;
 * the input catalog is never mutated.
 */
export function mergeComputePricing(
    catalog: PricingCatalog,
    scraped: Partial<ScrapedPricing>,
    now: number = Date.now()
): MergeResult {
    const merged = structuredClone(catalog);

    for (const [family, table] of Object.entries(scraped)) {
        if (table) {
            merged.compute[family] = table;
        }
    }

    if (isDeepStrictEqual(merged, catalog)) {
        return { catalog, changed: false };
    }

    merged.updated = Math.floor(now / 1000);
    return { catalog: merged, changed: true };
}
