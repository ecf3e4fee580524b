import { BaseNormalizer } from './base.normalizer.js';
import type { PriceTable } from '../contracts/catalog.contract.js';
import type { LegacyPricingDocument } from '../contracts/upstream.contract.js';

const NOT_AVAILABLE = 'n/a';

/**
 * Legacy Pricing Normalizer
 *
 * Walks `config.regions[].instanceTypes[].sizes[]` and reads the USD value of
 * each size's first price column. "N/A" prices leave the cell out, but the
 * size still gets a row.
 */
export class LegacyNormalizer extends BaseNormalizer {
    constructor() {
        super('legacy-normalizer');
    }

    /**
     * Add one legacy document to `table`; later documents overwrite earlier cells
     */
    normalize(document: LegacyPricingDocument, table: PriceTable = {}, source = 'legacy feed'): PriceTable {
        let cells = 0;
        let unavailable = 0;

        for (const regionData of document.config.regions) {
            const region = regionData.region;

            for (const instanceType of regionData.instanceTypes) {
                for (const size of instanceType.sizes) {
                    const row = this.ensureRow(table, size.size);
                    const price = size.valueColumns[0].prices.USD;

                    if (String(price).toLowerCase() === NOT_AVAILABLE) {
                        unavailable++;
                        continue;
                    }

                    row[region] = this.toPrice(price, source);
                    cells++;
                }
            }
        }

        this.log.debug({ source, cells, unavailable }, 'Normalized legacy pricing');
        return table;
    }
}
