import type { Logger } from 'pino';
import type { PriceTable, RegionPriceMap } from '../contracts/catalog.contract.js';
import { PricingParseError } from '../errors.js';
import { createComponentLogger } from '../utils/logger.js';

/**
 * Base Normalizer
 *
 * Shared helpers for turning upstream price entries into
 * `{instance: {region: price}}` tables.
 */
export abstract class BaseNormalizer {
    protected readonly log: Logger;

    constructor(component: string) {
        this.log = createComponentLogger(component);
    }

    /**
     * Get the row for an instance, creating an empty one if needed
     */
    protected ensureRow(table: PriceTable, instance: string): RegionPriceMap {
        if (Object.hasOwn(table, instance)) {
            return table[instance];
        }
        const row: RegionPriceMap = {};
        table[instance] = row;
        return row;
    }

    /**
     * Coerce an upstream price (string or number) to a float
     */
    protected toPrice(value: string | number, source: string): number {
        if (typeof value === 'number') {
            return value;
        }

        const trimmed = value.trim();
        const price = trimmed === '' ? NaN : Number(trimmed);
        if (!Number.isFinite(price)) {
            throw new PricingParseError(source, `price "${value}" is not a number`);
        }
        return price;
    }
}
