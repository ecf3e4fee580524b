/**
 * Pricing Catalog Contract
 *
 * Shape of the on-disk catalog and of the tables the scraper produces.
 * Anything the scraper does not own (other top-level sections, compute
 * families it never scrapes) is carried through as opaque JSON.
 */

import { z } from 'zod';
import type { ProductFamily } from '../config/index.js';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ])
);

export const PricingCatalogSchema = z
    .object({
        /** Unix timestamp (seconds) of the last content change */
        updated: z.number().int(),
        compute: z.record(JsonValueSchema),
    })
    .catchall(JsonValueSchema);

export type PricingCatalog = z.infer<typeof PricingCatalogSchema> & { [key: string]: JsonValue };

/**
 * Region identifier -> USD price. Unavailable prices are omitted.
 */
export type RegionPriceMap = Record<string, number>;

/**
 * Instance identifier (e.g. "m5.large" or legacy "xlarge") -> region prices
 */
export type PriceTable = Record<string, RegionPriceMap>;

/**
 * Freshly scraped product families, merged into `compute`
 */
export type ScrapedPricing = Record<ProductFamily, PriceTable>;
