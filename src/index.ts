/**
 * Compute Pricing Scraper
 *
 * Scrapes public EC2 on-demand pricing and keeps a JSON pricing catalog
 * sorted and up to date. Runs offline as a maintenance script.
 */

export { scrapeEc2Pricing, type ScrapeOptions, type ScrapeProgress } from './scraper.js';
export { updatePricingFile, sortPricingFile, type UpdateOptions, type UpdateResult } from './catalog/update.js';
export { mergeComputePricing, type MergeResult } from './catalog/merge.js';
export { readCatalog, renderCatalog, writeCatalog, type LoadedCatalog } from './catalog/store.js';
export {
    naturalKey,
    naturalSort,
    compareNaturalKeys,
    sortTree,
    INSTANCE_SIZES,
    type NaturalKey,
    type Tree,
    type TreeMap,
} from './sorting/natural-sort.js';
export { formatJson } from './generators/json.generator.js';
export { parseRelaxedObject, extractCallbackArgument } from './parsers/relaxed-json.js';
export { LegacyPricingFetcher, detectLegacyFormat } from './fetchers/legacy.fetcher.js';
export { CalculatorPricingFetcher } from './fetchers/calculator.fetcher.js';
export { LegacyNormalizer } from './normalizers/legacy.normalizer.js';
export { CalculatorNormalizer } from './normalizers/calculator.normalizer.js';
export {
    PricingScraperError,
    PricingFetchError,
    PricingParseError,
    CatalogFormatError,
} from './errors.js';
export type {
    PricingCatalog,
    PriceTable,
    RegionPriceMap,
    ScrapedPricing,
    JsonValue,
} from './contracts/catalog.contract.js';
