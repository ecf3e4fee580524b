import type { ScrapedPricing } from '../contracts/catalog.contract.js';
import { createComponentLogger } from '../utils/logger.js';
import { mergeComputePricing } from './merge.js';
import { readCatalog, renderCatalog, writeCatalog } from './store.js';

const log = createComponentLogger('catalog-update');

export interface UpdateOptions {
    /** Current time in ms, used for the `updated` stamp */
    now?: number;
    /** Compute the result without touching the file */
    dryRun?: boolean;
}

export interface UpdateResult {
    changed: boolean;
    written: boolean;
    updated: number;
}

/**
 * Merge scraped families into the catalog file and rewrite it sorted, but
 * only when the content actually changed.
 */
export async function updatePricingFile(
    filePath: string,
    scraped: Partial<ScrapedPricing>,
    options: UpdateOptions = {}
): Promise<UpdateResult> {
    const { catalog } = await readCatalog(filePath);
    const { catalog: merged, changed } = mergeComputePricing(catalog, scraped, options.now);

    if (!changed) {
        log.info({ filePath }, 'Nothing has changed, skipping update.');
        return { changed: false, written: false, updated: catalog.updated };
    }

    const text = renderCatalog(merged);

    if (options.dryRun) {
        log.info({ filePath, updated: merged.updated }, 'Dry run, catalog not written');
        return { changed: true, written: false, updated: merged.updated };
    }

    await writeCatalog(filePath, text);
    log.info({ filePath, updated: merged.updated }, 'Pricing catalog updated');
    return { changed: true, written: true, updated: merged.updated };
}

/**
 * Rewrite the catalog in canonical order without changing its content
 */
export async function sortPricingFile(filePath: string): Promise<{ written: boolean }> {
    const { catalog, text } = await readCatalog(filePath);
    const sorted = renderCatalog(catalog);

    if (sorted === text) {
        log.info({ filePath }, 'Catalog already sorted');
        return { written: false };
    }

    await writeCatalog(filePath, sorted);
    log.info({ filePath }, 'Catalog sorted');
    return { written: true };
}
