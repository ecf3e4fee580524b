/**
 * Catalog file I/O: read and validate, render canonically, overwrite.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { PricingCatalogSchema, type PricingCatalog } from '../contracts/catalog.contract.js';
import { CatalogFormatError } from '../errors.js';
import { formatJson } from '../generators/json.generator.js';
import { sortTree } from '../sorting/natural-sort.js';
import { createComponentLogger } from '../utils/logger.js';

const log = createComponentLogger('catalog');

export interface LoadedCatalog {
    catalog: PricingCatalog;
    /** File contents exactly as read */
    text: string;
}

export async function readCatalog(filePath: string): Promise<LoadedCatalog> {
    const text = await readFile(filePath, 'utf-8');

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new CatalogFormatError(filePath, reason, [], { cause: error });
    }

    const result = PricingCatalogSchema.safeParse(raw);
    if (!result.success) {
        const reason = result.error.errors
            .map((err) => `${err.path.join('.') || '<root>'}: ${err.message}`)
            .join('; ');
        throw new CatalogFormatError(filePath, reason, result.error.errors);
    }

    log.debug({ filePath, families: Object.keys(result.data.compute).length }, 'Loaded pricing catalog');
    return { catalog: result.data, text };
}

/**
 * Sort the whole document by natural key and render it as 4-space JSON
 */
export function renderCatalog(catalog: PricingCatalog): string {
    const mixed = new Set<string>();
    const sorted = sortTree(catalog, {
        onMixedRank: (left, right) => mixed.add(left < right ? `${left} / ${right}` : `${right} / ${left}`),
    });

    if (mixed.size > 0) {
        log.warn(
            { pairs: [...mixed].sort() },
            'Size words compared against other words at the same position; order falls back to plain string order'
        );
    }

    return formatJson(sorted);
}

/**
 * Overwrite the catalog in place (no temp file, no fsync)
 */
export async function writeCatalog(filePath: string, text: string): Promise<void> {
    await writeFile(filePath, text, 'utf-8');
    log.debug({ filePath, bytes: Buffer.byteLength(text) }, 'Wrote pricing catalog');
}
