/**
 * Natural-order sorting of catalog keys.
 *
 * Keys are split into digit runs, word runs (letters, `-`, `_`) and runs of
 * anything else, so "m5.2xlarge" sorts before "m5.16xlarge" and the size
 * words follow their real progression instead of the alphabet.
 */

import type { JsonValue } from '../contracts/catalog.contract.js';

/** Size words in ascending order; a word run's rank is its index here */
export const INSTANCE_SIZES: readonly string[] = [
    'micro',
    'small',
    'medium',
    'large',
    'xlarge',
    'x-large',
    'extra-large',
];

const RUN_PATTERN = /([0-9]+)|([-A-Z_a-z]+)|([^-0-9A-Z_a-z]+)/g;

const NO_NUMBER = -1n;
const NO_RANK = '-1';

/** (numeric value, word rank, other text); digit runs of any length stay exact */
export type KeyRun = readonly [bigint, string, string];

export type NaturalKey = readonly KeyRun[];

/**
 * Sortable values: JSON as parsed, or mappings already ordered by `sortTree`.
 * Plain objects hoist integer-like keys, so ordered output has to be a Map.
 */
export type Tree = JsonValue | TreeMap;

export interface TreeMap extends Map<string, Tree> {}

export interface SortOptions {
    /**
     * Called when a size-word rank is compared against a raw word at the same
     * position. The order is still decided by plain string comparison.
     */
    onMixedRank?: (left: string, right: string) => void;
}

export function naturalKey(key: string): NaturalKey {
    const runs: KeyRun[] = [];

    for (const [, digits, word, other] of key.matchAll(RUN_PATTERN)) {
        if (digits !== undefined) {
            runs.push([BigInt(digits), NO_RANK, '']);
        } else if (word !== undefined) {
            const index = INSTANCE_SIZES.indexOf(word);
            runs.push([NO_NUMBER, index >= 0 ? String(index) : word, '']);
        } else {
            runs.push([NO_NUMBER, NO_RANK, other ?? '']);
        }
    }

    return runs;
}

function compareValues<T extends bigint | string>(a: T, b: T): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

function isSizeRank(rank: string): boolean {
    return /^[0-9]+$/.test(rank);
}

function isMixedRank(a: string, b: string): boolean {
    if (a === NO_RANK || b === NO_RANK) return false;
    return isSizeRank(a) !== isSizeRank(b);
}

/**
 * Lexicographic comparison of run tuples; a key that is a prefix of the
 * other sorts first.
 */
export function compareNaturalKeys(a: NaturalKey, b: NaturalKey, onMixedRank?: () => void): number {
    const length = Math.min(a.length, b.length);

    for (let i = 0; i < length; i++) {
        const [aNumber, aRank, aOther] = a[i];
        const [bNumber, bRank, bOther] = b[i];

        const byNumber = compareValues(aNumber, bNumber);
        if (byNumber !== 0) return byNumber;

        const byRank = compareValues(aRank, bRank);
        if (byRank !== 0) {
            if (onMixedRank && isMixedRank(aRank, bRank)) onMixedRank();
            return byRank;
        }

        const byOther = compareValues(aOther, bOther);
        if (byOther !== 0) return byOther;
    }

    return a.length - b.length;
}

/**
 * Sort strings by their natural key
 */
export function naturalSort(keys: readonly string[], options: SortOptions = {}): string[] {
    const keyed = keys.map((key) => ({ key, sortKey: naturalKey(key) }));
    keyed.sort((a, b) => compareKeyed(a, b, options));
    return keyed.map(({ key }) => key);
}

function compareKeyed(
    a: { key: string; sortKey: NaturalKey },
    b: { key: string; sortKey: NaturalKey },
    options: SortOptions
): number {
    const { onMixedRank } = options;
    return compareNaturalKeys(
        a.sortKey,
        b.sortKey,
        onMixedRank ? () => onMixedRank(a.key, b.key) : undefined
    );
}

/**
 * Recursively order every mapping by natural key. Mappings come back as
 * Maps; arrays and scalars are returned unchanged.
 */
export function sortTree(node: Tree, options: SortOptions = {}): Tree {
    let entries: Array<[string, Tree]>;

    if (node instanceof Map) {
        entries = [...node.entries()];
    } else if (typeof node === 'object' && node !== null && !Array.isArray(node)) {
        entries = Object.entries(node);
    } else {
        return node;
    }

    const keyed = entries.map(([key, value]) => ({ key, value, sortKey: naturalKey(key) }));
    keyed.sort((a, b) => compareKeyed(a, b, options));

    const sorted: TreeMap = new Map();
    for (const { key, value } of keyed) {
        sorted.set(key, sortTree(value, options));
    }
    return sorted;
}
