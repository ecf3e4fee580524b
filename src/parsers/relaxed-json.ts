/**
 * Relaxed JSON decoding for the legacy JavaScript pricing feeds.
 *
 * The feeds wrap an ECMAScript object literal (unquoted keys, trailing
 * commas, comments) in a `callback(...)` call; the rest of the pipeline only
 * ever sees the decoded value.
 */

import JSON5 from 'json5';
import { PricingParseError } from '../errors.js';

// Whole-body match: the last `callback(` up to the first `)` that ends a line
const CALLBACK_PATTERN = /^.*callback\((.*?)\);?$/ms;

/**
 * Extract the argument text of a `callback(...)` wrapper
 */
export function extractCallbackArgument(body: string, source = 'callback body'): string {
    const match = CALLBACK_PATTERN.exec(body);
    if (!match || match[1] === undefined) {
        throw new PricingParseError(source, 'no callback(...) wrapper found');
    }
    return match[1];
}

/**
 * Decode a JavaScript object literal that is not strict JSON
 */
export function parseRelaxedObject(text: string, source = 'relaxed JSON'): unknown {
    try {
        const value: unknown = JSON5.parse(text);
        return value;
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new PricingParseError(source, reason, { cause: error });
    }
}
