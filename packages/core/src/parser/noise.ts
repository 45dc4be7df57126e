/**
 * Grammar-parameterized noise filter.
 *
 * Text extraction leaves artifacts that the transaction pattern happily
 * matches: lone currency symbols, barcode digit runs, zero-value rows.
 * What counts as noise is policy, so every rule comes from the grammar.
 */

import type { CompiledNoiseFilter } from '../grammar/index.js';
import type { RawMatch } from './extract.js';
import { isZeroAmount } from '../utils/currency.js';

/**
 * Decide whether a raw match is noise.
 *
 * @param match - Raw match from the transaction pattern
 * @param amount - Parsed amount of the match
 * @param filter - Grammar's noise filter, if any
 * @returns Reason string when the match is noise, null otherwise
 */
export function noiseReason(
    match: RawMatch,
    amount: string,
    filter: CompiledNoiseFilter | undefined
): string | null {
    if (!filter) return null;

    const description = match.descriptionText.trim();

    if (description.length < filter.minDescriptionLength) {
        return `description shorter than ${filter.minDescriptionLength} characters`;
    }

    for (const pattern of filter.rejectDescriptionPatterns) {
        if (pattern.test(description)) {
            return `description matches noise pattern ${pattern.source}`;
        }
    }

    if (filter.rejectZeroAmount && isZeroAmount(amount)) {
        return 'zero amount';
    }

    return null;
}
