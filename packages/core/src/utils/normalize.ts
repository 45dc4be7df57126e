/**
 * Description normalization for learned-pattern matching.
 *
 * NOTE: This is for matching, NOT for fingerprints.
 * Fingerprints use the description exactly as stored.
 */

import { LEARNING } from '../types/index.js';

/**
 * Installment markers removed before matching, most specific first:
 * "parcela 2/6", "parcela 2 de 6", "parc.2/6", "2ª de 6", "2/6".
 */
const INSTALLMENT_MARKERS: readonly RegExp[] = [
    /\bparcela\s*\d+\s*(?:(?:\/|de)\s*\d+)?/gu,
    /\bparc\.?\s*\d+\s*(?:\/\s*\d+)?/gu,
    /\d+\s*ª\s*de\s*\d+/gu,
    /\d+\s*\/\s*\d+/gu,
];

/**
 * Prepositions, articles and conjunctions ignored as lookup keywords.
 * Words of two letters or fewer are already excluded by length.
 */
const STOP_WORDS: ReadonlySet<string> = new Set([
    'das', 'dos', 'nas', 'nos', 'aos', 'uma', 'umas', 'uns',
    'para', 'pra', 'por', 'pela', 'pelo', 'pelas', 'pelos',
    'com', 'sem', 'sob', 'sobre', 'entre', 'ate', 'até', 'apos', 'após',
    'desde', 'contra', 'perante', 'que', 'mas', 'porem', 'porém', 'como',
]);

/**
 * Normalize a transaction description for learned-pattern matching.
 *
 * Transformations:
 * - Convert to lowercase
 * - Remove installment markers
 * - Replace punctuation with space
 * - Collapse whitespace, trim
 */
export function normalizeForLearning(raw: string): string {
    let value = raw.toLowerCase();
    for (const marker of INSTALLMENT_MARKERS) {
        value = value.replace(marker, ' ');
    }
    return value
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Split a normalized description into its distinct tokens.
 */
export function tokenize(normalized: string): Set<string> {
    return new Set(normalized.split(' ').filter((t) => t.length > 0));
}

/**
 * Tokens worth querying the repository with.
 */
export function extractKeywords(normalized: string): string[] {
    return [...tokenize(normalized)].filter(
        (t) => t.length >= LEARNING.MIN_KEYWORD_LENGTH && !STOP_WORDS.has(t)
    );
}

/**
 * Jaccard similarity of two token sets. Two empty sets score 0.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 && b.size === 0) return 0;
    let intersection = 0;
    for (const token of a) {
        if (b.has(token)) intersection++;
    }
    return intersection / (a.size + b.size - intersection);
}
