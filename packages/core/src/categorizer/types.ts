/**
 * Types for the categorizer module.
 */

import type { Category, CategoryPattern, MatchResult } from '../types/index.js';

export type PatternSort = 'usage_desc';

/**
 * Storage capability for learned category patterns.
 *
 * Reads may be stale. `upsert` on an existing (normalized, category) pair
 * must increment usage atomically; that guarantee belongs to the implementation.
 */
export interface PatternRepository {
    /** Best pattern whose normalized description equals the query, if any. */
    exactLookup(normalizedDescription: string): Promise<CategoryPattern | null>;
    /** Patterns whose normalized description contains the keyword. */
    keywordLookup(keyword: string, limit: number, sortBy?: PatternSort): Promise<CategoryPattern[]>;
    /** Increment-or-create. */
    upsert(normalizedDescription: string, category: Category): Promise<CategoryPattern>;
}

/**
 * Adaptive (stage 2) categorizer backed by a PatternRepository.
 */
export interface LearnedMatcher {
    matchLearned(description: string): Promise<MatchResult>;
    recordCorrection(description: string, category: Category): Promise<CategoryPattern>;
}

/**
 * Statistics from batch categorization.
 */
export interface CategorizationStats {
    total: number;
    bySource: {
        keyword: number;
        learned: number;
        default: number;
    };
}
