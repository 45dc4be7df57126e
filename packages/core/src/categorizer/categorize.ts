/**
 * Two-stage categorization of extracted transactions.
 *
 * Stage 1 (keyword table) runs during extraction. Stage 2 (learned patterns)
 * only replaces stage 1 when stage 1 gave up ("outros") and the learned
 * confidence clears the caller's threshold.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import { CONFIDENCE, UNCATEGORIZED_CATEGORY } from '../types/index.js';
import type { Category, MatchResult, Transaction } from '../types/index.js';
import type { CategorizationStats, LearnedMatcher } from './types.js';

/**
 * Acceptance policy for a learned match.
 *
 * @param keywordCategory - Stage 1 result
 * @param result - Stage 2 result
 * @param threshold - Minimum confidence, exclusive
 */
export function shouldAcceptLearned(
    keywordCategory: Category,
    result: MatchResult,
    threshold: number = CONFIDENCE.ADAPTIVE_ACCEPT
): result is Extract<MatchResult, { found: true }> {
    return keywordCategory === UNCATEGORIZED_CATEGORY && result.found && result.confidence > threshold;
}

/**
 * Apply learned categories to every transaction stage 1 left as "outros".
 *
 * A repository failure on one transaction leaves it uncategorized and
 * adds a warning; the batch continues.
 *
 * @returns New transaction array (inputs are not mutated), warnings and stats
 */
export async function applyLearnedCategories(
    transactions: readonly Transaction[],
    matcher: LearnedMatcher,
    threshold: number = CONFIDENCE.ADAPTIVE_ACCEPT
): Promise<{ transactions: Transaction[]; warnings: string[]; stats: CategorizationStats }> {
    const warnings: string[] = [];
    const result: Transaction[] = [];

    for (const txn of transactions) {
        if (txn.category !== UNCATEGORIZED_CATEGORY) {
            result.push(txn);
            continue;
        }

        try {
            const match = await matcher.matchLearned(txn.description);
            if (shouldAcceptLearned(txn.category, match, threshold)) {
                result.push({
                    ...txn,
                    category: match.category,
                    category_source: 'learned',
                    confidence: match.confidence,
                });
                continue;
            }
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            warnings.push(`Learned categorization failed for "${txn.description}": ${message}`);
        }

        result.push(txn);
    }

    return { transactions: result, warnings, stats: summarizeCategorization(result) };
}

/**
 * Count transactions by category source.
 */
export function summarizeCategorization(transactions: readonly Transaction[]): CategorizationStats {
    const stats: CategorizationStats = {
        total: transactions.length,
        bySource: {
            keyword: 0,
            learned: 0,
            default: 0,
        },
    };

    for (const txn of transactions) {
        stats.bySource[txn.category_source]++;
    }

    return stats;
}
