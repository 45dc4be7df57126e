/**
 * Stage 2 categorization: patterns learned from manual corrections.
 *
 * 1. Exact match on the normalized description (confidence 0.95)
 * 2. Keyword candidates scored by Jaccard similarity plus a usage bonus;
 *    accepted above 0.6, confidence capped at 0.9
 * 3. Otherwise not found
 */

import { CONFIDENCE, LEARNING } from '../types/index.js';
import type { Category, CategoryPattern, MatchResult } from '../types/index.js';
import { normalizeForLearning, tokenize, extractKeywords, jaccard } from '../utils/normalize.js';
import { InvalidCorrectionError } from '../errors.js';
import type { LearnedMatcher, PatternRepository } from './types.js';

const NOT_FOUND: MatchResult = { found: false, confidence: 0, matchType: 'none' };

/**
 * Score a learned pattern against the query tokens.
 */
export function scoreCandidate(queryTokens: ReadonlySet<string>, candidate: CategoryPattern): number {
    const similarity = jaccard(queryTokens, tokenize(candidate.normalized_description));
    const usageBonus = Math.min(candidate.usage_count * LEARNING.USAGE_BONUS_STEP, LEARNING.USAGE_BONUS_CAP);
    return similarity + usageBonus;
}

/**
 * Create the adaptive matcher over a repository.
 */
export function createLearnedMatcher(repository: PatternRepository): LearnedMatcher {
    async function matchLearned(description: string): Promise<MatchResult> {
        const normalized = normalizeForLearning(description);
        if (!normalized) return NOT_FOUND;

        const exact = await repository.exactLookup(normalized);
        if (exact) {
            return { found: true, category: exact.category, confidence: CONFIDENCE.EXACT, matchType: 'exact' };
        }

        const queryTokens = tokenize(normalized);
        let best: { score: number; category: Category } | null = null;

        for (const keyword of extractKeywords(normalized)) {
            const candidates = await repository.keywordLookup(keyword, LEARNING.CANDIDATES_PER_KEYWORD, 'usage_desc');
            for (const candidate of candidates) {
                const score = scoreCandidate(queryTokens, candidate);
                if (!best || score > best.score) {
                    best = { score, category: candidate.category };
                }
            }
        }

        if (best && best.score > CONFIDENCE.PARTIAL_MIN) {
            return {
                found: true,
                category: best.category,
                confidence: Math.min(best.score, CONFIDENCE.PARTIAL_CAP),
                matchType: 'partial',
            };
        }

        return NOT_FOUND;
    }

    async function recordCorrection(description: string, category: Category): Promise<CategoryPattern> {
        const normalized = normalizeForLearning(description);
        if (!normalized) {
            throw new InvalidCorrectionError(`Description "${description}" has nothing left to learn after normalization`);
        }
        return repository.upsert(normalized, category);
    }

    return { matchLearned, recordCorrection };
}
