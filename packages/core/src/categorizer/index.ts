/**
 * Categorizer module: keyword table plus learned patterns.
 */

export { classifyByKeyword } from './keyword.js';
export { createLearnedMatcher, scoreCandidate } from './learned.js';
export { createInMemoryPatternRepository } from './repository.js';
export type { InMemoryPatternRepository, InMemoryRepositoryOptions } from './repository.js';
export { shouldAcceptLearned, applyLearnedCategories, summarizeCategorization } from './categorize.js';
export type { PatternRepository, PatternSort, LearnedMatcher, CategorizationStats } from './types.js';
