/**
 * In-memory PatternRepository.
 *
 * Each upsert mutates the table synchronously inside the call, so concurrent
 * corrections of the same key cannot lose increments.
 */

import { CategoryPatternSchema, CONFIDENCE } from '../types/index.js';
import type { Category, CategoryPattern } from '../types/index.js';
import type { PatternRepository, PatternSort } from './types.js';

export interface InMemoryPatternRepository extends PatternRepository {
    /** Snapshot of every stored pattern, in insertion order. */
    list(): CategoryPattern[];
}

export interface InMemoryRepositoryOptions {
    now?: () => Date;
}

function patternKey(normalizedDescription: string, category: Category): string {
    return `${category}\u0000${normalizedDescription}`;
}

/**
 * Order by usage (desc), then most recently used.
 */
function byUsageDesc(a: CategoryPattern, b: CategoryPattern): number {
    if (b.usage_count !== a.usage_count) {
        return b.usage_count - a.usage_count;
    }
    return b.last_used_at.localeCompare(a.last_used_at);
}

/**
 * Create an in-memory repository, optionally seeded with stored patterns.
 *
 * @param seed - Previously stored patterns (validated)
 * @param options - Clock for timestamps
 */
export function createInMemoryPatternRepository(
    seed: readonly CategoryPattern[] = [],
    options: InMemoryRepositoryOptions = {}
): InMemoryPatternRepository {
    const now = options.now ?? (() => new Date());
    const patterns = new Map<string, CategoryPattern>();

    for (const entry of seed) {
        const pattern = CategoryPatternSchema.parse(entry);
        patterns.set(patternKey(pattern.normalized_description, pattern.category), pattern);
    }

    return {
        async exactLookup(normalizedDescription: string): Promise<CategoryPattern | null> {
            const candidates = [...patterns.values()]
                .filter((p) => p.normalized_description === normalizedDescription)
                .sort(byUsageDesc);
            return candidates.length > 0 ? { ...candidates[0] } : null;
        },

        async keywordLookup(keyword: string, limit: number, sortBy: PatternSort = 'usage_desc'): Promise<CategoryPattern[]> {
            const matches = [...patterns.values()].filter((p) => p.normalized_description.includes(keyword));
            if (sortBy === 'usage_desc') {
                matches.sort(byUsageDesc);
            }
            return matches.slice(0, Math.max(0, limit)).map((p) => ({ ...p }));
        },

        async upsert(normalizedDescription: string, category: Category): Promise<CategoryPattern> {
            const key = patternKey(normalizedDescription, category);
            const timestamp = now().toISOString();
            const existing = patterns.get(key);

            const pattern: CategoryPattern = existing
                ? { ...existing, usage_count: existing.usage_count + 1, last_used_at: timestamp }
                : CategoryPatternSchema.parse({
                    normalized_description: normalizedDescription,
                    category,
                    usage_count: 1,
                    confidence_seed: CONFIDENCE.MANUAL_CORRECTION,
                    created_at: timestamp,
                    last_used_at: timestamp,
                });

            patterns.set(key, pattern);
            return { ...pattern };
        },

        list(): CategoryPattern[] {
            return [...patterns.values()].map((p) => ({ ...p }));
        },
    };
}
