/**
 * Stage 1 categorization: the grammar's keyword table.
 *
 * Deterministic. Categories are tried in table order, keywords as
 * lowercase substrings of the description.
 */

import { UNCATEGORIZED_CATEGORY } from '../types/index.js';
import type { Category } from '../types/index.js';
import type { CompiledGrammar } from '../grammar/index.js';

/**
 * Categorize a description by keyword.
 *
 * @param description - Transaction description
 * @param grammar - Grammar whose keyword table applies
 * @returns First category with a keyword hit, or "outros"
 */
export function classifyByKeyword(
    description: string,
    grammar: Pick<CompiledGrammar, 'categoryKeywords'>
): Category {
    const lower = description.toLowerCase();

    for (const [category, keywords] of grammar.categoryKeywords) {
        if (keywords.some((keyword) => lower.includes(keyword))) {
            return category;
        }
    }

    return UNCATEGORIZED_CATEGORY;
}
