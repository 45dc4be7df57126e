/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    Category,
    NoiseFilter,
    Grammar,
    GrammarInput,
    CategorySource,
    Transaction,
    CategoryPattern,
    MatchResult,
} from '@fatura/shared';

export {
    CategorySchema,
    GrammarSchema,
    TransactionSchema,
    CategoryPatternSchema,
    CATEGORIES,
    UNCATEGORIZED_CATEGORY,
    CONFIDENCE,
    LEARNING,
    FINGERPRINT,
    ZERO_AMOUNT,
} from '@fatura/shared';
