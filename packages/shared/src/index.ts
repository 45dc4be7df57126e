// Schemas
export {
    CategorySchema,
    NoiseFilterSchema,
    GrammarSchema,
    GrammarFileSchema,
    CategorySourceSchema,
    TransactionSchema,
    CategoryPatternSchema,
    CategoryPatternFileSchema,
    MatchResultSchema,
    SettingsSchema,
} from './schemas.js';

// Types
export type {
    Category,
    NoiseFilter,
    Grammar,
    GrammarInput,
    GrammarFile,
    CategorySource,
    Transaction,
    CategoryPattern,
    CategoryPatternFile,
    MatchResult,
    Settings,
} from './schemas.js';

// Constants
export {
    CATEGORIES,
    UNCATEGORIZED_CATEGORY,
    CONFIDENCE,
    LEARNING,
    FINGERPRINT,
    ZERO_AMOUNT,
    SETTINGS_DEFAULTS,
} from './constants.js';
