// Types (re-exported from shared)
export type {
    Category,
    NoiseFilter,
    Grammar,
    GrammarInput,
    CategorySource,
    Transaction,
    CategoryPattern,
    MatchResult,
} from './types/index.js';

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
} from './types/index.js';

// Errors
export { FaturaError, ExtractionError, NoTransactionsFoundError, InvalidCorrectionError } from './errors.js';
export type { FaturaErrorCode } from './errors.js';

// Grammar registry
export { compileGrammar, createGrammarRegistry } from './grammar/index.js';
export type { CompiledGrammar, CompiledNoiseFilter, GrammarRegistry } from './grammar/index.js';

// Utils
export {
    fingerprint,
    fingerprintOf,
    dedupeByFingerprint,
    parseCurrency,
    parseStatementDate,
    parseFreeformDate,
    transliterateMonth,
    formatIsoDate,
    normalizeForLearning,
    MONTH_ABBREVIATIONS,
} from './utils/index.js';
export type { DedupeResult, DateParseResult, DateParseMethod, DateParseOptions } from './utils/index.js';

// Parsers
export {
    detectFormat,
    detectSourceId,
    buildLiteralTable,
    extractRawMatches,
    extractTransactions,
    parseInstallment,
} from './parser/index.js';
export type {
    SourceLiteral,
    DetectionMethod,
    FormatDetection,
    RawMatch,
    SkippedMatch,
    ExtractOptions,
    ExtractionResult,
    InstallmentInfo,
} from './parser/index.js';

// Categorizer
export {
    classifyByKeyword,
    createLearnedMatcher,
    createInMemoryPatternRepository,
    shouldAcceptLearned,
    applyLearnedCategories,
} from './categorizer/index.js';
export type {
    PatternRepository,
    PatternSort,
    LearnedMatcher,
    CategorizationStats,
    InMemoryPatternRepository,
    InMemoryRepositoryOptions,
} from './categorizer/index.js';

// Pipeline
export { createIngestionPipeline } from './pipeline/index.js';
export type { IngestionPipeline, IngestionPipelineOptions, IngestOptions, IngestionResult, IngestionStats } from './pipeline/index.js';
