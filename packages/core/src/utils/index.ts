export { fingerprint, fingerprintOf, dedupeByFingerprint } from './fingerprint.js';
export type { DedupeResult } from './fingerprint.js';
export { parseCurrency, isZeroAmount } from './currency.js';
export {
    parseStatementDate,
    parseWithFormat,
    parseFreeformDate,
    transliterateMonth,
    formatIsoDate,
    MONTH_ABBREVIATIONS,
} from './date-parse.js';
export type { DateParseResult, DateParseMethod, DateParseOptions } from './date-parse.js';
export { normalizeForLearning, tokenize, extractKeywords, jaccard } from './normalize.js';
