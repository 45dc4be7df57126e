export { detectFormat, detectSourceId, buildLiteralTable } from './detect.js';
export type { SourceLiteral, DetectionMethod, FormatDetection, DetectOptions } from './detect.js';
export { extractRawMatches, extractTransactions, buildTransaction } from './extract.js';
export type { RawMatch, SkippedMatch, ExtractOptions, ExtractionResult } from './extract.js';
export { parseInstallment } from './installment.js';
export type { InstallmentInfo } from './installment.js';
export { noiseReason } from './noise.js';
