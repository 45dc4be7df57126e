/**
 * Caller-visible failures raised by the ingestion pipeline.
 *
 * Per-match problems are never thrown: they are returned as SkippedMatch data.
 */

export type FaturaErrorCode = 'EXTRACTION_FAILED' | 'NO_TRANSACTIONS' | 'INVALID_CORRECTION';

export class FaturaError extends Error {
    readonly code: FaturaErrorCode;

    constructor(code: FaturaErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * No text could be obtained from the document.
 */
export class ExtractionError extends FaturaError {
    constructor(message = 'No text could be extracted from the statement') {
        super('EXTRACTION_FAILED', message);
    }
}

/**
 * The selected grammar produced zero transactions.
 * An empty statement is indistinguishable from a wrong grammar, so it is surfaced.
 */
export class NoTransactionsFoundError extends FaturaError {
    readonly sourceId: string;
    readonly warnings: readonly string[];

    constructor(sourceId: string, warnings: readonly string[] = []) {
        super('NO_TRANSACTIONS', `No transactions found using the "${sourceId}" grammar`);
        this.sourceId = sourceId;
        this.warnings = warnings;
    }
}

/**
 * A manual correction that cannot become a learned pattern.
 */
export class InvalidCorrectionError extends FaturaError {
    constructor(message: string) {
        super('INVALID_CORRECTION', message);
    }
}
