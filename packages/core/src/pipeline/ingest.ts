/**
 * Statement ingestion: text -> detect -> extract -> categorize -> records.
 *
 * The pipeline holds no mutable state of its own; the only shared state is
 * the optional PatternRepository. Documents can be ingested concurrently.
 */

import { CONFIDENCE } from '../types/index.js';
import type { Transaction } from '../types/index.js';
import type { GrammarRegistry } from '../grammar/index.js';
import { detectFormat } from '../parser/detect.js';
import type { FormatDetection, SourceLiteral } from '../parser/detect.js';
import { extractTransactions } from '../parser/extract.js';
import type { SkippedMatch } from '../parser/extract.js';
import { createLearnedMatcher } from '../categorizer/learned.js';
import { applyLearnedCategories, summarizeCategorization } from '../categorizer/categorize.js';
import type { CategorizationStats, LearnedMatcher, PatternRepository } from '../categorizer/types.js';
import { ExtractionError, NoTransactionsFoundError } from '../errors.js';

export interface IngestionPipelineOptions {
    registry: GrammarRegistry;
    /** Grammar used when detection finds nothing. */
    defaultSourceId: string;
    /** Enables stage 2 categorization. */
    repository?: PatternRepository;
    /** Minimum learned confidence (exclusive). Defaults to 0.7. */
    adaptiveThreshold?: number;
    literals?: readonly SourceLiteral[];
    now?: () => Date;
}

export interface IngestOptions {
    originLabel: string;
    /** Skip detection and use this grammar. */
    sourceId?: string;
}

export interface IngestionStats {
    matched: number;
    extracted: number;
    skippedErrors: number;
    skippedNoise: number;
    categorization: CategorizationStats;
}

export interface IngestionResult {
    sourceId: string;
    detection: FormatDetection;
    transactions: Transaction[];
    skipped: SkippedMatch[];
    warnings: string[];
    stats: IngestionStats;
}

export interface IngestionPipeline {
    ingest(text: string, options: IngestOptions): Promise<IngestionResult>;
}

/**
 * Create an ingestion pipeline over an injected grammar registry.
 *
 * @throws Error if the default source or threshold is invalid
 */
export function createIngestionPipeline(options: IngestionPipelineOptions): IngestionPipeline {
    const { registry, defaultSourceId, repository, literals } = options;
    const threshold = options.adaptiveThreshold ?? CONFIDENCE.ADAPTIVE_ACCEPT;
    const now = options.now ?? (() => new Date());

    if (!registry.has(defaultSourceId)) {
        throw new Error(`Default source "${defaultSourceId}" is not in the grammar registry`);
    }
    if (threshold < 0 || threshold > 1) {
        throw new Error(`Adaptive threshold must be within [0, 1], got ${threshold}`);
    }

    const matcher: LearnedMatcher | null = repository ? createLearnedMatcher(repository) : null;

    async function ingest(text: string, ingestOptions: IngestOptions): Promise<IngestionResult> {
        if (!text || !text.trim()) {
            throw new ExtractionError();
        }

        const warnings: string[] = [];

        let detection: FormatDetection;
        if (ingestOptions.sourceId) {
            // get() throws for an unknown id
            detection = { sourceId: registry.get(ingestOptions.sourceId).sourceId, method: 'forced' };
        } else {
            detection = detectFormat(text, registry, { defaultSourceId, literals });
            if (detection.method === 'default') {
                warnings.push(`Statement format not recognized, using default grammar "${defaultSourceId}"`);
            }
        }

        const grammar = registry.get(detection.sourceId);
        const extraction = extractTransactions(text, grammar, {
            originLabel: ingestOptions.originLabel,
            now: now(),
        });
        warnings.push(...extraction.warnings);

        if (extraction.transactions.length === 0) {
            throw new NoTransactionsFoundError(grammar.sourceId, warnings);
        }

        let transactions = extraction.transactions;
        let categorization = summarizeCategorization(transactions);
        if (matcher) {
            const learned = await applyLearnedCategories(transactions, matcher, threshold);
            transactions = learned.transactions;
            categorization = learned.stats;
            warnings.push(...learned.warnings);
        }

        return {
            sourceId: grammar.sourceId,
            detection,
            transactions,
            skipped: extraction.skipped,
            warnings,
            stats: {
                matched: extraction.matched,
                extracted: extraction.transactions.length,
                skippedErrors: extraction.skipped.filter((s) => s.kind === 'error').length,
                skippedNoise: extraction.skipped.filter((s) => s.kind === 'noise').length,
                categorization,
            },
        };
    }

    return { ingest };
}
