/**
 * Grammar registry: immutable table of per-source parsing grammars.
 *
 * Grammars are validated and their patterns compiled once, on creation.
 * The registry is injected wherever a grammar is needed; there is no global table.
 */

import { GrammarSchema, CategorySchema } from '../types/index.js';
import type { Category, GrammarInput } from '../types/index.js';

/**
 * Noise filter with its reject patterns compiled.
 */
export interface CompiledNoiseFilter {
    rejectDescriptionPatterns: readonly RegExp[];
    minDescriptionLength: number;
    rejectZeroAmount: boolean;
}

/**
 * Grammar ready for matching.
 */
export interface CompiledGrammar {
    readonly sourceId: string;
    readonly names: readonly string[];
    /** Case-insensitive, multiline; no global flag (callers add it per scan). */
    readonly transactionPattern: RegExp;
    readonly installmentPattern: RegExp;
    readonly currencyPattern?: RegExp;
    readonly dateFormat: string;
    readonly locale: string;
    /** Ordered category table, keywords lowercased. */
    readonly categoryKeywords: ReadonlyArray<readonly [Category, readonly string[]]>;
    readonly noiseFilter?: CompiledNoiseFilter;
}

export interface GrammarRegistry {
    get(sourceId: string): CompiledGrammar;
    has(sourceId: string): boolean;
    /** Grammars in registration order. */
    list(): readonly CompiledGrammar[];
    sourceIds(): string[];
}

/**
 * Count capture groups in a pattern by matching it (or nothing) against "".
 */
function countCaptureGroups(source: string): number {
    const match = new RegExp(`${source}|`).exec('');
    return match ? match.length - 1 : 0;
}

/**
 * Validate and compile one grammar.
 *
 * @throws Error if the grammar is invalid or has too few capture groups
 */
export function compileGrammar(input: GrammarInput): CompiledGrammar {
    const grammar = GrammarSchema.parse(input);

    const groups = countCaptureGroups(grammar.transaction_pattern);
    if (groups < 3) {
        throw new Error(
            `Grammar "${grammar.source_id}": transaction_pattern needs 3 capture groups (date, description, amount), found ${groups}`
        );
    }
    if (countCaptureGroups(grammar.installment_pattern) < 2) {
        throw new Error(
            `Grammar "${grammar.source_id}": installment_pattern needs 2 capture groups (current, total)`
        );
    }

    const categoryKeywords: Array<readonly [Category, readonly string[]]> = [];
    for (const [key, keywords] of Object.entries(grammar.category_keywords)) {
        const category = CategorySchema.parse(key);
        categoryKeywords.push([category, (keywords ?? []).map((k) => k.toLowerCase())]);
    }

    const filter = grammar.noise_filter;
    const noiseFilter: CompiledNoiseFilter | undefined = filter
        ? {
            rejectDescriptionPatterns: filter.reject_description_patterns.map((p) => new RegExp(p, 'i')),
            minDescriptionLength: filter.min_description_length,
            rejectZeroAmount: filter.reject_zero_amount,
        }
        : undefined;

    return Object.freeze({
        sourceId: grammar.source_id,
        names: Object.freeze(grammar.names.map((n) => n.toLowerCase())),
        transactionPattern: new RegExp(grammar.transaction_pattern, 'im'),
        installmentPattern: new RegExp(grammar.installment_pattern, 'i'),
        currencyPattern: grammar.currency_pattern ? new RegExp(grammar.currency_pattern, 'i') : undefined,
        dateFormat: grammar.date_format,
        locale: grammar.locale,
        categoryKeywords: Object.freeze(categoryKeywords),
        noiseFilter,
    });
}

/**
 * Build a registry from grammar records, preserving their order.
 *
 * @throws Error on an empty list, an invalid grammar or a duplicate source_id
 */
export function createGrammarRegistry(grammars: readonly GrammarInput[]): GrammarRegistry {
    if (grammars.length === 0) {
        throw new Error('Grammar registry requires at least one grammar');
    }

    const byId = new Map<string, CompiledGrammar>();
    for (const input of grammars) {
        const compiled = compileGrammar(input);
        if (byId.has(compiled.sourceId)) {
            throw new Error(`Duplicate grammar source_id: ${compiled.sourceId}`);
        }
        byId.set(compiled.sourceId, compiled);
    }

    const ordered = Object.freeze([...byId.values()]);

    return Object.freeze({
        get(sourceId: string): CompiledGrammar {
            const grammar = byId.get(sourceId);
            if (!grammar) {
                throw new Error(`Unknown grammar: ${sourceId}. Known: ${[...byId.keys()].join(', ')}`);
            }
            return grammar;
        },
        has(sourceId: string): boolean {
            return byId.has(sourceId);
        },
        list(): readonly CompiledGrammar[] {
            return ordered;
        },
        sourceIds(): string[] {
            return [...byId.keys()];
        },
    });
}
