/**
 * Statement format detection from extracted text.
 *
 * Order of evidence:
 * 1. Source-name literals (case-insensitive substring, first match wins)
 * 2. First grammar, in registry order, whose transaction pattern matches
 * 3. Configured default source
 */

import type { GrammarRegistry } from '../grammar/index.js';

/**
 * One entry of the ordered literal table.
 * When literals overlap ("c6 bank" / "c6"), the longer one must come first.
 */
export interface SourceLiteral {
    literal: string;
    sourceId: string;
}

export type DetectionMethod = 'literal' | 'pattern' | 'default' | 'forced';

export interface FormatDetection {
    sourceId: string;
    method: DetectionMethod;
    /** Literal that matched, for method "literal". */
    literal?: string;
}

export interface DetectOptions {
    /** Source used when nothing matches. Must exist in the registry. */
    defaultSourceId: string;
    /** Ordered literal table; defaults to each grammar's names in registry order. */
    literals?: readonly SourceLiteral[];
}

/**
 * Build the default literal table from grammar names, in registry order.
 */
export function buildLiteralTable(registry: GrammarRegistry): SourceLiteral[] {
    const table: SourceLiteral[] = [];
    for (const grammar of registry.list()) {
        for (const literal of grammar.names) {
            table.push({ literal, sourceId: grammar.sourceId });
        }
    }
    return table;
}

/**
 * Detect which grammar applies to a statement. Never fails.
 *
 * @param text - Full extracted statement text
 * @param registry - Grammar registry
 * @param options - Default source and optional literal table
 */
export function detectFormat(
    text: string,
    registry: GrammarRegistry,
    options: DetectOptions
): FormatDetection {
    const lower = text.toLowerCase();
    const literals = options.literals ?? buildLiteralTable(registry);

    for (const { literal, sourceId } of literals) {
        if (registry.has(sourceId) && lower.includes(literal.toLowerCase())) {
            return { sourceId, method: 'literal', literal };
        }
    }

    for (const grammar of registry.list()) {
        if (grammar.transactionPattern.test(text)) {
            return { sourceId: grammar.sourceId, method: 'pattern' };
        }
    }

    return { sourceId: options.defaultSourceId, method: 'default' };
}

/**
 * Detect and return only the source id.
 */
export function detectSourceId(text: string, registry: GrammarRegistry, options: DetectOptions): string {
    return detectFormat(text, registry, options).sourceId;
}
