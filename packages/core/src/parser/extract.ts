/**
 * Grammar-driven transaction extraction.
 *
 * Each grammar's transaction pattern has three capture groups, always in the
 * order (date, description, amount). Every match is processed in isolation:
 * a malformed match is skipped and reported, never fatal to the batch.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in ExtractionResult.
 */

import { CONFIDENCE, TransactionSchema, UNCATEGORIZED_CATEGORY } from '../types/index.js';
import type { Transaction } from '../types/index.js';
import type { CompiledGrammar } from '../grammar/index.js';
import { parseStatementDate } from '../utils/date-parse.js';
import { parseCurrency } from '../utils/currency.js';
import { fingerprint } from '../utils/fingerprint.js';
import { classifyByKeyword } from '../categorizer/keyword.js';
import { parseInstallment } from './installment.js';
import { noiseReason } from './noise.js';

/**
 * The three captured groups of one transaction-pattern match.
 */
export interface RawMatch {
    dateText: string;
    descriptionText: string;
    amountText: string;
    /** Full matched text. */
    line: string;
    /** Offset of the match in the text. */
    index: number;
}

/**
 * A match that did not become a transaction.
 */
export interface SkippedMatch {
    index: number;
    line: string;
    kind: 'error' | 'noise';
    reason: string;
}

export interface ExtractOptions {
    originLabel: string;
    /** Clock for year-less dates and the date fallback. */
    now?: Date;
}

export interface ExtractionResult {
    /** Raw matches found, including skipped ones. */
    matched: number;
    transactions: Transaction[];
    skipped: SkippedMatch[];
    warnings: string[];
}

/**
 * Run the grammar's transaction pattern over the whole text.
 *
 * Global, non-overlapping, multiline, case-insensitive; document order.
 */
export function extractRawMatches(text: string, grammar: Pick<CompiledGrammar, 'transactionPattern'>): RawMatch[] {
    const { source, flags } = grammar.transactionPattern;
    const regex = new RegExp(source, flags.includes('g') ? flags : `${flags}g`);
    const matches: RawMatch[] = [];

    for (const match of text.matchAll(regex)) {
        matches.push({
            dateText: match[1] ?? '',
            descriptionText: match[2] ?? '',
            amountText: match[3] ?? '',
            line: match[0],
            index: match.index ?? 0,
        });
    }

    return matches;
}

/**
 * Turn one raw match into a transaction.
 *
 * @throws Error when the match cannot form a valid transaction
 */
export function buildTransaction(
    match: RawMatch,
    grammar: CompiledGrammar,
    options: ExtractOptions,
    warnings: string[]
): Transaction {
    const description = match.descriptionText.trim();
    if (!description) {
        throw new Error('empty description');
    }

    const parsedDate = parseStatementDate(match.dateText, grammar.dateFormat, {
        locale: grammar.locale,
        now: options.now,
    });
    if (parsedDate.method === 'fallback') {
        warnings.push(`Unparseable date "${match.dateText}" in "${match.line}", using ${parsedDate.date}`);
    }

    const amount = parseCurrency(match.amountText, grammar.currencyPattern);
    const installment = parseInstallment(description, grammar.installmentPattern);
    const category = classifyByKeyword(description, grammar);
    const matchedKeyword = category !== UNCATEGORIZED_CATEGORY;

    const txn: Transaction = {
        date: parsedDate.date,
        description,
        amount,
        is_installment: installment.isInstallment,
        ...(installment.isInstallment
            ? { installment_current: installment.current, installment_total: installment.total }
            : {}),
        category,
        category_source: matchedKeyword ? 'keyword' : 'default',
        confidence: matchedKeyword ? CONFIDENCE.KEYWORD : CONFIDENCE.DEFAULT,
        source_id: grammar.sourceId,
        origin_label: options.originLabel,
        fingerprint: fingerprint(parsedDate.date, description, amount, grammar.sourceId, options.originLabel),
    };

    // Validate against schema (runtime check)
    return TransactionSchema.parse(txn);
}

/**
 * Extract transactions from statement text with one grammar.
 * Never throws for the whole call.
 *
 * @param text - Full extracted statement text
 * @param grammar - Grammar selected for the text
 * @param options - Origin label and clock
 */
export function extractTransactions(
    text: string,
    grammar: CompiledGrammar,
    options: ExtractOptions
): ExtractionResult {
    const matches = extractRawMatches(text, grammar);
    const transactions: Transaction[] = [];
    const skipped: SkippedMatch[] = [];
    const warnings: string[] = [];

    for (const match of matches) {
        try {
            const noise = noiseReason(
                match,
                parseCurrency(match.amountText, grammar.currencyPattern),
                grammar.noiseFilter
            );
            if (noise) {
                skipped.push({ index: match.index, line: match.line, kind: 'noise', reason: noise });
                continue;
            }

            transactions.push(buildTransaction(match, grammar, options, warnings));
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            skipped.push({ index: match.index, line: match.line, kind: 'error', reason });
            warnings.push(`Skipped malformed match "${match.line}": ${reason}`);
        }
    }

    const noiseCount = skipped.filter((s) => s.kind === 'noise').length;
    if (noiseCount > 0) {
        warnings.push(`Filtered ${noiseCount} noise matches`);
    }

    return { matched: matches.length, transactions, skipped, warnings };
}
