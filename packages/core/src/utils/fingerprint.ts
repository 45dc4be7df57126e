/**
 * Transaction fingerprints and fingerprint-based deduplication.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 for cross-platform compatibility.
 * Node's crypto module is not available in browser.
 */

import { sha256 } from 'js-sha256';
import type { Transaction } from '../types/index.js';
import { FINGERPRINT } from '../types/index.js';

/**
 * Compute the deterministic fingerprint of a transaction.
 *
 * Payload format: "{date}|{description}|{amount}|{source_id}|{origin_label}"
 *
 * Fields are hashed exactly as stored, with no re-normalization: the same
 * purchase re-imported with different spacing gets a different fingerprint.
 *
 * @param date - ISO date string YYYY-MM-DD
 * @param description - Description as stored on the transaction
 * @param amount - Amount string as stored ("45.80")
 * @param sourceId - Grammar that parsed the transaction
 * @param originLabel - Card/account the statement belongs to
 * @returns 64-character lowercase hex SHA-256 digest
 */
export function fingerprint(
    date: string,
    description: string,
    amount: string,
    sourceId: string,
    originLabel: string
): string {
    const payload = [date, description, amount, sourceId, originLabel].join(FINGERPRINT.SEPARATOR);
    return sha256(payload);
}

/**
 * Recompute a transaction's fingerprint from its stored fields.
 */
export function fingerprintOf(
    txn: Pick<Transaction, 'date' | 'description' | 'amount' | 'source_id' | 'origin_label'>
): string {
    return fingerprint(txn.date, txn.description, txn.amount, txn.source_id, txn.origin_label);
}

export interface DedupeResult {
    unique: Transaction[];
    duplicates: Transaction[];
}

/**
 * Split transactions into first occurrences and repeats, by fingerprint.
 *
 * PURE FUNCTION: Does not mutate the inputs.
 *
 * @param transactions - Transactions in processing order
 * @param known - Fingerprints already on record (e.g. previous imports)
 */
export function dedupeByFingerprint(
    transactions: readonly Transaction[],
    known: ReadonlySet<string> = new Set()
): DedupeResult {
    const seen = new Set<string>(known);
    const unique: Transaction[] = [];
    const duplicates: Transaction[] = [];

    for (const txn of transactions) {
        if (seen.has(txn.fingerprint)) {
            duplicates.push(txn);
        } else {
            seen.add(txn.fingerprint);
            unique.push(txn);
        }
    }

    return { unique, duplicates };
}
