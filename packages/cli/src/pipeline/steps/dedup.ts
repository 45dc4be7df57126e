import { dedupeByFingerprint } from '@fatura/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Deduplication
 * Removes transactions whose fingerprint was already seen, in file order
 * (overlapping statements, the same file imported twice).
 */
export const deduplicateTransactions: PipelineStep = async (state) => {
    const { unique, duplicates } = dedupeByFingerprint(state.transactions);

    state.transactions = unique;
    state.statistics.duplicateCount = duplicates.length;

    if (duplicates.length > 0) {
        state.warnings.push(`${duplicates.length} duplicate transactions removed across files.`);
    }

    return state;
};
