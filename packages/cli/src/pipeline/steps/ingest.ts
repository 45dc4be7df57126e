import { FaturaError } from '@fatura/core';
import type { PipelineStep } from '../types.js';
import { promptContinue } from '../../utils/prompt.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 2: Ingestion
 * Runs every statement through the core ingestion pipeline.
 * A statement that fails (no transactions, unknown grammar) does not stop the others.
 */
export const ingestFiles: PipelineStep = async (state) => {
    const originLabel = state.options.origin ?? state.settings.origin_label;

    for (const file of state.files) {
        try {
            const result = await state.pipeline.ingest(file.text, {
                originLabel,
                sourceId: state.options.source,
            });

            state.results[file.path] = result;
            state.transactions.push(...result.transactions);

            // Forward core warnings to pipeline state
            for (const warning of result.warnings) {
                state.warnings.push(`[${file.filename}] ${warning}`);
            }
        } catch (err) {
            const code = err instanceof FaturaError ? ` (${err.code})` : '';
            state.errors.push({
                step: 'ingest',
                file: file.filename,
                message: `Failed to ingest ${file.filename}${code}: ${errorMessage(err)}`,
                fatal: false,
                error: err,
            });
        }
    }

    state.statistics.rawTransactionCount = state.transactions.length;

    const failed = state.errors.filter(e => !e.fatal);
    if (failed.length > 0 && state.transactions.length > 0) {
        const shouldContinue = await promptContinue(
            `${failed.length} file(s) failed. Some transactions will be missing.`,
            state.options
        );

        if (!shouldContinue) {
            state.errors.push({
                step: 'ingest',
                message: 'Aborted by user after failed files.',
                fatal: true,
            });
        }
    }

    if (state.transactions.length === 0) {
        state.errors.push({
            step: 'ingest',
            message: 'No transactions found in any of the files.',
            fatal: true,
        });
    }

    return state;
};
