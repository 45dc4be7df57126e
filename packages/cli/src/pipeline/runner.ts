import type { PipelineState, PipelineStep } from './types.js';
import { readFiles } from './steps/read.js';
import { ingestFiles } from './steps/ingest.js';
import { deduplicateTransactions } from './steps/dedup.js';
import { arrow, error } from '../utils/console.js';

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(initial: PipelineState): Promise<PipelineState> {
    let state = initial;
    const verbose = !state.options.json;

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Read Statements', fn: readFiles },
        { name: 'Ingestion', fn: ingestFiles },
        { name: 'Deduplication', fn: deduplicateTransactions },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        if (verbose) arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            if (verbose) error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
