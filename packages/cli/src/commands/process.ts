import { createIngestionPipeline } from '@fatura/core';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadSettings, loadRegistry } from '../workspace/config.js';
import { createYamlPatternRepository } from '../yaml/patterns.js';
import { runPipeline } from '../pipeline/runner.js';
import type { PipelineState } from '../pipeline/types.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import type { ProcessOptions } from '../types.js';

/**
 * Machine-readable summary printed with --json.
 */
function toReport(state: PipelineState) {
    return {
        files: state.files.map((f) => ({
            filename: f.filename,
            hash: f.hash,
            sourceId: state.results[f.path]?.sourceId ?? null,
            detection: state.results[f.path]?.detection.method ?? null,
        })),
        transactions: state.transactions,
        warnings: state.warnings,
        errors: state.errors.map(({ step, file, message, fatal }) => ({ step, file, message, fatal })),
        statistics: state.statistics,
    };
}

function printTable(state: PipelineState): void {
    for (const txn of state.transactions) {
        const amount = txn.amount.padStart(10);
        const desc = txn.description.slice(0, 40).padEnd(40);
        const installment = txn.is_installment ? `${txn.installment_current}/${txn.installment_total}` : '';
        log(`${txn.date} | ${amount} | ${desc} | ${txn.category.padEnd(11)} | ${installment}`);
    }
}

export async function processStatements(inputs: string[], options: ProcessOptions): Promise<void> {
    const verbose = !options.json;
    if (verbose) log('\nFatura Engine - Processing statements');

    // 1. Workspace detection
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        error('Error: Workspace not found. Are you in a Fatura workspace?');
        console.error('Expected "config/settings.yaml" in the workspace root.');
        process.exit(1);
    }
    const workspace = resolveWorkspace(root);
    if (verbose) success(`Workspace: ${workspace.root}`);

    // 2. Load settings, grammars and learned patterns
    let initial: PipelineState;
    try {
        const settings = loadSettings(workspace);
        const registry = loadRegistry(workspace);

        if (options.source && !registry.has(options.source)) {
            error(`Error: Unknown source "${options.source}". Known: ${registry.sourceIds().join(', ')}`);
            process.exit(1);
        }

        const repository = await createYamlPatternRepository(workspace.config.learnedPatternsPath);
        const pipeline = createIngestionPipeline({
            registry,
            defaultSourceId: settings.default_source_id,
            repository,
            adaptiveThreshold: settings.adaptive_threshold,
        });

        initial = {
            inputs,
            workspace,
            options,
            settings,
            registry,
            pipeline,
            files: [],
            results: {},
            transactions: [],
            warnings: [],
            errors: [],
            statistics: {
                rawTransactionCount: 0,
                duplicateCount: 0,
            },
        };
    } catch (err) {
        error(`Error: Failed to load workspace configuration. ${errorMessage(err)}`);
        process.exit(1);
    }

    // 3. Run Pipeline
    const state = await runPipeline(initial);
    const fatal = state.errors.some(e => e.fatal);

    if (options.json) {
        log(JSON.stringify(toReport(state), null, 2));
        if (fatal) process.exit(1);
        return;
    }

    // 4. Report Final Status
    log('\n--- Processing Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    for (const e of state.errors) {
        error(`ERROR [${e.step}]: ${e.message}`);
    }
    if (fatal) {
        log('\n✖ Processing failed with fatal errors.');
        process.exit(1);
    }

    log('');
    printTable(state);
    log('');

    success(`Processed ${state.files.length} statement(s).`);
    arrow(`Total transactions: ${state.transactions.length}`);
    arrow(`Duplicates removed: ${state.statistics.duplicateCount}`);
}
