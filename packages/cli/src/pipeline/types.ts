import type { Settings, Transaction } from '@fatura/shared';
import type { GrammarRegistry, IngestionPipeline, IngestionResult } from '@fatura/core';
import type { Workspace, ProcessOptions } from '../types.js';

/**
 * A statement text file selected for processing.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash: string;
    text: string;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    file?: string;
    error?: unknown;
}

/**
 * Central state object passed through the processing pipeline.
 */
export interface PipelineState {
    /** Explicit inputs from the command line; empty means the imports directory. */
    inputs: string[];
    workspace: Workspace;
    options: ProcessOptions;
    settings: Settings;
    registry: GrammarRegistry;
    pipeline: IngestionPipeline;

    // Accumulated during pipeline execution
    files: InputFile[];
    /** Keyed by input path. */
    results: Record<string, IngestionResult>;
    transactions: Transaction[];

    warnings: string[];
    errors: PipelineError[];
    statistics: {
        rawTransactionCount: number;
        duplicateCount: number;
    };
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
