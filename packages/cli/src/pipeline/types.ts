import type { LedgerDocument } from '@plainbook/shared';
import type { Directive, Ledger, LedgerOptions, ProcessResult } from '@plainbook/core';
import type { CommandOptions, Workspace } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    /** Stops the pipeline; later steps do not run. */
    fatal: boolean;
    error?: unknown;
}

/**
 * State object passed through the checking pipeline.
 */
export interface PipelineState {
    ledgerPath: string;
    workspace: Workspace;
    options: CommandOptions;

    // Accumulated during pipeline execution
    document?: LedgerDocument;
    directives: Directive[];
    ledger?: Ledger;
    ledgerOptions?: LedgerOptions;
    result?: ProcessResult;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
