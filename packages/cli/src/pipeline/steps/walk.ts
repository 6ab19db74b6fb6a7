import { processLedger } from '@plainbook/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Walk
 * Folds the ledger in date order. Rejected directives are errors;
 * the walk itself always completes.
 */
export const walkLedger: PipelineStep = async (state) => {
    if (!state.ledger || !state.ledgerOptions) {
        return state;
    }

    const result = processLedger(state.ledger, { options: state.ledgerOptions });
    state.result = result;

    for (const warning of result.warnings) {
        state.warnings.push(warning.describe());
    }
    for (const error of result.errors) {
        state.errors.push({ step: 'walk', message: error.describe(), fatal: false, error });
    }
    return state;
};
