import { isLedgerError } from '@plainbook/core';
import { convertDocument } from '../../yaml/document.js';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Convert
 * Builds core directives from the validated document.
 * A directive that fails to build is reported and left out; an invalid option stops the run.
 */
export const convertDirectives: PipelineStep = async (state) => {
    if (!state.document) {
        return state;
    }

    try {
        const converted = convertDocument(state.document);
        state.directives = converted.directives;
        for (const error of converted.errors) {
            state.errors.push({ step: 'convert', message: error.describe(), fatal: false, error });
        }
    } catch (err) {
        if (!isLedgerError(err)) throw err;
        state.errors.push({ step: 'convert', message: err.describe(), fatal: true, error: err });
    }
    return state;
};
