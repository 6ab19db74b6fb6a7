import {
    createLedger,
    getOptions,
    isLedgerError,
    parseLedgerOptions,
    parseBooking,
    type LedgerOptions,
} from '@plainbook/core';
import type { ProjectConfig } from '@plainbook/shared';
import type { PipelineStep } from '../types.js';

/**
 * Project configuration applied on top of the ledger's own options.
 * Configured tolerances replace inference for their currency.
 */
export function applyProjectConfig(options: LedgerOptions, config: ProjectConfig): LedgerOptions {
    return {
        ...options,
        booking: config.booking_method !== undefined ? parseBooking(config.booking_method) : options.booking,
        tolerance: {
            ...options.tolerance,
            overrides: { ...options.tolerance.overrides, ...config.tolerance },
        },
    };
}

/**
 * Step 3: Build
 * Sorts the directives into a Ledger and resolves its options.
 */
export const buildLedger: PipelineStep = async (state) => {
    const ledger = createLedger(state.directives);
    state.ledger = ledger;

    try {
        const parsed = parseLedgerOptions(getOptions(ledger));
        state.ledgerOptions = applyProjectConfig(parsed.options, state.workspace.config);
        for (const warning of parsed.warnings) {
            state.warnings.push(warning.describe());
        }
    } catch (err) {
        if (!isLedgerError(err)) throw err;
        state.errors.push({ step: 'build', message: err.describe(), fatal: true, error: err });
    }
    return state;
};
