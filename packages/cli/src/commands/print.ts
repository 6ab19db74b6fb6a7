import { formatLedger } from '@plainbook/core';
import { prepareLedger, exitCode } from './prepare.js';
import type { CommandOptions } from '../types.js';

/**
 * Renders the ledger as canonical text, in ledger order.
 */
export async function printLedger(options: CommandOptions): Promise<void> {
    const state = await prepareLedger(options);
    if (state.ledger && state.ledgerOptions) {
        process.stdout.write(formatLedger(state.ledger, state.ledgerOptions.rootNames));
    }
    const code = exitCode(state, state.options.strict);
    if (code !== 0) process.exit(code);
}
