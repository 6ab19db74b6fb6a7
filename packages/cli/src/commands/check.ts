import { prepareLedger, exitCode } from './prepare.js';
import { formatStats } from '../report/text.js';
import { log, success, fail } from '../utils/console.js';
import type { CommandOptions } from '../types.js';

export async function checkLedger(options: CommandOptions): Promise<void> {
    const state = await prepareLedger(options);

    log('\n--- Ledger Summary ---');
    if (state.result) {
        for (const line of formatStats(state.result.stats)) {
            log(line);
        }
    }

    const code = exitCode(state, state.options.strict);
    if (code !== 0) {
        fail(`${state.errors.length} error(s), ${state.warnings.length} warning(s).`);
        process.exit(code);
    }
    success('Ledger is consistent.');
}
