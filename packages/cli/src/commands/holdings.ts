import { formatHoldings } from '../report/text.js';
import { prepareLedger, exitCode } from './prepare.js';
import { info, log } from '../utils/console.js';
import type { CommandOptions } from '../types.js';

export async function showHoldings(options: CommandOptions): Promise<void> {
    const state = await prepareLedger(options);
    if (state.result) {
        const lines = formatHoldings(state.result.inventories, state.result.options.rootNames);
        log('\n--- Holdings ---');
        if (lines.length === 0) {
            info('No account holds anything.');
        }
        for (const line of lines) {
            log(line);
        }
    }
    const code = exitCode(state, state.options.strict);
    if (code !== 0) process.exit(code);
}
