#!/usr/bin/env node
/**
 * plainbook CLI
 *
 * - CLI handles all file I/O (uses node:fs)
 * - Core receives directives, returns a ProcessResult
 * - Core has no file system access, no console.* calls
 */

import { checkLedger } from './commands/check.js';
import { printLedger } from './commands/print.js';
import { showHoldings } from './commands/holdings.js';
import { parseArgs } from './args.js';
import { fail, log } from './utils/console.js';
import type { CommandName, CommandOptions } from './types.js';

const COMMANDS: Record<CommandName, (options: CommandOptions) => Promise<void>> = {
    check: checkLedger,
    print: printLedger,
    holdings: showHoldings,
};

function usage(): void {
    log('plainbook v1.0.0');
    log('');
    log('Usage: plainbook <check|print|holdings> [ledger.yaml] [options]');
    log('');
    log('Options:');
    log('  --ledger <path>      Ledger document (default: from plainbook.yaml)');
    log('  --workspace <dir>    Project root (default: nearest plainbook.yaml)');
    log('  --strict             Fail on warnings');
    log('');
    log('Example:');
    log('  plainbook check books/2024.yaml');
}

async function main() {
    const args = process.argv.slice(2);

    if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
        usage();
        process.exit(0);
    }

    const parsed = parseArgs(args);
    if (typeof parsed === 'string') {
        fail(`Error: ${parsed}`);
        usage();
        process.exit(1);
    }

    await COMMANDS[parsed.command](parsed.options);
}

main().catch((err: unknown) => {
    fail(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
