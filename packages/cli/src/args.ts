import type { CommandName, CommandOptions } from './types.js';

const COMMAND_NAMES: readonly CommandName[] = ['check', 'print', 'holdings'];

function isCommandName(value: string): value is CommandName {
    return COMMAND_NAMES.some((name) => name === value);
}

/**
 * Parses `<command> [ledger] [--ledger path] [--workspace dir] [--strict]`.
 * Returns an error message for anything it does not understand.
 */
export function parseArgs(args: readonly string[]): { command: CommandName; options: CommandOptions } | string {
    const [command, ...rest] = args;
    if (command === undefined || !isCommandName(command)) {
        return `Unknown command: ${command ?? '(none)'}`;
    }

    const options: CommandOptions = { strict: false };
    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (arg === '--strict') {
            options.strict = true;
        } else if (arg === '--ledger' || arg === '--workspace') {
            const value = rest[i + 1];
            if (value === undefined) return `Missing value for ${arg}`;
            options[arg === '--ledger' ? 'ledger' : 'workspace'] = value;
            i++;
        } else if (arg.startsWith('--')) {
            return `Unknown option: ${arg}`;
        } else if (options.ledger === undefined) {
            options.ledger = arg;
        } else {
            return `Unexpected argument: ${arg}`;
        }
    }
    return { command, options };
}
