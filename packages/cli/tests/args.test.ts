import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/args.js';

describe('Argument Parsing', () => {
    it('should take the command and a positional ledger path', () => {
        expect(parseArgs(['check', 'books.yaml'])).toEqual({
            command: 'check',
            options: { strict: false, ledger: 'books.yaml' },
        });
    });

    it('should read flags in any order', () => {
        expect(parseArgs(['holdings', '--strict', '--workspace', '/books', '--ledger', 'main.yaml'])).toEqual({
            command: 'holdings',
            options: { strict: true, workspace: '/books', ledger: 'main.yaml' },
        });
    });

    it('should reject unknown commands and options', () => {
        expect(parseArgs(['balance'])).toBe('Unknown command: balance');
        expect(parseArgs([])).toBe('Unknown command: (none)');
        expect(parseArgs(['print', '--verbose'])).toBe('Unknown option: --verbose');
        expect(parseArgs(['print', '--ledger'])).toBe('Missing value for --ledger');
        expect(parseArgs(['print', 'a.yaml', 'b.yaml'])).toBe('Unexpected argument: b.yaml');
    });
});
