/**
 * Ledger module: canonical ordering, options and the ledger walk.
 */

export {
    compareDirectives,
    sortDirectives,
    createLedger,
    addDirectives,
    getDatedDirectives,
    getUndatedDirectives,
    getOptions,
    formatLedger,
} from './ledger.js';
export type { Ledger } from './ledger.js';
export { DEFAULT_LEDGER_OPTIONS, parseLedgerOptions } from './options.js';
export type { LedgerOptions, ParsedOptions } from './options.js';
export { processLedger } from './process.js';
export type { PricePoint, LedgerStats, ProcessResult, ProcessOptions } from './process.js';
