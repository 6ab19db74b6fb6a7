// Errors
export { LedgerError, isLedgerError, ok, fail } from './errors.js';
export type {
    LedgerErrorCode,
    StructuralErrorCode,
    BalancingErrorCode,
    BookingErrorCode,
    ValidationErrorCode,
    ErrorContext,
    Result,
} from './errors.js';

// Primitives
export * from './primitives/index.js';

// Accounts
export * from './account/index.js';

// Costs, positions, inventories
export * from './position/index.js';

// Postings
export * from './posting/index.js';

// Booking
export * from './booking/index.js';

// Balancing
export * from './balance/index.js';

// Directives
export * from './directives/index.js';

// Ledger
export * from './ledger/index.js';
