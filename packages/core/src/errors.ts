/**
 * Ledger error taxonomy.
 *
 * Structural codes are thrown by constructors and conversions.
 * Balancing, booking and validation codes are returned as data by the
 * resolvers and the ledger walk. Nothing here is transient; nothing is retried.
 */

export type StructuralErrorCode =
    | 'InvalidAccountType'
    | 'InvalidCurrency'
    | 'InvalidDate'
    | 'InvalidDecimal'
    | 'UnknownBookingToken'
    | 'IncompleteConversion'
    | 'IncompleteCost'
    | 'InvalidOption';

export type BalancingErrorCode = 'UnbalancedTransaction' | 'AmbiguousAutobalance';

export type BookingErrorCode = 'AmbiguousBooking' | 'NegativeHeldAtCost' | 'NoMatchingLot' | 'NegativeCostOrPrice';

export type ValidationErrorCode =
    | 'AccountNotOpen'
    | 'AccountClosed'
    | 'DuplicateOpen'
    | 'CurrencyNotAllowed'
    | 'BalanceMismatch'
    | 'UnknownOption'
    | 'UnusedPad';

export type LedgerErrorCode = StructuralErrorCode | BalancingErrorCode | BookingErrorCode | ValidationErrorCode;

/**
 * Where an error came from. Every field is optional; resolvers fill in
 * what they know and callers add the rest.
 */
export interface ErrorContext {
    date?: string;
    account?: string;
    currency?: string;
    residual?: string;
    postingIndex?: number;
}

export class LedgerError extends Error {
    readonly code: LedgerErrorCode;
    readonly context: Readonly<ErrorContext>;

    constructor(code: LedgerErrorCode, message: string, context: ErrorContext = {}) {
        super(message);
        this.name = 'LedgerError';
        this.code = code;
        this.context = { ...context };
    }

    /**
     * Same error with extra attribution. Fields already set win.
     */
    withContext(context: ErrorContext): LedgerError {
        return new LedgerError(this.code, this.message, { ...context, ...this.context });
    }

    /**
     * One-line rendering for diagnostics, e.g.
     * `2024-01-05 Assets:Cash: UnbalancedTransaction: ...`.
     */
    describe(): string {
        const where = [this.context.date, this.context.account].filter((part) => part !== undefined).join(' ');
        return where ? `${where}: ${this.code}: ${this.message}` : `${this.code}: ${this.message}`;
    }
}

export function isLedgerError(value: unknown): value is LedgerError {
    return value instanceof LedgerError;
}

/**
 * Outcome of a resolver: a value, or the single error that rejected it.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: LedgerError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function fail<T>(error: LedgerError): Result<T> {
    return { ok: false, error };
}
