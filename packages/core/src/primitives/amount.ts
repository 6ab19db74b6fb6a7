import { LedgerError } from '../errors.js';
import { parseCurrency, type Currency } from './currency.js';
import { negateDecimal, parseDecimal, toDecimal, type DecimalString } from './decimal.js';

/**
 * A number of units of one commodity.
 */
export interface Amount {
    readonly num: DecimalString;
    readonly currency: Currency;
}

/**
 * An amount that may still be missing its number, its currency, or both.
 */
export interface IncompleteAmount {
    readonly num?: DecimalString;
    readonly currency?: Currency;
}

export function createAmount(num: string, currency: string): Amount {
    return { num: parseDecimal(num), currency: parseCurrency(currency) };
}

export function createIncompleteAmount(fields: { num?: string; currency?: string } = {}): IncompleteAmount {
    return {
        ...(fields.num !== undefined ? { num: parseDecimal(fields.num) } : {}),
        ...(fields.currency !== undefined ? { currency: parseCurrency(fields.currency) } : {}),
    };
}

export function isCompleteAmount(amount: IncompleteAmount): amount is Amount {
    return amount.num !== undefined && amount.currency !== undefined;
}

/**
 * Convert to a complete Amount.
 * Throws IncompleteConversion unless both the number and the currency are present.
 */
export function toAmount(amount: IncompleteAmount): Amount {
    if (!isCompleteAmount(amount)) {
        const missing = amount.num === undefined && amount.currency === undefined
            ? 'number and currency'
            : amount.num === undefined ? 'number' : 'currency';
        throw new LedgerError('IncompleteConversion', `Amount is missing its ${missing}`);
    }
    return { num: amount.num, currency: amount.currency };
}

export function fromAmount(amount: Amount): IncompleteAmount {
    return { num: amount.num, currency: amount.currency };
}

/**
 * Partial order: -1, 0 or 1 for two amounts of the same currency,
 * null when the currencies differ. There is no implicit conversion.
 */
export function compareAmounts(a: Amount, b: Amount): -1 | 0 | 1 | null {
    if (a.currency !== b.currency) return null;
    const cmp = toDecimal(a.num).comparedTo(toDecimal(b.num));
    return cmp < 0 ? -1 : cmp > 0 ? 1 : 0;
}

/**
 * Partial order over incomplete amounts. Comparable only when the currencies
 * agree (both absent counts as agreeing); an absent number sorts first.
 */
export function compareIncompleteAmounts(a: IncompleteAmount, b: IncompleteAmount): -1 | 0 | 1 | null {
    if (a.currency !== b.currency) return null;
    if (a.num === undefined || b.num === undefined) {
        if (a.num === b.num) return 0;
        return a.num === undefined ? -1 : 1;
    }
    const cmp = toDecimal(a.num).comparedTo(toDecimal(b.num));
    return cmp < 0 ? -1 : cmp > 0 ? 1 : 0;
}

/**
 * Same currency and numerically equal ("400.00 USD" equals "400 USD").
 */
export function amountsEqual(a: Amount, b: Amount): boolean {
    return compareAmounts(a, b) === 0;
}

export function negateAmount(amount: Amount): Amount {
    return { num: negateDecimal(amount.num), currency: amount.currency };
}

export function formatAmount(amount: Amount): string {
    return `${amount.num} ${amount.currency}`;
}

/**
 * "<num> <currency>"; a missing number renders as 0, a missing currency is left out.
 */
export function formatIncompleteAmount(amount: IncompleteAmount): string {
    const num = amount.num ?? '0';
    return amount.currency !== undefined ? `${num} ${amount.currency}` : num;
}
