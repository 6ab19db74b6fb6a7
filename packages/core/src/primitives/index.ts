/**
 * Primitive value types: dates, currencies, decimals and amounts.
 */

export { parseDate, isLedgerDate, toLedgerDate, compareDates } from './date.js';
export type { LedgerDate } from './date.js';
export { parseCurrency, isCurrency } from './currency.js';
export type { Currency } from './currency.js';
export {
    parseDecimal,
    isDecimalString,
    toDecimal,
    fromDecimal,
    decimalPlaces,
    negateDecimal,
    absDecimal,
    isNegativeDecimal,
    sumDecimals,
    quantize,
    addDecimals,
} from './decimal.js';
export type { DecimalString } from './decimal.js';
export {
    createAmount,
    createIncompleteAmount,
    isCompleteAmount,
    toAmount,
    fromAmount,
    compareAmounts,
    compareIncompleteAmounts,
    amountsEqual,
    negateAmount,
    formatAmount,
    formatIncompleteAmount,
} from './amount.js';
export type { Amount, IncompleteAmount } from './amount.js';
