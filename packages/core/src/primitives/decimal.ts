import Decimal from 'decimal.js';
import { DECIMAL_PATTERN } from '@plainbook/shared';
import { LedgerError } from '../errors.js';

/**
 * Decimal number kept in its written form, e.g. "400.00".
 * The string is the source of truth for precision; arithmetic goes through Decimal.
 */
export type DecimalString = string;

export function isDecimalString(value: string): boolean {
    return DECIMAL_PATTERN.test(value);
}

/**
 * Validate a decimal string. A leading "+" is dropped.
 */
export function parseDecimal(value: string): DecimalString {
    const trimmed = value.trim().replace(/^\+/, '');
    if (!isDecimalString(trimmed)) {
        throw new LedgerError('InvalidDecimal', `Invalid decimal number: "${value}"`);
    }
    return trimmed;
}

/**
 * Sums and products of written decimals are exact. Quotients (per-unit costs from a
 * total, average costs) round to decimal.js's default 20 significant digits.
 */
export function toDecimal(value: DecimalString): Decimal {
    return new Decimal(value);
}

/**
 * Back to string form, always in plain notation.
 */
export function fromDecimal(value: Decimal): DecimalString {
    return value.isZero() ? '0' : value.toFixed();
}

/**
 * Digits after the decimal point as written: "400.00" → 2, "12" → 0.
 */
export function decimalPlaces(value: DecimalString): number {
    const dot = value.indexOf('.');
    return dot === -1 ? 0 : value.length - dot - 1;
}

/**
 * Flip the sign without touching the written digits.
 */
export function negateDecimal(value: DecimalString): DecimalString {
    if (value.startsWith('-')) return value.slice(1);
    if (toDecimal(value).isZero()) return value;
    return `-${value}`;
}

export function absDecimal(value: DecimalString): DecimalString {
    return value.startsWith('-') ? value.slice(1) : value;
}

export function isNegativeDecimal(value: DecimalString): boolean {
    return toDecimal(value).isNegative() && !toDecimal(value).isZero();
}

export function sumDecimals(values: readonly DecimalString[]): Decimal {
    return values.reduce((sum, v) => sum.plus(toDecimal(v)), new Decimal(0));
}

/**
 * Round to a number of decimal places and keep them written out: (436, 2) → "436.00".
 */
export function quantize(value: Decimal, places: number): DecimalString {
    const text = value.toFixed(places);
    return /^-0(\.0+)?$/.test(text) ? text.slice(1) : text;
}

/**
 * Sum two written decimals, keeping the finer of their precisions: "20.00" + "5" → "25.00".
 */
export function addDecimals(a: DecimalString, b: DecimalString): DecimalString {
    return quantize(toDecimal(a).plus(toDecimal(b)), Math.max(decimalPlaces(a), decimalPlaces(b)));
}
