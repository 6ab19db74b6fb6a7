import Decimal from 'decimal.js';
import { LedgerError } from '../errors.js';
import type { Currency } from '../primitives/currency.js';
import { compareDates, parseDate, type LedgerDate } from '../primitives/date.js';
import { parseCurrency } from '../primitives/currency.js';
import { isNegativeDecimal, parseDecimal, toDecimal, type DecimalString } from '../primitives/decimal.js';

/**
 * Resolved cost basis of one lot. The per-unit number is unsigned.
 */
export interface Cost {
    readonly number: DecimalString;
    readonly currency: Currency;
    readonly date: LedgerDate;
    readonly label?: string;
}

/**
 * Under-specified cost, as written on a posting. Any subset of fields may be present.
 * On a reduction it filters the held lots; on an augmentation it describes the new lot.
 */
export interface CostSpec {
    readonly numberPer?: DecimalString;
    readonly numberTotal?: DecimalString;
    readonly currency?: Currency;
    readonly date?: LedgerDate;
    readonly label?: string;
    /** Average the commodity's lots into one (`{*}`). */
    readonly mergeCost: boolean;
}

export interface CostOptions {
    number: string;
    currency: string;
    date: string;
    label?: string;
}

export interface CostSpecOptions {
    numberPer?: string;
    numberTotal?: string;
    currency?: string;
    date?: string;
    label?: string;
    mergeCost?: boolean;
}

function unsigned(value: string, what: string): DecimalString {
    const parsed = parseDecimal(value);
    if (isNegativeDecimal(parsed)) {
        throw new LedgerError('NegativeCostOrPrice', `${what} must not be negative: ${value}`);
    }
    return parsed;
}

export function createCost(options: CostOptions): Cost {
    return {
        number: unsigned(options.number, 'Cost'),
        currency: parseCurrency(options.currency),
        date: parseDate(options.date),
        ...(options.label !== undefined ? { label: options.label } : {}),
    };
}

export function createCostSpec(options: CostSpecOptions = {}): CostSpec {
    return {
        ...(options.numberPer !== undefined ? { numberPer: unsigned(options.numberPer, 'Cost') } : {}),
        ...(options.numberTotal !== undefined ? { numberTotal: unsigned(options.numberTotal, 'Total cost') } : {}),
        ...(options.currency !== undefined ? { currency: parseCurrency(options.currency) } : {}),
        ...(options.date !== undefined ? { date: parseDate(options.date) } : {}),
        ...(options.label !== undefined ? { label: options.label } : {}),
        mergeCost: options.mergeCost ?? false,
    };
}

/**
 * True when the spec has no filtering field at all (`{}` or `{*}`).
 */
export function isEmptyCostSpec(spec: CostSpec): boolean {
    return spec.numberPer === undefined &&
        spec.numberTotal === undefined &&
        spec.currency === undefined &&
        spec.date === undefined &&
        spec.label === undefined;
}

/**
 * Per-unit number the spec implies for a posting of `units` (absolute) units:
 * numberPer + numberTotal / units. Undefined when the spec names no number.
 */
export function perUnitNumber(spec: CostSpec, units: Decimal): Decimal | undefined {
    if (spec.numberPer === undefined && spec.numberTotal === undefined) return undefined;
    let perUnit = toDecimal(spec.numberPer ?? '0');
    if (spec.numberTotal !== undefined && !units.isZero()) {
        perUnit = perUnit.plus(toDecimal(spec.numberTotal).dividedBy(units.abs()));
    }
    return perUnit;
}

/**
 * A lot matches iff every field present on the spec agrees with it.
 * `units` is the size of the reduction, used to check a total cost.
 */
export function costMatchesSpec(cost: Cost, spec: CostSpec, units: Decimal): boolean {
    if (spec.currency !== undefined && spec.currency !== cost.currency) return false;
    if (spec.date !== undefined && compareDates(spec.date, cost.date) !== 0) return false;
    if (spec.label !== undefined && spec.label !== cost.label) return false;

    const lotNumber = toDecimal(cost.number);
    if (spec.numberTotal !== undefined) {
        // Compare totals rather than dividing, so 1/3-style totals still match exactly.
        const expectedTotal = lotNumber.minus(toDecimal(spec.numberPer ?? '0')).times(units.abs());
        return expectedTotal.equals(toDecimal(spec.numberTotal));
    }
    if (spec.numberPer !== undefined) {
        return lotNumber.equals(toDecimal(spec.numberPer));
    }
    return true;
}

export function costsEqual(a: Cost, b: Cost): boolean {
    return a.currency === b.currency &&
        toDecimal(a.number).equals(toDecimal(b.number)) &&
        a.date === b.date &&
        a.label === b.label;
}

/**
 * Order lots oldest first; ties keep their relative order.
 */
export function compareCostDates(a: Cost, b: Cost): number {
    return compareDates(a.date, b.date);
}

export function formatCost(cost: Cost): string {
    const parts = [`${cost.number} ${cost.currency}`, cost.date];
    if (cost.label !== undefined) parts.push(JSON.stringify(cost.label));
    return `{${parts.join(', ')}}`;
}

/**
 * `{per # total CUR, date, "label"}`; `{*}` for a merge, `{}` when empty.
 */
export function formatCostSpec(spec: CostSpec): string {
    const parts: string[] = [];
    if (spec.mergeCost) parts.push('*');

    const numbers: string[] = [];
    if (spec.numberPer !== undefined) numbers.push(spec.numberPer);
    if (spec.numberTotal !== undefined) numbers.push(`# ${spec.numberTotal}`);
    if (spec.currency !== undefined) numbers.push(spec.currency);
    if (numbers.length > 0) parts.push(numbers.join(' '));

    if (spec.date !== undefined) parts.push(spec.date);
    if (spec.label !== undefined) parts.push(JSON.stringify(spec.label));
    return `{${parts.join(', ')}}`;
}
