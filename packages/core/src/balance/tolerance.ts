/**
 * Tolerance inference.
 *
 * A transaction balances when each currency's residual is within tolerance of zero.
 * The tolerance of a currency is inferred from the precision its numbers are written
 * with: `multiplier × 10^-dp`, the largest over the transaction's postings.
 * "400.00 USD" gives 0.005 USD at the default multiplier of 0.5.
 */

import Decimal from 'decimal.js';
import { TOLERANCE } from '@plainbook/shared';
import type { Currency } from '../primitives/currency.js';
import { decimalPlaces, toDecimal, type DecimalString } from '../primitives/decimal.js';
import type { Posting } from '../posting/types.js';

export interface ToleranceOptions {
    /** Fraction of the last written digit; default 0.5. */
    readonly multiplier: DecimalString;
    /**
     * Tolerance for currencies nothing was inferred for, keyed by currency.
     * The `*` key applies to every currency without its own entry.
     */
    readonly defaults: Readonly<Record<string, DecimalString>>;
    /** Fixed tolerances that replace inference for their currency. */
    readonly overrides: Readonly<Record<string, DecimalString>>;
    /** Let units held at cost widen the tolerance of the cost currency. */
    readonly inferFromCost: boolean;
}

export const DEFAULT_TOLERANCE_OPTIONS: ToleranceOptions = {
    multiplier: TOLERANCE.INFERRED_MULTIPLIER,
    defaults: {},
    overrides: {},
    inferFromCost: false,
};

/**
 * Tolerance implied by one written number: "436.01" → 0.005.
 */
export function unitTolerance(value: DecimalString, multiplier: DecimalString = TOLERANCE.INFERRED_MULTIPLIER): Decimal {
    return toDecimal(multiplier).times(new Decimal(10).pow(-decimalPlaces(value)));
}

/**
 * Per-currency tolerances inferred from a transaction's postings as written.
 *
 * - units contribute to their own currency
 * - a price contributes `tol(units) × price + tol(price) × |units|` to the price currency
 *   (a total price contributes only its own precision)
 * - a total cost contributes its own precision to the cost currency
 * - a per-unit cost contributes `tol(units) × cost` to the cost currency, with `inferFromCost`
 */
export function inferTolerances(
    postings: readonly Posting[],
    options: ToleranceOptions = DEFAULT_TOLERANCE_OPTIONS
): Map<Currency, Decimal> {
    const tolerances = new Map<Currency, Decimal>();
    const widen = (currency: Currency, tolerance: Decimal): void => {
        const current = tolerances.get(currency);
        if (current === undefined || tolerance.greaterThan(current)) {
            tolerances.set(currency, tolerance);
        }
    };

    for (const posting of postings) {
        const { num, currency } = posting.units;
        if (num === undefined) continue;

        const unitsTol = unitTolerance(num, options.multiplier);
        if (currency !== undefined) {
            widen(currency, unitsTol);
        }

        const price = posting.price;
        if (price?.amount.num !== undefined && price.amount.currency !== undefined) {
            const priceTol = unitTolerance(price.amount.num, options.multiplier);
            if (price.kind === 'per_unit') {
                const units = toDecimal(num).abs();
                widen(price.amount.currency, unitsTol.times(toDecimal(price.amount.num)).plus(priceTol.times(units)));
            } else {
                widen(price.amount.currency, priceTol);
            }
        }

        const cost = posting.cost;
        if (cost?.currency !== undefined && cost.numberTotal !== undefined) {
            widen(cost.currency, unitTolerance(cost.numberTotal, options.multiplier));
        }
        if (options.inferFromCost && cost?.currency !== undefined && cost.numberPer !== undefined) {
            widen(cost.currency, unitsTol.times(toDecimal(cost.numberPer)));
        }
    }

    for (const [currency, value] of Object.entries(options.overrides)) {
        tolerances.set(currency, toDecimal(value));
    }
    return tolerances;
}

/**
 * Tolerance for `currency`: inferred, else the configured default, else zero.
 */
export function toleranceFor(
    tolerances: ReadonlyMap<Currency, Decimal>,
    currency: Currency,
    options: ToleranceOptions = DEFAULT_TOLERANCE_OPTIONS
): Decimal {
    const inferred = tolerances.get(currency);
    if (inferred !== undefined) return inferred;
    const fallback = options.defaults[currency] ?? options.defaults[TOLERANCE.WILDCARD_CURRENCY];
    return fallback !== undefined ? toDecimal(fallback) : new Decimal(0);
}

