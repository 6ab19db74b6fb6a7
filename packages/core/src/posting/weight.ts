import Decimal from 'decimal.js';
import { LedgerError, fail, ok, type Result } from '../errors.js';
import type { Amount } from '../primitives/amount.js';
import { fromDecimal, isNegativeDecimal, toDecimal } from '../primitives/decimal.js';
import type { ResolvedPosting } from './types.js';

type WeightInput = Pick<ResolvedPosting, 'units' | 'cost' | 'costTotal' | 'price'>;

/**
 * Balancing weight of a resolved posting:
 *
 * - no cost, no price: the units themselves
 * - price only: units × per-unit price, or the total price carrying the sign of the units
 * - cost (with or without price): units × per-unit cost, or the written total cost
 *   carrying the sign of the units
 *
 * When both are present the cost balances; the price is only recorded for the price list.
 */
export function computeWeight(posting: WeightInput): Result<Amount> {
    const { units, cost, costTotal, price } = posting;

    if (cost !== undefined) {
        if (isNegativeDecimal(cost.number)) {
            return fail(new LedgerError('NegativeCostOrPrice', `Negative cost ${cost.number} ${cost.currency}`));
        }
        const num = costTotal !== undefined
            ? toDecimal(costTotal).times(Decimal.sign(toDecimal(units.num)))
            : toDecimal(units.num).times(toDecimal(cost.number));
        return ok({ num: fromDecimal(num), currency: cost.currency });
    }

    if (price !== undefined) {
        if (isNegativeDecimal(price.amount.num)) {
            return fail(new LedgerError(
                'NegativeCostOrPrice',
                `Negative price ${price.amount.num} ${price.amount.currency}`
            ));
        }
        const priceNum = toDecimal(price.amount.num);
        const num = price.kind === 'per_unit'
            ? toDecimal(units.num).times(priceNum)
            : priceNum.times(Decimal.sign(toDecimal(units.num)));
        return ok({ num: fromDecimal(num), currency: price.amount.currency });
    }

    return ok(units);
}
