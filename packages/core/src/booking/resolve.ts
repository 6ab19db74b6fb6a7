/**
 * Booking resolver: decides which held lots a posting at cost adds to or reduces.
 *
 * Reductions filter the account's lots of the commodity by the posting's cost spec, then:
 * - one candidate: reduce it, whatever the booking method
 * - several whose total equals the reduction: reduce them all
 * - otherwise the account's booking method decides
 *
 * No reduction may leave a negative quantity held at cost, except under NONE.
 */

import Decimal from 'decimal.js';
import { LedgerError, fail, ok, type Result } from '../errors.js';
import { formatAmount, type Amount } from '../primitives/amount.js';
import { absDecimal, fromDecimal, negateDecimal, toDecimal, type DecimalString } from '../primitives/decimal.js';
import type { Currency } from '../primitives/currency.js';
import { compareCostDates, costMatchesSpec, formatCostSpec, perUnitNumber, type Cost, type CostSpec } from '../position/cost.js';
import { addPosition, lotsOf, type Inventory } from '../position/inventory.js';
import type { Position } from '../position/position.js';
import type { Booking } from './method.js';
import type { Booked, BookedLeg, BookingRequest } from './types.js';

interface Lot extends Position {
    readonly cost: Cost;
}

function isLot(position: Position): position is Lot {
    return position.cost !== undefined;
}

function lotUnits(lot: Lot): Decimal {
    return toDecimal(lot.units.num);
}

function bookingError(
    code: 'AmbiguousBooking' | 'NegativeHeldAtCost' | 'NoMatchingLot' | 'IncompleteCost',
    message: string,
    currency: Currency
): LedgerError {
    return new LedgerError(code, message, { currency });
}

function describeRequest(request: BookingRequest): string {
    return `${formatAmount(request.units)} ${formatCostSpec(request.spec)}`;
}

type DecimalLike = Decimal | string;

/**
 * Take `units` (positive) out of `lot`.
 */
function take(state: Booked, lot: Lot, units: DecimalLike): Booked {
    const num = typeof units === 'string' ? negateDecimal(units) : fromDecimal(units.negated());
    const leg: BookedLeg = { units: { num, currency: lot.units.currency }, cost: lot.cost };
    return {
        legs: [...state.legs, leg],
        inventory: addPosition(state.inventory, { units: leg.units, cost: lot.cost }),
    };
}

/**
 * Cost the spec describes for a new lot, or undefined if it names no number or no currency.
 */
function costFromSpec(spec: CostSpec, units: Amount, date: string): Cost | undefined {
    if (spec.currency === undefined) return undefined;
    const perUnit = perUnitNumber(spec, toDecimal(units.num));
    if (perUnit === undefined) return undefined;
    return {
        number: spec.numberTotal === undefined && spec.numberPer !== undefined ? spec.numberPer : fromDecimal(perUnit),
        currency: spec.currency,
        date: spec.date ?? date,
        ...(spec.label !== undefined ? { label: spec.label } : {}),
    };
}

/**
 * `numberPer × |units| + numberTotal` for a spec that writes a total. The per-unit
 * cost of such a lot may be rounded; this sum never is.
 */
function writtenTotal(spec: CostSpec, units: Amount): DecimalString | undefined {
    if (spec.numberTotal === undefined) return undefined;
    const perUnitPart = toDecimal(spec.numberPer ?? '0').times(toDecimal(units.num).abs());
    return fromDecimal(perUnitPart.plus(toDecimal(spec.numberTotal)));
}

function openedLeg(units: Amount, cost: Cost, spec: CostSpec): BookedLeg {
    const total = writtenTotal(spec, units);
    return total !== undefined ? { units, cost, total } : { units, cost };
}

/**
 * Merge lots sharing one cost currency into a single lot at their weighted mean cost.
 * The merged lot is dated by the oldest of them.
 */
function averageOf(lots: readonly Lot[]): Lot | undefined {
    const currency = lots[0]?.cost.currency;
    if (currency === undefined || lots.some((lot) => lot.cost.currency !== currency)) return undefined;

    const units = lots.reduce((sum, lot) => sum.plus(lotUnits(lot)), new Decimal(0));
    const total = lots.reduce((sum, lot) => sum.plus(lotUnits(lot).times(toDecimal(lot.cost.number))), new Decimal(0));
    const oldest = [...lots].sort((a, b) => compareCostDates(a.cost, b.cost))[0];

    return {
        units: { num: fromDecimal(units), currency: oldest.units.currency },
        cost: { number: fromDecimal(total.dividedBy(units)), currency, date: oldest.cost.date },
    };
}

/**
 * Replace `lots` in the inventory by their average.
 */
function mergeLots(inventory: Inventory, lots: readonly Lot[], merged: Lot): Inventory {
    const without = lots.reduce(
        (inv, lot) => addPosition(inv, { units: { num: negateDecimal(lot.units.num), currency: lot.units.currency }, cost: lot.cost }),
        inventory
    );
    return addPosition(without, merged);
}

/**
 * Positive units at cost: open a lot (or grow an identical one).
 */
export function bookAugmentation(inventory: Inventory, request: BookingRequest): Result<Booked> {
    const { units, spec } = request;
    const cost = costFromSpec(spec, units, request.date);
    if (cost === undefined) {
        return fail(bookingError(
            'IncompleteCost',
            `Cannot open a lot for ${describeRequest(request)}: the cost needs a number and a currency`,
            units.currency
        ));
    }

    let next = addPosition(inventory, { units, cost });
    if (spec.mergeCost) {
        const lots = lotsOf(next, units.currency).filter(isLot).filter((lot) => lot.cost.currency === cost.currency);
        const merged = averageOf(lots);
        if (merged !== undefined && lots.length > 1) {
            next = mergeLots(next, lots, merged);
        }
    }
    return ok({ legs: [openedLeg(units, cost, spec)], inventory: next });
}

function consumeInOrder(inventory: Inventory, ordered: readonly Lot[], size: Decimal): Booked {
    let state: Booked = { legs: [], inventory };
    let remaining = size;
    for (const lot of ordered) {
        if (remaining.isZero()) break;
        const amount = Decimal.min(remaining, lotUnits(lot));
        state = take(state, lot, amount);
        remaining = remaining.minus(amount);
    }
    return state;
}

/**
 * NONE: no lot matching. A spec naming a full cost is booked as-is, possibly as a
 * negative lot; a partial spec consumes matching lots oldest first and books any
 * excess as a negative lot at the last lot's cost.
 */
function bookWithoutMatching(inventory: Inventory, request: BookingRequest, candidates: readonly Lot[]): Result<Booked> {
    const { units, spec } = request;
    const cost = costFromSpec(spec, units, request.date);
    if (cost !== undefined) {
        return ok({ legs: [openedLeg(units, cost, spec)], inventory: addPosition(inventory, { units, cost }) });
    }

    const ordered = [...candidates].sort((a, b) => compareCostDates(a.cost, b.cost));
    const last = ordered[ordered.length - 1];
    if (last === undefined) {
        return fail(bookingError('NoMatchingLot', `No lot matches ${describeRequest(request)}`, units.currency));
    }

    const size = toDecimal(units.num).abs();
    const held = ordered.reduce((sum, lot) => sum.plus(lotUnits(lot)), new Decimal(0));
    const state = consumeInOrder(inventory, ordered, size);
    return ok(size.greaterThan(held) ? take(state, last, size.minus(held)) : state);
}

/**
 * Negative units at cost: pick the lots to reduce.
 */
export function bookReduction(inventory: Inventory, request: BookingRequest, method: Booking): Result<Booked> {
    const { units, spec } = request;
    const size = toDecimal(units.num).abs();
    const effective: Booking = spec.mergeCost ? 'AVERAGE' : method;

    const held = lotsOf(inventory, units.currency).filter(isLot);
    const candidates = held.filter((lot) => lotUnits(lot).isPositive() && costMatchesSpec(lot.cost, spec, size));

    if (effective === 'NONE') {
        return bookWithoutMatching(inventory, request, candidates);
    }

    if (candidates.length === 0) {
        // A fully specified cost would have to open a new, negative lot.
        if (costFromSpec(spec, units, request.date) !== undefined) {
            return fail(bookingError(
                'NegativeHeldAtCost',
                `No held lot matches ${describeRequest(request)}; it would leave a negative position at cost`,
                units.currency
            ));
        }
        return fail(bookingError('NoMatchingLot', `No lot matches ${describeRequest(request)}`, units.currency));
    }

    const total = candidates.reduce((sum, lot) => sum.plus(lotUnits(lot)), new Decimal(0));
    if (size.greaterThan(total)) {
        return fail(bookingError(
            'NegativeHeldAtCost',
            `Reducing ${describeRequest(request)} exceeds the ${fromDecimal(total)} ${units.currency} held in matching lots`,
            units.currency
        ));
    }

    if (candidates.length === 1) {
        return ok(take({ legs: [], inventory }, candidates[0], absDecimal(units.num)));
    }

    if (size.equals(total)) {
        return ok(candidates.reduce<Booked>(
            (state, lot) => take(state, lot, lot.units.num),
            { legs: [], inventory }
        ));
    }

    switch (effective) {
        case 'STRICT':
            return fail(bookingError(
                'AmbiguousBooking',
                `Ambiguous reduction ${describeRequest(request)}: ${candidates.length} lots match and the total held differs`,
                units.currency
            ));

        case 'STRICT_WITH_SIZE': {
            const sameSize = candidates.filter((lot) => lotUnits(lot).equals(size));
            if (sameSize.length !== 1) {
                return fail(bookingError(
                    'AmbiguousBooking',
                    `Ambiguous reduction ${describeRequest(request)}: ${sameSize.length} lots have exactly that size`,
                    units.currency
                ));
            }
            return ok(take({ legs: [], inventory }, sameSize[0], sameSize[0].units.num));
        }

        case 'FIFO':
            return ok(consumeInOrder(inventory, [...candidates].sort((a, b) => compareCostDates(a.cost, b.cost)), size));

        case 'LIFO':
            return ok(consumeInOrder(inventory, [...candidates].sort((a, b) => compareCostDates(b.cost, a.cost)), size));

        case 'AVERAGE': {
            const merged = averageOf(candidates);
            if (merged === undefined) {
                return fail(bookingError(
                    'AmbiguousBooking',
                    `Cannot average ${describeRequest(request)}: matching lots are held in different cost currencies`,
                    units.currency
                ));
            }
            return ok(take({ legs: [], inventory: mergeLots(inventory, candidates, merged) }, merged, size));
        }
    }
}

/**
 * Book one posting at cost against an account's inventory.
 * Negative units reduce existing lots; other postings open or grow a lot.
 */
export function bookPosting(inventory: Inventory, request: BookingRequest, method: Booking): Result<Booked> {
    return toDecimal(request.units.num).isNegative()
        ? bookReduction(inventory, request, method)
        : bookAugmentation(inventory, request);
}
