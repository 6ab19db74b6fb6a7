import type { Amount } from '../primitives/amount.js';
import type { LedgerDate } from '../primitives/date.js';
import type { DecimalString } from '../primitives/decimal.js';
import type { Cost, CostSpec } from '../position/cost.js';
import type { Inventory } from '../position/inventory.js';

/**
 * A posting held at cost, to be booked against one account's inventory.
 */
export interface BookingRequest {
    /** Signed units; negative units reduce. */
    units: Amount;
    spec: CostSpec;
    /** Transaction date, used as the lot date of a new lot that names none. */
    date: LedgerDate;
}

/**
 * Part of a booked posting: units taken from (or added to) one lot.
 */
export interface BookedLeg {
    units: Amount;
    cost: Cost;
    /** Unsigned cost of the whole leg, kept when the spec wrote a total (`{# 100.00 USD}`). */
    total?: DecimalString;
}

/**
 * Result of booking one posting: the legs it resolved into and the
 * inventory that results from applying them.
 */
export interface Booked {
    legs: BookedLeg[];
    inventory: Inventory;
}
