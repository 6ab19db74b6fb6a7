/**
 * Inventories: the multiset of positions an account holds.
 *
 * An inventory is an immutable array. Every operation returns a new one;
 * lots with the same commodity and cost merge, and lots that reach zero vanish.
 */

import Decimal from 'decimal.js';
import type { Amount } from '../primitives/amount.js';
import type { Currency } from '../primitives/currency.js';
import { addDecimals, fromDecimal, toDecimal } from '../primitives/decimal.js';
import { costsEqual } from './cost.js';
import type { Position } from './position.js';

export type Inventory = readonly Position[];

export const EMPTY_INVENTORY: Inventory = [];

function sameLot(a: Position, b: Position): boolean {
    if (a.units.currency !== b.units.currency) return false;
    if (a.cost === undefined || b.cost === undefined) return a.cost === b.cost;
    return costsEqual(a.cost, b.cost);
}

/**
 * Add a position, merging it into an identical lot when one exists.
 */
export function addPosition(inventory: Inventory, position: Position): Inventory {
    const index = inventory.findIndex((held) => sameLot(held, position));
    if (index === -1) {
        return toDecimal(position.units.num).isZero() ? inventory : [...inventory, position];
    }

    const held = inventory[index];
    const num = addDecimals(held.units.num, position.units.num);
    if (toDecimal(num).isZero()) {
        return inventory.filter((_, i) => i !== index);
    }
    const merged: Position = { ...held, units: { num, currency: held.units.currency } };
    return inventory.map((p, i) => (i === index ? merged : p));
}

export function addPositions(inventory: Inventory, positions: readonly Position[]): Inventory {
    return positions.reduce(addPosition, inventory);
}

/**
 * Lots of `currency` held at cost, in inventory order.
 */
export function lotsOf(inventory: Inventory, currency: Currency): Position[] {
    return inventory.filter((p) => p.units.currency === currency && p.cost !== undefined);
}

/**
 * Total units of `currency`, with or without cost.
 */
export function unitsOf(inventory: Inventory, currency: Currency): Decimal {
    return inventory
        .filter((p) => p.units.currency === currency)
        .reduce((sum, p) => sum.plus(toDecimal(p.units.num)), new Decimal(0));
}

/**
 * Units per currency, sorted by currency. Zero totals are left out.
 */
export function inventoryBalance(inventory: Inventory): Amount[] {
    const totals = new Map<Currency, Decimal>();
    for (const p of inventory) {
        totals.set(p.units.currency, (totals.get(p.units.currency) ?? new Decimal(0)).plus(toDecimal(p.units.num)));
    }
    return [...totals.entries()]
        .filter(([, total]) => !total.isZero())
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([currency, total]) => ({ num: fromDecimal(total), currency }));
}

export function isEmptyInventory(inventory: Inventory): boolean {
    return inventory.length === 0;
}
