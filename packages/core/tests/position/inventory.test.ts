import { describe, it, expect } from 'vitest';
import { createCost } from '../../src/position/cost.js';
import {
    EMPTY_INVENTORY,
    addPosition,
    addPositions,
    inventoryBalance,
    isEmptyInventory,
    lotsOf,
    unitsOf,
} from '../../src/position/inventory.js';
import { formatPosition } from '../../src/position/position.js';
import { lot } from '../helpers.js';

const cheap = createCost({ number: '42.10', currency: 'USD', date: '2024-01-02' });
const dear = createCost({ number: '43.40', currency: 'USD', date: '2024-02-02' });

describe('addPosition', () => {
    it('merges units of the same lot', () => {
        const inv = addPositions(EMPTY_INVENTORY, [lot('20', 'MSFT', cheap), lot('5', 'MSFT', cheap)]);
        expect(inv).toEqual([lot('25', 'MSFT', cheap)]);
    });

    it('keeps lots at different costs apart', () => {
        const inv = addPositions(EMPTY_INVENTORY, [lot('20', 'MSFT', cheap), lot('5', 'MSFT', dear)]);
        expect(lotsOf(inv, 'MSFT')).toHaveLength(2);
        expect(unitsOf(inv, 'MSFT').toString()).toBe('25');
    });

    it('drops a lot that reaches zero', () => {
        const inv = addPositions(EMPTY_INVENTORY, [lot('20', 'MSFT', cheap), lot('-20', 'MSFT', cheap)]);
        expect(isEmptyInventory(inv)).toBe(true);
    });

    it('merges plain units separately from lots', () => {
        const inv = addPositions(EMPTY_INVENTORY, [
            { units: { num: '100.00', currency: 'USD' } },
            { units: { num: '-37.45', currency: 'USD' } },
            lot('10', 'MSFT', cheap),
        ]);
        expect(inv).toEqual([{ units: { num: '62.55', currency: 'USD' } }, lot('10', 'MSFT', cheap)]);
        expect(lotsOf(inv, 'USD')).toEqual([]);
    });

    it('leaves the input untouched', () => {
        const before = [lot('20', 'MSFT', cheap)];
        addPosition(before, lot('-5', 'MSFT', cheap));
        expect(before).toEqual([lot('20', 'MSFT', cheap)]);
    });
});

describe('inventoryBalance', () => {
    it('totals units per currency, sorted', () => {
        const inv = addPositions(EMPTY_INVENTORY, [
            { units: { num: '12.00', currency: 'USD' } },
            lot('20', 'MSFT', cheap),
            lot('5', 'MSFT', dear),
            { units: { num: '3', currency: 'CAD' } },
        ]);
        expect(inventoryBalance(inv)).toEqual([
            { num: '3', currency: 'CAD' },
            { num: '25', currency: 'MSFT' },
            { num: '12', currency: 'USD' },
        ]);
    });
});

describe('formatPosition', () => {
    it('renders units then cost', () => {
        expect(formatPosition(lot('20', 'MSFT', cheap))).toBe('20 MSFT {42.10 USD, 2024-01-02}');
        expect(formatPosition({ units: { num: '1.50', currency: 'USD' } })).toBe('1.50 USD');
    });
});
