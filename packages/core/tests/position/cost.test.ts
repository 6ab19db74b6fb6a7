import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import {
    costMatchesSpec,
    createCost,
    createCostSpec,
    formatCost,
    formatCostSpec,
    isEmptyCostSpec,
    perUnitNumber,
} from '../../src/position/cost.js';
import { thrownCode } from '../helpers.js';

const ivv = createCost({ number: '183.07', currency: 'USD', date: '2024-01-10', label: 'first' });

describe('createCost', () => {
    it('validates the date and currency', () => {
        expect(ivv).toEqual({ number: '183.07', currency: 'USD', date: '2024-01-10', label: 'first' });
        expect(thrownCode(() => createCost({ number: '1', currency: 'USD', date: '2024-02-30' }))).toBe('InvalidDate');
    });

    it('rejects a negative number', () => {
        expect(thrownCode(() => createCost({ number: '-1', currency: 'USD', date: '2024-01-01' }))).toBe('NegativeCostOrPrice');
        expect(thrownCode(() => createCostSpec({ numberTotal: '-5' }))).toBe('NegativeCostOrPrice');
    });
});

describe('costMatchesSpec', () => {
    const twenty = new Decimal(20);

    it('matches everything with an empty spec', () => {
        const empty = createCostSpec();
        expect(isEmptyCostSpec(empty)).toBe(true);
        expect(costMatchesSpec(ivv, empty, twenty)).toBe(true);
    });

    it('compares the per-unit number numerically', () => {
        expect(costMatchesSpec(ivv, createCostSpec({ numberPer: '183.070' }), twenty)).toBe(true);
        expect(costMatchesSpec(ivv, createCostSpec({ numberPer: '187.12' }), twenty)).toBe(false);
    });

    it('checks a total against the size of the reduction', () => {
        expect(costMatchesSpec(ivv, createCostSpec({ numberTotal: '3661.40', currency: 'USD' }), twenty)).toBe(true);
        expect(costMatchesSpec(ivv, createCostSpec({ numberTotal: '3661.40' }), new Decimal(10))).toBe(false);
    });

    it('filters on currency, date and label', () => {
        expect(costMatchesSpec(ivv, createCostSpec({ currency: 'CAD' }), twenty)).toBe(false);
        expect(costMatchesSpec(ivv, createCostSpec({ date: '2024/01/10' }), twenty)).toBe(true);
        expect(costMatchesSpec(ivv, createCostSpec({ label: 'second' }), twenty)).toBe(false);
        expect(costMatchesSpec(ivv, createCostSpec({ label: 'first' }), twenty)).toBe(true);
    });
});

describe('perUnitNumber', () => {
    it('adds the total spread over the units', () => {
        const spec = createCostSpec({ numberPer: '10', numberTotal: '9.95', currency: 'USD' });
        expect(perUnitNumber(spec, new Decimal(-5))?.toString()).toBe('11.99');
    });

    it('is undefined without a number', () => {
        expect(perUnitNumber(createCostSpec({ currency: 'USD' }), new Decimal(5))).toBeUndefined();
    });
});

describe('formatting', () => {
    it('renders a cost with its date and label', () => {
        expect(formatCost(ivv)).toBe('{183.07 USD, 2024-01-10, "first"}');
    });

    it('renders specs', () => {
        expect(formatCostSpec(createCostSpec())).toBe('{}');
        expect(formatCostSpec(createCostSpec({ mergeCost: true }))).toBe('{*}');
        expect(formatCostSpec(createCostSpec({ numberPer: '10', numberTotal: '9.95', currency: 'USD' })))
            .toBe('{10 # 9.95 USD}');
        expect(formatCostSpec(createCostSpec({ numberPer: '183.07', currency: 'USD', date: '2024-01-10' })))
            .toBe('{183.07 USD, 2024-01-10}');
    });
});
