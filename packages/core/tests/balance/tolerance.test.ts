import { describe, it, expect } from 'vitest';
import {
    DEFAULT_TOLERANCE_OPTIONS,
    inferTolerances,
    toleranceFor,
    unitTolerance,
    type ToleranceOptions,
} from '../../src/balance/tolerance.js';
import { post } from '../helpers.js';

function asStrings(tolerances: Map<string, { toString(): string }>): Record<string, string> {
    return Object.fromEntries([...tolerances.entries()].map(([currency, tol]) => [currency, tol.toString()]));
}

describe('unitTolerance', () => {
    it('is half of the last written digit', () => {
        expect(unitTolerance('436.01').toString()).toBe('0.005');
        expect(unitTolerance('12').toString()).toBe('0.5');
        expect(unitTolerance('1.000', '1').toString()).toBe('0.001');
    });
});

describe('inferTolerances', () => {
    it('takes the coarsest precision per currency', () => {
        const tolerances = inferTolerances([post('Assets:Cash', '-400.0 USD'), post('Expenses:Food', '400.00 USD')]);
        expect(asStrings(tolerances)).toEqual({ USD: '0.05' });
    });

    it('propagates through a per-unit price', () => {
        const tolerances = inferTolerances([
            post('Assets:Cash', '-400.00 USD', { price: { kind: 'per_unit', amount: { num: '1.09', currency: 'CAD' } } }),
            post('Assets:Savings', '436.01 CAD'),
        ]);
        expect(asStrings(tolerances)).toEqual({ USD: '0.005', CAD: '2.00545' });
    });

    it('uses only the precision of a total price', () => {
        const tolerances = inferTolerances([
            post('Assets:Cash', '-400.00 USD', { price: { kind: 'total', amount: { num: '436.0', currency: 'CAD' } } }),
        ]);
        expect(asStrings(tolerances)).toEqual({ USD: '0.005', CAD: '0.05' });
    });

    it('uses the precision of a total cost', () => {
        const postings = [post('Assets:Broker', '3 IVV', { cost: { numberTotal: '100.00', currency: 'USD' } })];
        expect(asStrings(inferTolerances(postings))).toEqual({ IVV: '0.5', USD: '0.005' });
    });

    it('ignores per-unit costs unless asked to', () => {
        const postings = [post('Assets:Broker', '10 IVV', { cost: { numberPer: '183.07', currency: 'USD' } })];
        expect(asStrings(inferTolerances(postings))).toEqual({ IVV: '0.5' });

        const fromCost: ToleranceOptions = { ...DEFAULT_TOLERANCE_OPTIONS, inferFromCost: true };
        expect(asStrings(inferTolerances(postings, fromCost))).toEqual({ IVV: '0.5', USD: '91.535' });
    });

    it('skips the auto-balance posting', () => {
        expect(asStrings(inferTolerances([post('Assets:Cash', '-37.45 USD'), post('Expenses:Food')]))).toEqual({ USD: '0.005' });
    });

    it('lets an override replace inference', () => {
        const options: ToleranceOptions = { ...DEFAULT_TOLERANCE_OPTIONS, overrides: { USD: '0.01' } };
        expect(asStrings(inferTolerances([post('Assets:Cash', '-400.0 USD')], options))).toEqual({ USD: '0.01' });
    });
});

describe('toleranceFor', () => {
    const options: ToleranceOptions = { ...DEFAULT_TOLERANCE_OPTIONS, defaults: { '*': '0.001', JPY: '1' } };

    it('prefers the inferred value', () => {
        const inferred = inferTolerances([post('Assets:Cash', '5.00 JPY')]);
        expect(toleranceFor(inferred, 'JPY', options).toString()).toBe('0.005');
    });

    it('falls back to the currency default, then the wildcard', () => {
        expect(toleranceFor(new Map(), 'JPY', options).toString()).toBe('1');
        expect(toleranceFor(new Map(), 'EUR', options).toString()).toBe('0.001');
    });

    it('is zero with nothing configured', () => {
        expect(toleranceFor(new Map(), 'EUR').toString()).toBe('0');
    });
});
