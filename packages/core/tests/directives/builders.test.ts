import { describe, it, expect } from 'vitest';
import {
    createBalance,
    createOpen,
    createOption,
    createPrice,
    createTransaction,
} from '../../src/directives/builders.js';
import { isDated } from '../../src/directives/types.js';
import { acct, thrownCode } from '../helpers.js';

describe('createTransaction', () => {
    it('applies defaults', () => {
        const txn = createTransaction({ date: '2024/01/05' });
        expect(txn).toEqual({
            type: 'transaction',
            date: '2024-01-05',
            meta: {},
            flag: '*',
            narration: '',
            tags: new Set(),
            links: new Set(),
            postings: [],
        });
        expect(txn.payee).toBeUndefined();
    });

    it('strips tag and link markers', () => {
        const txn = createTransaction({ date: '2024-01-05', tags: ['#trip', 'food'], links: ['^inv-1'] });
        expect([...txn.tags]).toEqual(['trip', 'food']);
        expect([...txn.links]).toEqual(['inv-1']);
    });

    it('rejects an invalid date', () => {
        expect(thrownCode(() => createTransaction({ date: '2024-02-30' }))).toBe('InvalidDate');
    });
});

describe('createOpen', () => {
    it('defaults to any currency and no booking method', () => {
        const open = createOpen({ date: '2024-01-01', account: acct('Assets:Cash') });
        expect(open.currencies).toEqual([]);
        expect(open.booking).toBeUndefined();
    });

    it('validates currencies', () => {
        expect(thrownCode(() => createOpen({ date: '2024-01-01', account: acct('Assets:Cash'), currencies: ['usd'] })))
            .toBe('InvalidCurrency');
    });
});

describe('createBalance', () => {
    it('rejects a negative tolerance', () => {
        expect(thrownCode(() => createBalance({
            date: '2024-01-01',
            account: acct('Assets:Cash'),
            amount: { num: '1.00', currency: 'USD' },
            tolerance: '-0.01',
        }))).toBe('InvalidDecimal');
    });
});

describe('createPrice', () => {
    it('rejects a negative price', () => {
        expect(thrownCode(() => createPrice({ date: '2024-01-01', currency: 'HOOL', amount: { num: '-1', currency: 'USD' } })))
            .toBe('NegativeCostOrPrice');
    });
});

describe('isDated', () => {
    it('separates dated from undated directives', () => {
        expect(isDated(createTransaction({ date: '2024-01-05' }))).toBe(true);
        expect(isDated(createOption({ name: 'title', value: 'Books' }))).toBe(false);
    });
});
