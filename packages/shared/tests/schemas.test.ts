import { describe, it, expect } from 'vitest';
import {
    AmountSchema,
    BalanceSchema,
    CostSpecSchema,
    DirectiveSchema,
    IncompleteAmountSchema,
    LedgerDocumentSchema,
    MetaSchema,
    OpenSchema,
    PostingSchema,
    ProjectConfigSchema,
    TransactionSchema,
} from '../src/schemas.js';

describe('AmountSchema', () => {
    it('splits number and currency', () => {
        expect(AmountSchema.parse('-400.00 USD')).toEqual({ num: '-400.00', currency: 'USD' });
    });

    it('rejects a missing currency', () => {
        expect(AmountSchema.safeParse('400.00').success).toBe(false);
    });

    it('rejects an invalid currency', () => {
        expect(AmountSchema.safeParse('400.00 usd').success).toBe(false);
    });
});

describe('IncompleteAmountSchema', () => {
    it('accepts each part alone', () => {
        expect(IncompleteAmountSchema.parse('12.50 USD')).toEqual({ num: '12.50', currency: 'USD' });
        expect(IncompleteAmountSchema.parse('12.50')).toEqual({ num: '12.50' });
        expect(IncompleteAmountSchema.parse('USD')).toEqual({ currency: 'USD' });
        expect(IncompleteAmountSchema.parse('')).toEqual({});
    });

    it('rejects text that is not an amount', () => {
        expect(IncompleteAmountSchema.safeParse('twelve dollars').success).toBe(false);
    });
});

describe('CostSpecSchema', () => {
    it('accepts an empty spec', () => {
        expect(CostSpecSchema.parse({})).toEqual({ merge_cost: false });
    });

    it('accepts YAML numbers as decimal strings', () => {
        expect(CostSpecSchema.parse({ number_per: 183.07, currency: 'USD' })).toEqual({
            number_per: '183.07',
            currency: 'USD',
            merge_cost: false,
        });
    });

    it('rejects a negative cost', () => {
        expect(CostSpecSchema.safeParse({ number_per: '-1' }).success).toBe(false);
    });
});

describe('PostingSchema', () => {
    it('accepts an auto-balance posting', () => {
        expect(PostingSchema.parse({ account: 'Assets:Cash' })).toEqual({ account: 'Assets:Cash' });
    });

    it('rejects both price forms together', () => {
        const result = PostingSchema.safeParse({
            account: 'Assets:Cash',
            units: '-400.00 USD',
            price: '1.09 CAD',
            total_price: '436.00 CAD',
        });
        expect(result.success).toBe(false);
    });

    it('rejects an account name with spaces', () => {
        expect(PostingSchema.safeParse({ account: 'Assets:My Cash' }).success).toBe(false);
    });
});

describe('MetaSchema', () => {
    it('accepts plain and tagged values', () => {
        const meta = { receipt: 'r-1', reviewed: true, count: 3, due: { kind: 'date', value: '2024-02-01' } };
        expect(MetaSchema.safeParse(meta).success).toBe(true);
    });

    it('rejects a tagged value of the wrong shape', () => {
        expect(MetaSchema.safeParse({ due: { kind: 'date', value: 'soon' } }).success).toBe(false);
    });
});

describe('directive schemas', () => {
    it('fills transaction defaults', () => {
        expect(TransactionSchema.parse({ type: 'transaction', date: '2024-01-05' })).toEqual({
            type: 'transaction',
            date: '2024-01-05',
            flag: '*',
            narration: '',
            tags: [],
            links: [],
            postings: [],
        });
    });

    it('rejects an unknown flag', () => {
        expect(TransactionSchema.safeParse({ type: 'transaction', date: '2024-01-05', flag: 'X' }).success).toBe(false);
    });

    it('accepts a booking method on open', () => {
        const open = OpenSchema.parse({ type: 'open', date: '2024-01-01', account: 'Assets:Broker', booking: 'FIFO' });
        expect(open.booking).toBe('FIFO');
        expect(open.currencies).toEqual([]);
        expect(OpenSchema.safeParse({ type: 'open', date: '2024-01-01', account: 'Assets:Broker', booking: 'HIFO' }).success)
            .toBe(false);
    });

    it('parses a balance amount', () => {
        const balance = BalanceSchema.parse({ type: 'balance', date: '2024-01-05', account: 'Assets:Cash', amount: '100.00 USD' });
        expect(balance.amount).toEqual({ num: '100.00', currency: 'USD' });
    });

    it('discriminates on type', () => {
        expect(DirectiveSchema.safeParse({ type: 'option', name: 'title', value: 'Books' }).success).toBe(true);
        expect(DirectiveSchema.safeParse({ type: 'budget', date: '2024-01-01' }).success).toBe(false);
    });

    it('rejects a malformed date', () => {
        expect(DirectiveSchema.safeParse({ type: 'close', date: '05/01/2024', account: 'Assets:Cash' }).success).toBe(false);
    });
});

describe('LedgerDocumentSchema', () => {
    it('defaults to an empty ledger', () => {
        expect(LedgerDocumentSchema.parse({})).toEqual({ options: {}, directives: [] });
    });

    it('accepts a repeated option as a list', () => {
        const doc = LedgerDocumentSchema.parse({ options: { operating_currency: ['USD', 'CAD'], title: 'Books' } });
        expect(doc.options.operating_currency).toEqual(['USD', 'CAD']);
    });
});

describe('ProjectConfigSchema', () => {
    it('fills defaults', () => {
        expect(ProjectConfigSchema.parse({})).toEqual({ ledger: 'ledger.yaml', tolerance: {}, strict: false });
    });

    it('rejects an unknown booking method', () => {
        expect(ProjectConfigSchema.safeParse({ booking_method: 'HIFO' }).success).toBe(false);
    });
});
