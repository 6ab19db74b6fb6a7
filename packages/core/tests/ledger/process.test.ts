import { describe, it, expect } from 'vitest';
import {
    createBalance,
    createClose,
    createNote,
    createOpen,
    createOption,
    createPad,
    createPrice,
    createTransaction,
} from '../../src/directives/builders.js';
import type { Directive } from '../../src/directives/types.js';
import { createLedger } from '../../src/ledger/ledger.js';
import { processLedger } from '../../src/ledger/process.js';
import { unitsOf } from '../../src/position/inventory.js';
import { acct, post } from '../helpers.js';

const cash = acct('Assets:Cash');

function open(date: string, name: string, currencies: string[] = []): Directive {
    return createOpen({ date, account: acct(name), currencies });
}

function balance(date: string, name: string, num: string, currency = 'USD'): Directive {
    return createBalance({ date, account: acct(name), amount: { num, currency } });
}

function run(directives: Directive[]) {
    return processLedger(createLedger(directives));
}

const opening: Directive[] = [
    open('2024-01-01', 'Assets:Cash', ['USD']),
    open('2024-01-01', 'Expenses:Food'),
    open('2024-01-01', 'Equity:Opening'),
    createTransaction({
        date: '2024-01-02',
        narration: 'Deposit',
        postings: [post('Assets:Cash', '100.00 USD'), post('Equity:Opening')],
    }),
    createTransaction({
        date: '2024-01-03',
        narration: 'Lunch',
        postings: [post('Expenses:Food', '37.45 USD'), post('Assets:Cash')],
    }),
];

describe('processLedger: transactions and balances', () => {
    it('folds transactions into the inventories', () => {
        const result = run(opening);
        expect(result.errors).toEqual([]);
        expect(result.stats).toEqual({ directives: 5, transactions: 2, rejected: 0, padding: 0, balanceChecks: 0 });
        expect(result.inventories.get('Assets:Cash')).toEqual([{ units: { num: '62.55', currency: 'USD' } }]);
        expect(result.inventories.get('Equity:Opening')).toEqual([{ units: { num: '-100.00', currency: 'USD' } }]);
    });

    it('checks a balance against the start of its day', () => {
        const result = run([...opening, balance('2024-01-03', 'Assets:Cash', '100.00'), balance('2024-01-04', 'Assets:Cash', '62.55')]);
        expect(result.errors).toEqual([]);
        expect(result.stats.balanceChecks).toBe(2);
    });

    it('reports a failed balance assertion', () => {
        const result = run([...opening, balance('2024-01-04', 'Assets:Cash', '60.00')]);
        expect(result.errors.map((e) => e.code)).toEqual(['BalanceMismatch']);
        expect(result.errors[0]?.context).toEqual({
            date: '2024-01-04',
            account: 'Assets:Cash',
            currency: 'USD',
            residual: '-2.55',
        });
    });

    it('sums the descendants of the asserted account', () => {
        const result = run([
            open('2024-01-01', 'Assets:Bank'),
            open('2024-01-01', 'Assets:Bank:Checking'),
            open('2024-01-01', 'Assets:Bank:Savings'),
            open('2024-01-01', 'Equity:Opening'),
            createTransaction({
                date: '2024-01-02',
                postings: [
                    post('Assets:Bank:Checking', '30.00 USD'),
                    post('Assets:Bank:Savings', '70.00 USD'),
                    post('Equity:Opening'),
                ],
            }),
            balance('2024-01-03', 'Assets:Bank', '100.00'),
        ]);
        expect(result.errors).toEqual([]);
    });

    it('rejects an unbalanced transaction and keeps going', () => {
        const result = run([
            ...opening,
            createTransaction({
                date: '2024-01-04',
                postings: [post('Expenses:Food', '10.00 USD'), post('Assets:Cash', '-9.00 USD')],
            }),
            balance('2024-01-05', 'Assets:Cash', '62.55'),
        ]);
        expect(result.errors.map((e) => e.code)).toEqual(['UnbalancedTransaction']);
        expect(result.stats.rejected).toBe(1);
        expect(result.stats.transactions).toBe(2);
    });
});

describe('processLedger: account checks', () => {
    it('rejects a posting to an account that was never opened', () => {
        const result = run([
            ...opening,
            createTransaction({ date: '2024-01-04', postings: [post('Expenses:Travel', '5.00 USD'), post('Assets:Cash')] }),
        ]);
        expect(result.errors.map((e) => e.code)).toEqual(['AccountNotOpen']);
        expect(result.errors[0]?.context).toEqual({ date: '2024-01-04', account: 'Expenses:Travel', postingIndex: 0 });
        expect(unitsOf(result.inventories.get('Assets:Cash') ?? [], 'USD').toString()).toBe('62.55');
    });

    it('rejects a posting after the account is closed', () => {
        const result = run([
            ...opening,
            createClose({ date: '2024-01-04', account: acct('Expenses:Food') }),
            createTransaction({ date: '2024-01-05', postings: [post('Expenses:Food', '5.00 USD'), post('Assets:Cash')] }),
        ]);
        expect(result.errors.map((e) => e.code)).toEqual(['AccountClosed']);
    });

    it('rejects a currency the account does not allow', () => {
        const result = run([
            ...opening,
            open('2024-01-01', 'Assets:Wallet', ['CAD']),
            createTransaction({ date: '2024-01-04', postings: [post('Assets:Cash', '5.00 CAD'), post('Assets:Wallet')] }),
        ]);
        expect(result.errors.map((e) => e.code)).toEqual(['CurrencyNotAllowed']);
        expect(result.errors[0]?.context.currency).toBe('CAD');
    });

    it('rejects a second open of the same account', () => {
        const result = run([...opening, open('2024-02-01', 'Assets:Cash')]);
        expect(result.errors.map((e) => e.code)).toEqual(['DuplicateOpen']);
    });

    it('requires an open account for notes', () => {
        const result = run([createNote({ date: '2024-01-01', account: cash, comment: 'hello' })]);
        expect(result.errors.map((e) => e.code)).toEqual(['AccountNotOpen']);
    });
});

describe('processLedger: pads', () => {
    const padded: Directive[] = [
        open('2024-01-01', 'Assets:Cash'),
        open('2024-01-01', 'Equity:Opening'),
        createPad({ date: '2024-01-01', account: cash, sourceAccount: acct('Equity:Opening') }),
        balance('2024-01-10', 'Assets:Cash', '250.00'),
    ];

    it('inserts a padding transaction instead of failing', () => {
        const result = run(padded);
        expect(result.errors).toEqual([]);
        expect(result.padding).toHaveLength(1);

        const [padding] = result.padding;
        expect(padding?.transaction.flag).toBe('P');
        expect(padding?.transaction.date).toBe('2024-01-01');
        expect(padding?.transaction.narration).toBe('(Padding inserted for Balance of 250.00 USD for difference 250.00 USD)');
        expect(padding?.postings.map((p) => p.units)).toEqual([
            { num: '250.00', currency: 'USD' },
            { num: '-250.00', currency: 'USD' },
        ]);
        expect(result.inventories.get('Assets:Cash')).toEqual([{ units: { num: '250.00', currency: 'USD' } }]);
    });

    it('pads each currency only once', () => {
        const result = run([...padded, balance('2024-01-11', 'Assets:Cash', '300.00')]);
        expect(result.padding).toHaveLength(1);
        expect(result.errors.map((e) => e.code)).toEqual(['BalanceMismatch']);
    });

    it('warns about a pad no assertion uses', () => {
        const result = run(padded.slice(0, 3));
        expect(result.warnings.map((w) => w.code)).toEqual(['UnusedPad']);
        expect(result.padding).toEqual([]);
    });
});

describe('processLedger: booking and prices', () => {
    it('books reductions with the method named on the open', () => {
        const result = run([
            createOpen({ date: '2024-01-01', account: acct('Assets:Broker'), booking: 'FIFO' }),
            open('2024-01-01', 'Assets:Cash'),
            open('2024-01-01', 'Income:Gains'),
            createTransaction({
                date: '2024-01-10',
                postings: [post('Assets:Broker', '20 IVV', { cost: { numberPer: '183.07', currency: 'USD' } }), post('Assets:Cash')],
            }),
            createTransaction({
                date: '2024-02-10',
                postings: [post('Assets:Broker', '15 IVV', { cost: { numberPer: '187.12', currency: 'USD' } }), post('Assets:Cash')],
            }),
            createTransaction({
                date: '2024-03-01',
                postings: [
                    post('Assets:Broker', '-25 IVV', { cost: {} }),
                    post('Assets:Cash', '4700.00 USD'),
                    post('Income:Gains'),
                ],
            }),
        ]);
        expect(result.errors).toEqual([]);
        expect(result.inventories.get('Assets:Broker')).toEqual([
            { units: { num: '10', currency: 'IVV' }, cost: { number: '187.12', currency: 'USD', date: '2024-02-10' } },
        ]);
        const sale = result.transactions[2];
        expect(sale?.postings[3]?.units).toEqual({ num: '-103.00', currency: 'USD' });
    });

    it('uses the ledger booking option for other accounts', () => {
        const directives: Directive[] = [
            createOption({ name: 'booking_method', value: 'FIFO' }),
            open('2024-01-01', 'Assets:Broker'),
            open('2024-01-01', 'Assets:Cash'),
            createTransaction({
                date: '2024-01-10',
                postings: [post('Assets:Broker', '20 IVV', { cost: { numberPer: '10.00', currency: 'USD' } }), post('Assets:Cash')],
            }),
            createTransaction({
                date: '2024-01-11',
                postings: [post('Assets:Broker', '20 IVV', { cost: { numberPer: '11.00', currency: 'USD' } }), post('Assets:Cash')],
            }),
            createTransaction({
                date: '2024-01-12',
                postings: [post('Assets:Broker', '-5 IVV', { cost: {} }), post('Assets:Cash', '50.00 USD')],
            }),
        ];
        const result = run(directives);
        expect(result.options.booking).toBe('FIFO');
        expect(result.errors).toEqual([]);
    });

    it('collects prices from directives and postings', () => {
        const result = run([
            open('2024-01-01', 'Assets:Cash'),
            open('2024-01-01', 'Assets:Savings'),
            createPrice({ date: '2024-01-01', currency: 'HOOL', amount: { num: '520.00', currency: 'USD' } }),
            createTransaction({
                date: '2024-01-02',
                postings: [
                    post('Assets:Cash', '-400.00 USD', { price: { kind: 'per_unit', amount: { num: '1.09', currency: 'CAD' } } }),
                    post('Assets:Savings', '436.01 CAD'),
                ],
            }),
        ]);
        expect(result.errors).toEqual([]);
        expect(result.prices).toEqual([
            { date: '2024-01-01', currency: 'HOOL', amount: { num: '520.00', currency: 'USD' }, source: 'directive' },
            { date: '2024-01-02', currency: 'USD', amount: { num: '1.09', currency: 'CAD' }, source: 'posting' },
        ]);
    });
});

describe('processLedger: options', () => {
    it('reports unknown options as warnings', () => {
        const result = run([createOption({ name: 'documents', value: 'stmts' })]);
        expect(result.warnings.map((w) => w.code)).toEqual(['UnknownOption']);
        expect(result.errors).toEqual([]);
    });
});
