/**
 * Ledger walk.
 *
 * Folds the dated directives in canonical order over the account state:
 * opens and closes, transactions balanced against the running inventories,
 * pads and balance assertions. Each failure is collected with its date and
 * account; a rejected directive leaves the state as it was and the walk goes on.
 */

import Decimal from 'decimal.js';
import { FLAGS } from '@plainbook/shared';
import { accountKey, formatAccount, isWithin, type Account } from '../account/account.js';
import { unitTolerance } from '../balance/tolerance.js';
import { balanceTransaction, foldTransaction } from '../balance/transaction.js';
import type { Inventories, ResolvedTransaction } from '../balance/types.js';
import type { Booking } from '../booking/method.js';
import { createTransaction } from '../directives/builders.js';
import type { Balance, DatedKind, Open, Pad, Transaction } from '../directives/types.js';
import { LedgerError } from '../errors.js';
import type { Amount } from '../primitives/amount.js';
import type { Currency } from '../primitives/currency.js';
import type { LedgerDate } from '../primitives/date.js';
import { decimalPlaces, fromDecimal, quantize, toDecimal } from '../primitives/decimal.js';
import { unitsOf } from '../position/inventory.js';
import { createPosting } from '../posting/posting.js';
import { getDatedDirectives, getOptions, type Ledger } from './ledger.js';
import { parseLedgerOptions, type LedgerOptions } from './options.js';

/**
 * One observed price: from a Price directive, or from a posting's `@`/`@@` annotation.
 */
export interface PricePoint {
    date: LedgerDate;
    currency: Currency;
    /** Price of one unit of `currency`. */
    amount: Amount;
    source: 'directive' | 'posting';
}

export interface LedgerStats {
    directives: number;
    transactions: number;
    rejected: number;
    padding: number;
    balanceChecks: number;
}

export interface ProcessResult {
    options: LedgerOptions;
    /** Accepted transactions, in ledger order, with their postings resolved. */
    transactions: ResolvedTransaction[];
    /** Transactions synthesized by pads. */
    padding: ResolvedTransaction[];
    inventories: Inventories;
    prices: PricePoint[];
    errors: LedgerError[];
    warnings: LedgerError[];
    stats: LedgerStats;
}

interface PendingPad {
    pad: Pad;
    /** Currencies this pad already filled. */
    filled: Set<Currency>;
}

interface WalkState {
    options: LedgerOptions;
    accounts: Map<string, Account>;
    opens: Map<string, Open>;
    closed: Map<string, LedgerDate>;
    bookings: Map<string, Booking>;
    pads: Map<string, PendingPad>;
    inventories: Inventories;
    result: ProcessResult;
}

// ============================================================================
// Account Checks
// ============================================================================

function name(state: WalkState, account: Account): string {
    return formatAccount(account, state.options.rootNames);
}

/**
 * Error for a reference to an account that is not open on `date`, or undefined.
 */
function checkOpen(state: WalkState, account: Account, date: LedgerDate): LedgerError | undefined {
    const key = accountKey(account);
    const context = { date, account: name(state, account) };
    if (!state.opens.has(key)) {
        return new LedgerError('AccountNotOpen', `Account ${context.account} is not open`, context);
    }
    const closedOn = state.closed.get(key);
    if (closedOn !== undefined) {
        return new LedgerError('AccountClosed', `Account ${context.account} was closed on ${closedOn}`, context);
    }
    return undefined;
}

function checkTransactionAccounts(state: WalkState, txn: Transaction): LedgerError[] {
    const errors: LedgerError[] = [];
    for (const [index, posting] of txn.postings.entries()) {
        const notOpen = checkOpen(state, posting.account, txn.date);
        if (notOpen !== undefined) {
            errors.push(notOpen.withContext({ postingIndex: index }));
            continue;
        }

        const allowed = state.opens.get(accountKey(posting.account))?.currencies ?? [];
        const currency = posting.units.currency;
        if (allowed.length > 0 && currency !== undefined && !allowed.includes(currency)) {
            errors.push(new LedgerError(
                'CurrencyNotAllowed',
                `Account ${name(state, posting.account)} does not allow ${currency} (allowed: ${allowed.join(', ')})`,
                { date: txn.date, account: name(state, posting.account), currency, postingIndex: index }
            ));
        }
    }
    return errors;
}

// ============================================================================
// Directive Handlers
// ============================================================================

function handleOpen(state: WalkState, open: Open): void {
    const key = accountKey(open.account);
    const previous = state.opens.get(key);
    if (previous !== undefined) {
        state.result.errors.push(new LedgerError(
            'DuplicateOpen',
            `Account ${name(state, open.account)} is already open since ${previous.date}`,
            { date: open.date, account: name(state, open.account) }
        ));
        return;
    }
    state.accounts.set(key, open.account);
    state.opens.set(key, open);
    if (open.booking !== undefined) {
        state.bookings.set(key, open.booking);
    }
}

function recordPrices(state: WalkState, resolved: ResolvedTransaction): void {
    const { date } = resolved.transaction;
    for (const posting of resolved.postings) {
        const { price, units } = posting;
        if (price === undefined) continue;
        const size = toDecimal(units.num).abs();
        if (size.isZero()) continue;
        const perUnit = price.kind === 'per_unit'
            ? price.amount.num
            : fromDecimal(toDecimal(price.amount.num).dividedBy(size));
        state.result.prices.push({
            date,
            currency: units.currency,
            amount: { num: perUnit, currency: price.amount.currency },
            source: 'posting',
        });
    }
}

/**
 * Balance a transaction against the running inventories and apply it.
 * Returns the resolved transaction, or undefined when it was rejected.
 */
function applyTransaction(state: WalkState, txn: Transaction): ResolvedTransaction | undefined {
    const accountErrors = checkTransactionAccounts(state, txn);
    if (accountErrors.length > 0) {
        state.result.errors.push(...accountErrors);
        state.result.stats.rejected++;
        return undefined;
    }

    const balanced = balanceTransaction(txn, {
        inventories: state.inventories,
        bookings: state.bookings,
        defaultBooking: state.options.booking,
        tolerance: state.options.tolerance,
    });
    if (!balanced.ok) {
        state.result.errors.push(balanced.error);
        state.result.stats.rejected++;
        return undefined;
    }

    state.inventories = foldTransaction(state.inventories, balanced.value);
    recordPrices(state, balanced.value);
    return balanced.value;
}

function handlePad(state: WalkState, pad: Pad): void {
    const error = checkOpen(state, pad.account, pad.date) ?? checkOpen(state, pad.sourceAccount, pad.date);
    if (error !== undefined) {
        state.result.errors.push(error);
        return;
    }
    const key = accountKey(pad.account);
    const replaced = state.pads.get(key);
    if (replaced !== undefined && replaced.filled.size === 0) {
        state.result.warnings.push(unusedPad(state, replaced.pad));
    }
    state.pads.set(key, { pad, filled: new Set() });
}

function unusedPad(state: WalkState, pad: Pad): LedgerError {
    return new LedgerError(
        'UnusedPad',
        `Pad of ${name(state, pad.account)} from ${name(state, pad.sourceAccount)} is never used by a balance assertion`,
        { date: pad.date, account: name(state, pad.account) }
    );
}

/**
 * Units of `currency` held by `account` and all of its descendants.
 */
function heldWithin(state: WalkState, account: Account, currency: Currency): Decimal {
    let total = new Decimal(0);
    for (const [key, inventory] of state.inventories) {
        const held = state.accounts.get(key);
        if (held !== undefined && isWithin(held, account)) {
            total = total.plus(unitsOf(inventory, currency));
        }
    }
    return total;
}

/**
 * Padding transaction moving `difference` from the pad's source into its account.
 */
function paddingTransaction(pad: Pad, difference: Amount, balance: Balance): Transaction {
    const asserted = `${balance.amount.num} ${balance.amount.currency}`;
    return createTransaction({
        date: pad.date,
        flag: FLAGS.PADDING,
        narration: `(Padding inserted for Balance of ${asserted} for difference ${difference.num} ${difference.currency})`,
        postings: [
            createPosting({ account: pad.account, units: difference }),
            createPosting({ account: pad.sourceAccount }),
        ],
    });
}

function handleBalance(state: WalkState, balance: Balance): void {
    state.result.stats.balanceChecks++;
    const error = checkOpen(state, balance.account, balance.date);
    if (error !== undefined) {
        state.result.errors.push(error);
        return;
    }

    const { currency } = balance.amount;
    const expected = toDecimal(balance.amount.num);
    const actual = heldWithin(state, balance.account, currency);
    const difference = expected.minus(actual);
    const tolerance = balance.tolerance !== undefined
        ? toDecimal(balance.tolerance)
        : unitTolerance(balance.amount.num, state.options.tolerance.multiplier);

    const key = accountKey(balance.account);
    const pending = state.pads.get(key);
    const canPad = pending !== undefined && !pending.filled.has(currency);
    if (canPad) pending.filled.add(currency);

    if (difference.abs().lessThanOrEqualTo(tolerance)) return;

    if (canPad) {
        const units: Amount = { num: quantize(difference, decimalPlaces(balance.amount.num)), currency };
        const resolved = applyTransaction(state, paddingTransaction(pending.pad, units, balance));
        if (resolved !== undefined) {
            state.result.padding.push(resolved);
            state.result.stats.padding++;
        }
        return;
    }

    state.result.errors.push(new LedgerError(
        'BalanceMismatch',
        `Balance failed for ${name(state, balance.account)}: expected ${balance.amount.num} ${currency}, ` +
            `found ${fromDecimal(actual)} ${currency} (${fromDecimal(difference.abs())} too ${difference.isPositive() ? 'little' : 'much'})`,
        { date: balance.date, account: name(state, balance.account), currency, residual: fromDecimal(difference) }
    ));
}

function checkAnnotated(state: WalkState, account: Account, date: LedgerDate): void {
    const error = checkOpen(state, account, date);
    if (error !== undefined) state.result.errors.push(error);
}

function handle(state: WalkState, directive: DatedKind): void {
    switch (directive.type) {
        case 'open':
            handleOpen(state, directive);
            return;
        case 'close': {
            const error = checkOpen(state, directive.account, directive.date);
            if (error !== undefined) {
                state.result.errors.push(error);
                return;
            }
            const key = accountKey(directive.account);
            const pending = state.pads.get(key);
            if (pending !== undefined && pending.filled.size === 0) {
                state.result.warnings.push(unusedPad(state, pending.pad));
            }
            state.closed.set(key, directive.date);
            state.pads.delete(key);
            return;
        }
        case 'transaction': {
            const resolved = applyTransaction(state, directive);
            if (resolved !== undefined) {
                state.result.transactions.push(resolved);
                state.result.stats.transactions++;
            }
            return;
        }
        case 'pad':
            handlePad(state, directive);
            return;
        case 'balance':
            handleBalance(state, directive);
            return;
        case 'note':
        case 'document':
            checkAnnotated(state, directive.account, directive.date);
            return;
        case 'price':
            state.result.prices.push({
                date: directive.date,
                currency: directive.currency,
                amount: directive.amount,
                source: 'directive',
            });
            return;
        case 'commodity':
        case 'event':
        case 'query':
        case 'custom':
            return;
    }
}

// ============================================================================
// Entry Point
// ============================================================================

export interface ProcessOptions {
    /** Use these options instead of the ledger's option directives. */
    options?: LedgerOptions;
}

/**
 * Walk the ledger and collect everything a report needs.
 * Throws only for invalid option values; every other failure is collected.
 */
export function processLedger(ledger: Ledger, settings: ProcessOptions = {}): ProcessResult {
    const parsed = settings.options !== undefined
        ? { options: settings.options, warnings: [] }
        : parseLedgerOptions(getOptions(ledger));

    const dated = getDatedDirectives(ledger);
    const state: WalkState = {
        options: parsed.options,
        accounts: new Map(),
        opens: new Map(),
        closed: new Map(),
        bookings: new Map(),
        pads: new Map(),
        inventories: new Map(),
        result: {
            options: parsed.options,
            transactions: [],
            padding: [],
            inventories: new Map(),
            prices: [],
            errors: [],
            warnings: [...parsed.warnings],
            stats: { directives: dated.length, transactions: 0, rejected: 0, padding: 0, balanceChecks: 0 },
        },
    };

    for (const directive of dated) {
        handle(state, directive);
    }

    for (const { pad, filled } of state.pads.values()) {
        if (filled.size === 0) state.result.warnings.push(unusedPad(state, pad));
    }

    return { ...state.result, inventories: state.inventories };
}

