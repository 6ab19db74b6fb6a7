/**
 * Directive builders.
 *
 * One `create<Kind>` per directive kind. Each takes an options object with the
 * required fields and the optional ones; defaults are applied and dates,
 * currencies and numbers are validated here, once. Invalid input throws LedgerError.
 */

import { FLAGS } from '@plainbook/shared';
import type { Account } from '../account/account.js';
import type { Booking } from '../booking/method.js';
import { LedgerError } from '../errors.js';
import type { Amount } from '../primitives/amount.js';
import { parseCurrency } from '../primitives/currency.js';
import { parseDate } from '../primitives/date.js';
import { isNegativeDecimal, parseDecimal } from '../primitives/decimal.js';
import { EMPTY_META, type Meta } from '../posting/meta.js';
import type { Flag, Posting } from '../posting/types.js';
import type {
    Balance,
    Close,
    Commodity,
    Custom,
    Document,
    Event,
    Include,
    Note,
    Open,
    Option,
    Pad,
    Plugin,
    Price,
    Query,
    Transaction,
    Unsupported,
} from './types.js';

interface DatedOptions {
    date: string;
    /** Default: `{}`. */
    meta?: Meta;
}

function dated(options: DatedOptions): { date: string; meta: Meta } {
    return { date: parseDate(options.date), meta: options.meta ?? EMPTY_META };
}

function validAmount(amount: Amount): Amount {
    return { num: parseDecimal(amount.num), currency: parseCurrency(amount.currency) };
}

function unmarked(value: string, prefix: '#' | '^'): string {
    return value.startsWith(prefix) ? value.slice(1) : value;
}

// ============================================================================
// Accounts and Commodities
// ============================================================================

export interface OpenOptions extends DatedOptions {
    account: Account;
    /** Default: `[]`, any currency. */
    currencies?: readonly string[];
    /** Default: unset; the ledger's booking method applies. */
    booking?: Booking;
}

export function createOpen(options: OpenOptions): Open {
    return {
        type: 'open',
        ...dated(options),
        account: options.account,
        currencies: (options.currencies ?? []).map(parseCurrency),
        ...(options.booking !== undefined ? { booking: options.booking } : {}),
    };
}

export interface CloseOptions extends DatedOptions {
    account: Account;
}

export function createClose(options: CloseOptions): Close {
    return { type: 'close', ...dated(options), account: options.account };
}

export interface CommodityOptions extends DatedOptions {
    currency: string;
}

export function createCommodity(options: CommodityOptions): Commodity {
    return { type: 'commodity', ...dated(options), currency: parseCurrency(options.currency) };
}

// ============================================================================
// Transactions
// ============================================================================

export interface TransactionOptions extends DatedOptions {
    /** Default: `*`. */
    flag?: Flag;
    payee?: string;
    /** Default: `""`. */
    narration?: string;
    /** Written with or without the leading `#`. Default: none. */
    tags?: Iterable<string>;
    /** Written with or without the leading `^`. Default: none. */
    links?: Iterable<string>;
    /** Default: `[]`. */
    postings?: readonly Posting[];
}

export function createTransaction(options: TransactionOptions): Transaction {
    return {
        type: 'transaction',
        ...dated(options),
        flag: options.flag ?? FLAGS.OKAY,
        ...(options.payee !== undefined ? { payee: options.payee } : {}),
        narration: options.narration ?? '',
        tags: new Set([...(options.tags ?? [])].map((tag) => unmarked(tag, '#'))),
        links: new Set([...(options.links ?? [])].map((link) => unmarked(link, '^'))),
        postings: [...(options.postings ?? [])],
    };
}

// ============================================================================
// Assertions and Pads
// ============================================================================

export interface BalanceOptions extends DatedOptions {
    account: Account;
    amount: Amount;
    /** Default: unset; inferred from the amount's precision. */
    tolerance?: string;
}

export function createBalance(options: BalanceOptions): Balance {
    let tolerance: string | undefined;
    if (options.tolerance !== undefined) {
        tolerance = parseDecimal(options.tolerance);
        if (isNegativeDecimal(tolerance)) {
            throw new LedgerError('InvalidDecimal', `Tolerance must not be negative: ${options.tolerance}`);
        }
    }
    return {
        type: 'balance',
        ...dated(options),
        account: options.account,
        amount: validAmount(options.amount),
        ...(tolerance !== undefined ? { tolerance } : {}),
    };
}

export interface PadOptions extends DatedOptions {
    account: Account;
    sourceAccount: Account;
}

export function createPad(options: PadOptions): Pad {
    return { type: 'pad', ...dated(options), account: options.account, sourceAccount: options.sourceAccount };
}

// ============================================================================
// Annotations
// ============================================================================

export interface NoteOptions extends DatedOptions {
    account: Account;
    comment: string;
}

export function createNote(options: NoteOptions): Note {
    return { type: 'note', ...dated(options), account: options.account, comment: options.comment };
}

export interface DocumentOptions extends DatedOptions {
    account: Account;
    path: string;
}

export function createDocument(options: DocumentOptions): Document {
    return { type: 'document', ...dated(options), account: options.account, path: options.path };
}

export interface PriceOptions extends DatedOptions {
    currency: string;
    amount: Amount;
}

export function createPrice(options: PriceOptions): Price {
    const amount = validAmount(options.amount);
    if (isNegativeDecimal(amount.num)) {
        throw new LedgerError('NegativeCostOrPrice', `Price must not be negative: ${amount.num} ${amount.currency}`);
    }
    return { type: 'price', ...dated(options), currency: parseCurrency(options.currency), amount };
}

export interface EventOptions extends DatedOptions {
    name: string;
    description: string;
}

export function createEvent(options: EventOptions): Event {
    return { type: 'event', ...dated(options), name: options.name, description: options.description };
}

export interface QueryOptions extends DatedOptions {
    name: string;
    query: string;
}

export function createQuery(options: QueryOptions): Query {
    return { type: 'query', ...dated(options), name: options.name, query: options.query };
}

export interface CustomOptions extends DatedOptions {
    name: string;
    /** Default: `[]`. */
    args?: readonly string[];
}

export function createCustom(options: CustomOptions): Custom {
    return { type: 'custom', ...dated(options), name: options.name, args: [...(options.args ?? [])] };
}

// ============================================================================
// Undated Directives
// ============================================================================

export function createInclude(options: { filename: string }): Include {
    return { type: 'include', filename: options.filename };
}

export function createOption(options: { name: string; value: string }): Option {
    return { type: 'option', name: options.name, value: options.value };
}

export function createPlugin(options: { module: string; config?: string }): Plugin {
    return {
        type: 'plugin',
        module: options.module,
        ...(options.config !== undefined ? { config: options.config } : {}),
    };
}

export function createUnsupported(options: { text: string }): Unsupported {
    return { type: 'unsupported', text: options.text };
}
