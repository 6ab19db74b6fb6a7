/**
 * Directive types.
 *
 * One variant per directive kind, discriminated on `type`. Consumers switch
 * over `type` exhaustively; there is no class hierarchy.
 */

import type { Account } from '../account/account.js';
import type { Booking } from '../booking/method.js';
import type { Amount } from '../primitives/amount.js';
import type { Currency } from '../primitives/currency.js';
import type { LedgerDate } from '../primitives/date.js';
import type { DecimalString } from '../primitives/decimal.js';
import type { Link, Meta, Tag } from '../posting/meta.js';
import type { Flag, Posting } from '../posting/types.js';

// ============================================================================
// Dated Directives
// ============================================================================

interface DatedDirective {
    readonly date: LedgerDate;
    readonly meta: Meta;
}

export interface Open extends DatedDirective {
    readonly type: 'open';
    readonly account: Account;
    /** Currencies the account may hold; empty allows any. */
    readonly currencies: readonly Currency[];
    /** Booking method for reductions; the ledger default applies when unset. */
    readonly booking?: Booking;
}

export interface Close extends DatedDirective {
    readonly type: 'close';
    readonly account: Account;
}

export interface Commodity extends DatedDirective {
    readonly type: 'commodity';
    readonly currency: Currency;
}

export interface Transaction extends DatedDirective {
    readonly type: 'transaction';
    readonly flag: Flag;
    readonly payee?: string;
    readonly narration: string;
    readonly tags: ReadonlySet<Tag>;
    readonly links: ReadonlySet<Link>;
    readonly postings: readonly Posting[];
}

/**
 * Assert the units of one currency an account (with its descendants) holds
 * at the start of the day.
 */
export interface Balance extends DatedDirective {
    readonly type: 'balance';
    readonly account: Account;
    readonly amount: Amount;
    /** Explicit tolerance; inferred from the amount's precision when unset. */
    readonly tolerance?: DecimalString;
}

/**
 * Fill `account` from `sourceAccount` so that its next balance assertion holds.
 */
export interface Pad extends DatedDirective {
    readonly type: 'pad';
    readonly account: Account;
    readonly sourceAccount: Account;
}

export interface Note extends DatedDirective {
    readonly type: 'note';
    readonly account: Account;
    readonly comment: string;
}

export interface Document extends DatedDirective {
    readonly type: 'document';
    readonly account: Account;
    readonly path: string;
}

/**
 * Price of one unit of `currency`, in `amount.currency`.
 */
export interface Price extends DatedDirective {
    readonly type: 'price';
    readonly currency: Currency;
    readonly amount: Amount;
}

export interface Event extends DatedDirective {
    readonly type: 'event';
    readonly name: string;
    readonly description: string;
}

export interface Query extends DatedDirective {
    readonly type: 'query';
    readonly name: string;
    readonly query: string;
}

export interface Custom extends DatedDirective {
    readonly type: 'custom';
    readonly name: string;
    readonly args: readonly string[];
}

// ============================================================================
// Undated Directives
// ============================================================================

export interface Include {
    readonly type: 'include';
    readonly filename: string;
}

export interface Option {
    readonly type: 'option';
    readonly name: string;
    readonly value: string;
}

export interface Plugin {
    readonly type: 'plugin';
    readonly module: string;
    readonly config?: string;
}

/**
 * Anything a producer recognized as a directive but this model does not cover.
 * Kept so that a ledger can be rendered back without losing it.
 */
export interface Unsupported {
    readonly type: 'unsupported';
    readonly text: string;
}

export type DatedDirectiveType = DatedKind['type'];

export type DatedKind =
    | Open
    | Close
    | Commodity
    | Transaction
    | Balance
    | Pad
    | Note
    | Document
    | Price
    | Event
    | Query
    | Custom;

export type UndatedKind = Include | Option | Plugin | Unsupported;

export type Directive = DatedKind | UndatedKind;

export type DirectiveType = Directive['type'];

export function isDated(directive: Directive): directive is DatedKind {
    return 'date' in directive;
}
