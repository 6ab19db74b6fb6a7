import type { FLAG_VALUES } from '@plainbook/shared';
import type { Account } from '../account/account.js';
import type { Amount, IncompleteAmount } from '../primitives/amount.js';
import type { Cost, CostSpec } from '../position/cost.js';
import type { DecimalString } from '../primitives/decimal.js';
import type { Meta } from './meta.js';

/**
 * Transaction or posting flag: `*` okay, `!` warning, `P` padding, and so on.
 */
export type Flag = typeof FLAG_VALUES[number];

/**
 * `@` prices one unit, `@@` prices the whole posting.
 */
export type PriceKind = 'per_unit' | 'total';

export interface PostingPrice {
    readonly kind: PriceKind;
    readonly amount: IncompleteAmount;
}

/**
 * One line of a transaction, as written. `units` may be incomplete; a posting with
 * no number at all is the transaction's auto-balance posting.
 */
export interface Posting {
    readonly account: Account;
    readonly units: IncompleteAmount;
    readonly cost?: CostSpec;
    readonly price?: PostingPrice;
    readonly flag?: Flag;
    readonly meta: Meta;
}

export interface ResolvedPrice {
    readonly kind: PriceKind;
    readonly amount: Amount;
}

/**
 * A posting after booking and interpolation: complete units, a concrete cost
 * when held at cost, a complete price when priced.
 * A reduction spanning several lots becomes one resolved posting per lot.
 */
export interface ResolvedPosting {
    readonly account: Account;
    readonly units: Amount;
    readonly cost?: Cost;
    /** Unsigned total cost as written; weighs in place of units × cost. */
    readonly costTotal?: DecimalString;
    readonly price?: ResolvedPrice;
    readonly flag?: Flag;
    readonly meta: Meta;
}
