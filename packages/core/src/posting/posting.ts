import type { Account, RootNames } from '../account/account.js';
import { formatAccount } from '../account/account.js';
import { LedgerError } from '../errors.js';
import { formatAmount, formatIncompleteAmount, type IncompleteAmount } from '../primitives/amount.js';
import { isNegativeDecimal } from '../primitives/decimal.js';
import { formatCost, formatCostSpec, type CostSpec } from '../position/cost.js';
import { EMPTY_META, formatMeta, type Meta } from './meta.js';
import type { Flag, Posting, PostingPrice, ResolvedPosting } from './types.js';

export interface PostingOptions {
    account: Account;
    /** Default: `{}`, the auto-balance posting. */
    units?: IncompleteAmount;
    cost?: CostSpec;
    price?: PostingPrice;
    flag?: Flag;
    meta?: Meta;
}

/**
 * Build a posting. Prices are unsigned; a negative one throws NegativeCostOrPrice.
 */
export function createPosting(options: PostingOptions): Posting {
    const { price } = options;
    if (price?.amount.num !== undefined && isNegativeDecimal(price.amount.num)) {
        throw new LedgerError(
            'NegativeCostOrPrice',
            `Price must not be negative: ${formatIncompleteAmount(price.amount)}`
        );
    }
    return {
        account: options.account,
        units: options.units ?? {},
        ...(options.cost !== undefined ? { cost: options.cost } : {}),
        ...(price !== undefined ? { price } : {}),
        ...(options.flag !== undefined ? { flag: options.flag } : {}),
        meta: options.meta ?? EMPTY_META,
    };
}

/**
 * True for the posting whose number is to be inferred.
 */
export function isAutoBalancePosting(posting: Posting): boolean {
    return posting.units.num === undefined;
}

function priceMarker(kind: PostingPrice['kind']): string {
    return kind === 'per_unit' ? '@' : '@@';
}

function postingLines(head: string[], meta: Meta, rootNames?: RootNames): string[] {
    return [`  ${head.join(' ')}`, ...formatMeta(meta, '    ', rootNames)];
}

/**
 * `  [flag ]Account  units {cost} @ price`, then any metadata lines.
 * The auto-balance posting renders as the account alone.
 */
export function formatPosting(posting: Posting, rootNames?: RootNames): string[] {
    const head: string[] = [];
    if (posting.flag !== undefined) head.push(posting.flag);
    head.push(formatAccount(posting.account, rootNames));
    if (posting.units.num !== undefined || posting.units.currency !== undefined) {
        head.push(` ${formatIncompleteAmount(posting.units)}`);
    }
    if (posting.cost !== undefined) head.push(formatCostSpec(posting.cost));
    if (posting.price !== undefined) {
        head.push(priceMarker(posting.price.kind), formatIncompleteAmount(posting.price.amount));
    }
    return postingLines(head, posting.meta, rootNames);
}

export function formatResolvedPosting(posting: ResolvedPosting, rootNames?: RootNames): string[] {
    const head: string[] = [];
    if (posting.flag !== undefined) head.push(posting.flag);
    head.push(formatAccount(posting.account, rootNames), ` ${formatAmount(posting.units)}`);
    if (posting.cost !== undefined) head.push(formatCost(posting.cost));
    if (posting.price !== undefined) {
        head.push(priceMarker(posting.price.kind), formatAmount(posting.price.amount));
    }
    return postingLines(head, posting.meta, rootNames);
}
