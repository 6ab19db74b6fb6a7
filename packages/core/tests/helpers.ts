import { parseAccount, type Account } from '../src/account/account.js';
import { isLedgerError, type LedgerErrorCode } from '../src/errors.js';
import type { IncompleteAmount } from '../src/primitives/amount.js';
import { createCostSpec, type Cost, type CostSpecOptions } from '../src/position/cost.js';
import type { Position } from '../src/position/position.js';
import { createPosting, type PostingOptions } from '../src/posting/posting.js';
import type { Posting } from '../src/posting/types.js';

export function acct(name: string): Account {
    return parseAccount(name);
}

/**
 * "400.00 USD" → { num: '400.00', currency: 'USD' }; "USD" and "" leave parts out.
 */
export function units(text: string): IncompleteAmount {
    const [first, second] = text.split(' ');
    if (second !== undefined) return { num: first, currency: second };
    if (first === '') return {};
    return /^[A-Z]/.test(first) ? { currency: first } : { num: first };
}

/**
 * Posting on `account`; leave `amount` out for the auto-balance posting.
 */
export function post(
    account: string,
    amount?: string,
    extra: Omit<Partial<PostingOptions>, 'account' | 'units' | 'cost'> & { cost?: CostSpecOptions } = {}
): Posting {
    const { cost, ...rest } = extra;
    return createPosting({
        account: acct(account),
        ...(amount !== undefined ? { units: units(amount) } : {}),
        ...(cost !== undefined ? { cost: createCostSpec(cost) } : {}),
        ...rest,
    });
}

export function lot(num: string, currency: string, cost: Cost): Position {
    return { units: { num, currency }, cost };
}

/**
 * Code of the LedgerError `fn` throws; undefined when it throws nothing.
 */
export function thrownCode(fn: () => unknown): LedgerErrorCode | undefined {
    try {
        fn();
    } catch (error) {
        if (isLedgerError(error)) return error.code;
        throw error;
    }
    return undefined;
}
