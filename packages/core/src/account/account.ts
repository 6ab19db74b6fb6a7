import { ACCOUNT_TYPES, DEFAULT_ROOT_NAMES } from '@plainbook/shared';
import { LedgerError } from '../errors.js';

export type AccountType = typeof ACCOUNT_TYPES[number];

/**
 * Root name per account type. A ledger may rename roots
 * ("Actifs" for Assets); the account type itself never changes.
 */
export type RootNames = Readonly<Record<AccountType, string>>;

/**
 * An account: its type plus the path components after the root.
 * `Assets:US:BofA:Checking` is { type: 'Assets', parts: ['US', 'BofA', 'Checking'] }.
 *
 * Accounts are flat values; the hierarchy is derived from their paths on demand.
 */
export interface Account {
    readonly type: AccountType;
    readonly parts: readonly string[];
}

export function createAccount(type: AccountType, parts: readonly string[] = []): Account {
    return { type, parts: [...parts] };
}

/**
 * Look up the account type whose root name is `root`.
 */
export function accountTypeOf(root: string, rootNames: RootNames = DEFAULT_ROOT_NAMES): AccountType | undefined {
    return ACCOUNT_TYPES.find((type) => rootNames[type] === root);
}

/**
 * Parse a colon-delimited account name.
 * The first segment must be one of the five root names; the rest are kept verbatim.
 * Throws InvalidAccountType otherwise.
 */
export function parseAccount(name: string, rootNames: RootNames = DEFAULT_ROOT_NAMES): Account {
    const [root, ...parts] = name.split(':');
    const type = accountTypeOf(root, rootNames);
    if (type === undefined) {
        throw new LedgerError(
            'InvalidAccountType',
            `Invalid account type "${root}" in account "${name}"`,
            { account: name }
        );
    }
    return { type, parts };
}

/**
 * Colon-joined full name, using the ledger's root names.
 */
export function formatAccount(account: Account, rootNames: RootNames = DEFAULT_ROOT_NAMES): string {
    return [rootNames[account.type], ...account.parts].join(':');
}

/**
 * Stable map key, independent of root renames.
 */
export function accountKey(account: Account): string {
    return formatAccount(account);
}

export function accountsEqual(a: Account, b: Account): boolean {
    return a.type === b.type &&
        a.parts.length === b.parts.length &&
        a.parts.every((part, i) => part === b.parts[i]);
}

/**
 * True iff `ancestor` is a proper prefix of `account` under the same root.
 */
export function isAncestor(ancestor: Account, account: Account): boolean {
    return ancestor.type === account.type &&
        ancestor.parts.length < account.parts.length &&
        ancestor.parts.every((part, i) => part === account.parts[i]);
}

export function isDescendant(account: Account, ancestor: Account): boolean {
    return isAncestor(ancestor, account);
}

/**
 * The account itself or one of its descendants.
 */
export function isWithin(account: Account, root: Account): boolean {
    return accountsEqual(account, root) || isAncestor(root, account);
}

/**
 * Parent account; undefined for a root.
 */
export function parentAccount(account: Account): Account | undefined {
    if (account.parts.length === 0) return undefined;
    return { type: account.type, parts: account.parts.slice(0, -1) };
}

/**
 * Last component of the name ("Checking" for Assets:US:BofA:Checking).
 */
export function accountLeaf(account: Account, rootNames: RootNames = DEFAULT_ROOT_NAMES): string {
    return account.parts.length > 0 ? account.parts[account.parts.length - 1] : rootNames[account.type];
}
