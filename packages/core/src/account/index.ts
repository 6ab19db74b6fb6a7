/**
 * Account module: account types, names and hierarchy.
 */

export {
    createAccount,
    accountTypeOf,
    parseAccount,
    formatAccount,
    accountKey,
    accountsEqual,
    isAncestor,
    isDescendant,
    isWithin,
    parentAccount,
    accountLeaf,
} from './account.js';
export type { Account, AccountType, RootNames } from './account.js';
