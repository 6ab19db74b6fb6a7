import type { Account, RootNames } from '../account/account.js';
import { formatAccount } from '../account/account.js';
import type { Amount } from '../primitives/amount.js';
import { formatAmount } from '../primitives/amount.js';
import type { Currency } from '../primitives/currency.js';
import type { LedgerDate } from '../primitives/date.js';
import type { DecimalString } from '../primitives/decimal.js';

/**
 * Tag on a transaction, written `#berlin-trip-2014`. Stored without the `#`.
 */
export type Tag = string;

/**
 * Link between related transactions, written `^invoice-2014-01`. Stored without the `^`.
 */
export type Link = string;

export type MetaValue =
    | { readonly kind: 'text'; readonly value: string }
    | { readonly kind: 'account'; readonly value: Account }
    | { readonly kind: 'date'; readonly value: LedgerDate }
    | { readonly kind: 'currency'; readonly value: Currency }
    | { readonly kind: 'tag'; readonly value: Tag }
    | { readonly kind: 'bool'; readonly value: boolean }
    | { readonly kind: 'amount'; readonly value: Amount }
    | { readonly kind: 'number'; readonly value: DecimalString };

/**
 * Metadata attached to a directive or posting. Keys are unique; order carries no meaning.
 */
export type Meta = Readonly<Record<string, MetaValue>>;

export const EMPTY_META: Meta = {};

export function formatMetaValue(value: MetaValue, rootNames?: RootNames): string {
    switch (value.kind) {
        case 'text':
            return JSON.stringify(value.value);
        case 'account':
            return formatAccount(value.value, rootNames);
        case 'date':
        case 'currency':
        case 'number':
            return value.value;
        case 'tag':
            return `#${value.value}`;
        case 'bool':
            return value.value ? 'TRUE' : 'FALSE';
        case 'amount':
            return formatAmount(value.value);
    }
}

/**
 * `key: value` lines, sorted by key, each prefixed with `indent`.
 */
export function formatMeta(meta: Meta, indent: string, rootNames?: RootNames): string[] {
    return Object.keys(meta)
        .sort()
        .map((key) => `${indent}${key}: ${formatMetaValue(meta[key], rootNames)}`);
}
