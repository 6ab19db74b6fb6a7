/**
 * Currencies (commodities).
 *
 * A currency is any uppercase token: USD, CAD, MSFT, VACHR. There is no
 * built-in list; two currencies are the same iff their tokens are identical.
 */

import { CURRENCY_PATTERN } from '@plainbook/shared';
import { LedgerError } from '../errors.js';

export type Currency = string;

export function isCurrency(value: string): boolean {
    return CURRENCY_PATTERN.test(value);
}

export function parseCurrency(value: string): Currency {
    if (!isCurrency(value)) {
        throw new LedgerError('InvalidCurrency', `Invalid currency "${value}"`, { currency: value });
    }
    return value;
}
