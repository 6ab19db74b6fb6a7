/**
 * Ledger options.
 *
 * `option "name" "value"` directives configure the whole ledger, whatever their
 * position in it. A repeated option keeps its last value, except
 * operating_currency, which accumulates.
 */

import { DEFAULT_ROOT_NAMES, KNOWN_OPTIONS, ROOT_NAME_OPTIONS, TOLERANCE } from '@plainbook/shared';
import type { AccountType, RootNames } from '../account/account.js';
import { DEFAULT_TOLERANCE_OPTIONS, type ToleranceOptions } from '../balance/tolerance.js';
import { DEFAULT_BOOKING, parseBooking, type Booking } from '../booking/method.js';
import type { Option } from '../directives/types.js';
import { LedgerError } from '../errors.js';
import { parseCurrency, type Currency } from '../primitives/currency.js';
import { isDecimalString, isNegativeDecimal, parseDecimal } from '../primitives/decimal.js';

export interface LedgerOptions {
    title?: string;
    operatingCurrencies: readonly Currency[];
    rootNames: RootNames;
    /** Booking method for accounts whose Open names none. */
    booking: Booking;
    tolerance: ToleranceOptions;
}

export const DEFAULT_LEDGER_OPTIONS: LedgerOptions = {
    operatingCurrencies: [],
    rootNames: DEFAULT_ROOT_NAMES,
    booking: DEFAULT_BOOKING,
    tolerance: DEFAULT_TOLERANCE_OPTIONS,
};

export interface ParsedOptions {
    options: LedgerOptions;
    /** UnknownOption warnings, one per unrecognized option directive. */
    warnings: LedgerError[];
}

function isKnownOption(name: string): boolean {
    return KNOWN_OPTIONS.some((known) => known === name);
}

function isRootNameOption(name: string): name is keyof typeof ROOT_NAME_OPTIONS {
    return Object.hasOwn(ROOT_NAME_OPTIONS, name);
}

function invalid(name: string, value: string, expected: string): LedgerError {
    return new LedgerError('InvalidOption', `Invalid value "${value}" for option "${name}": expected ${expected}`);
}

function unsignedOption(name: string, value: string): string {
    if (!isDecimalString(value.trim())) throw invalid(name, value, 'a decimal number');
    const parsed = parseDecimal(value);
    if (isNegativeDecimal(parsed)) throw invalid(name, value, 'a number not below zero');
    return parsed;
}

/**
 * `CUR:number`, or `*:number` for every currency.
 */
function parseToleranceDefault(value: string): [string, string] {
    const name = 'inferred_tolerance_default';
    const [currency, number, ...rest] = value.split(':');
    if (number === undefined || rest.length > 0) throw invalid(name, value, 'CURRENCY:NUMBER');
    const key = currency === TOLERANCE.WILDCARD_CURRENCY ? currency : parseCurrency(currency);
    return [key, unsignedOption(name, number)];
}

function parseFlag(name: string, value: string): boolean {
    const upper = value.toUpperCase();
    if (upper === 'TRUE') return true;
    if (upper === 'FALSE') return false;
    throw invalid(name, value, 'TRUE or FALSE');
}

/**
 * Fold option directives into LedgerOptions.
 * Invalid values throw; unknown names are reported as warnings and ignored.
 */
export function parseLedgerOptions(
    directives: Iterable<Option>,
    base: LedgerOptions = DEFAULT_LEDGER_OPTIONS
): ParsedOptions {
    let title = base.title;
    const operatingCurrencies = [...base.operatingCurrencies];
    const rootNames: Record<AccountType, string> = { ...base.rootNames };
    let booking = base.booking;
    let multiplier = base.tolerance.multiplier;
    const defaults = { ...base.tolerance.defaults };
    let inferFromCost = base.tolerance.inferFromCost;
    const warnings: LedgerError[] = [];

    for (const { name, value } of directives) {
        if (!isKnownOption(name)) {
            warnings.push(new LedgerError('UnknownOption', `Unknown option "${name}"`));
            continue;
        }

        if (isRootNameOption(name)) {
            if (!/^[^:\s]+$/.test(value)) throw invalid(name, value, 'a single account name component');
            rootNames[ROOT_NAME_OPTIONS[name]] = value;
            continue;
        }

        switch (name) {
            case 'title':
                title = value;
                break;
            case 'operating_currency':
                operatingCurrencies.push(parseCurrency(value));
                break;
            case 'booking_method':
                booking = parseBooking(value);
                break;
            case 'inferred_tolerance_multiplier':
                multiplier = unsignedOption(name, value);
                break;
            case 'inferred_tolerance_default': {
                const [currency, tolerance] = parseToleranceDefault(value);
                defaults[currency] = tolerance;
                break;
            }
            case 'infer_tolerance_from_cost':
                inferFromCost = parseFlag(name, value);
                break;
        }
    }

    return {
        options: {
            ...(title !== undefined ? { title } : {}),
            operatingCurrencies,
            rootNames,
            booking,
            tolerance: { ...base.tolerance, multiplier, defaults, inferFromCost },
        },
        warnings,
    };
}
