/**
 * Ledger dates.
 * A date is kept as its normalized YYYY-MM-DD string, which orders
 * lexically the same way it orders on the calendar.
 */

import { LedgerError } from '../errors.js';

export type LedgerDate = string;

const DATE_TEXT = /^(\d{4})[-/](\d{2})[-/](\d{2})$/;

/**
 * Parse YYYY-MM-DD or YYYY/MM/DD into the dashed form.
 * Rejects days that do not exist on the calendar (2023-02-29).
 */
export function parseDate(value: string): LedgerDate {
    const match = DATE_TEXT.exec(value.trim());
    if (!match) {
        throw new LedgerError('InvalidDate', `Invalid date "${value}": expected YYYY-MM-DD`);
    }

    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);

    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        throw new LedgerError('InvalidDate', `Invalid date "${value}": no such calendar day`);
    }

    return `${match[1]}-${match[2]}-${match[3]}`;
}

export function isLedgerDate(value: string): boolean {
    try {
        parseDate(value);
        return true;
    } catch {
        return false;
    }
}

/**
 * Format a JavaScript Date (UTC) as a ledger date.
 */
export function toLedgerDate(date: Date): LedgerDate {
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

export function compareDates(a: LedgerDate, b: LedgerDate): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}
