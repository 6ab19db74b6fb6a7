/**
 * The ledger: every directive, in canonical order.
 *
 * Dated directives sort by date, then by same-day priority: opens, then balance
 * assertions, then everything else, then documents and closes. Balance assertions
 * therefore see the state at the start of their day. Input order breaks the
 * remaining ties. Undated directives (include, option, plugin) are kept apart,
 * in input order, ahead of the dated ones.
 */

import { DIRECTIVE_PRIORITY } from '@plainbook/shared';
import type { RootNames } from '../account/account.js';
import { formatDirective } from '../directives/format.js';
import { isDated, type DatedKind, type Directive, type Option, type UndatedKind } from '../directives/types.js';
import { compareDates } from '../primitives/date.js';

export interface Ledger {
    /** Undated directives first, then dated ones in canonical order. */
    readonly directives: readonly Directive[];
}

/**
 * Canonical order of two dated directives; 0 when only input order can tell them apart.
 */
export function compareDirectives(a: DatedKind, b: DatedKind): number {
    return compareDates(a.date, b.date) || DIRECTIVE_PRIORITY[a.type] - DIRECTIVE_PRIORITY[b.type];
}

/**
 * Sort dated directives canonically. The sort is stable; the input is not modified.
 */
export function sortDirectives<T extends DatedKind>(directives: readonly T[]): T[] {
    return [...directives].sort(compareDirectives);
}

export function createLedger(directives: Iterable<Directive> = []): Ledger {
    const undated: UndatedKind[] = [];
    const dated: DatedKind[] = [];
    for (const directive of directives) {
        if (isDated(directive)) {
            dated.push(directive);
        } else {
            undated.push(directive);
        }
    }
    return { directives: [...undated, ...sortDirectives(dated)] };
}

/**
 * New ledger with `directives` added and the order re-established.
 */
export function addDirectives(ledger: Ledger, directives: Iterable<Directive>): Ledger {
    return createLedger([...ledger.directives, ...directives]);
}

export function getDatedDirectives(ledger: Ledger): DatedKind[] {
    return ledger.directives.filter(isDated);
}

export function getUndatedDirectives(ledger: Ledger): UndatedKind[] {
    return ledger.directives.filter((d): d is UndatedKind => !isDated(d));
}

export function getOptions(ledger: Ledger): Option[] {
    return ledger.directives.filter((d): d is Option => d.type === 'option');
}

/**
 * The whole ledger as text, one blank line between directives.
 */
export function formatLedger(ledger: Ledger, rootNames?: RootNames): string {
    if (ledger.directives.length === 0) return '';
    return `${ledger.directives.map((d) => formatDirective(d, rootNames)).join('\n\n')}\n`;
}
