import type { Booking } from '../booking/method.js';
import type { Transaction } from '../directives/types.js';
import type { Inventory } from '../position/inventory.js';
import type { ResolvedPosting } from '../posting/types.js';
import type { ToleranceOptions } from './tolerance.js';

/**
 * Inventory per account, keyed by `accountKey`.
 */
export type Inventories = ReadonlyMap<string, Inventory>;

/**
 * Everything a transaction resolves against: the inventories held just before it,
 * each account's booking method and the tolerance settings.
 */
export interface BalanceContext {
    readonly inventories: Inventories;
    /** Booking method per account key, from the Open directives. */
    readonly bookings: ReadonlyMap<string, Booking>;
    /** Method for accounts with no entry in `bookings`. */
    readonly defaultBooking: Booking;
    readonly tolerance: ToleranceOptions;
}

/**
 * `resolved`: every posting is booked and the auto-balance amount is filled in.
 * `balanced`: the residual check passed as well.
 */
export type TransactionStatus = 'resolved' | 'balanced';

export interface ResolvedTransaction {
    readonly status: TransactionStatus;
    readonly transaction: Transaction;
    /** In posting order; a reduction spanning several lots contributes one posting per lot. */
    readonly postings: readonly ResolvedPosting[];
    /** Inventories of the accounts the transaction touches, after it applies. */
    readonly inventories: Inventories;
}
