/**
 * Transaction balancer.
 *
 * Unresolved (as written) → resolved (booked, auto-balance amount inferred)
 * → balanced (every currency's residual within tolerance). A failure at any
 * step rejects the whole transaction; the input inventories are never touched.
 */

import Decimal from 'decimal.js';
import { accountKey, formatAccount } from '../account/account.js';
import { DEFAULT_BOOKING, type Booking } from '../booking/method.js';
import { bookPosting } from '../booking/resolve.js';
import type { Transaction } from '../directives/types.js';
import { LedgerError, fail, ok, type ErrorContext, type Result } from '../errors.js';
import type { Amount } from '../primitives/amount.js';
import type { Currency } from '../primitives/currency.js';
import type { LedgerDate } from '../primitives/date.js';
import { decimalPlaces, fromDecimal, isNegativeDecimal, quantize } from '../primitives/decimal.js';
import { createCostSpec } from '../position/cost.js';
import { addPosition, EMPTY_INVENTORY, lotsOf, type Inventory } from '../position/inventory.js';
import { isAutoBalancePosting } from '../posting/posting.js';
import type { Posting, ResolvedPosting, ResolvedPrice } from '../posting/types.js';
import { computeWeight } from '../posting/weight.js';
import { DEFAULT_TOLERANCE_OPTIONS, inferTolerances, toleranceFor, type ToleranceOptions } from './tolerance.js';
import type { BalanceContext, Inventories, ResolvedTransaction } from './types.js';

const DEFAULT_CONTEXT: BalanceContext = {
    inventories: new Map(),
    bookings: new Map(),
    defaultBooking: DEFAULT_BOOKING,
    tolerance: DEFAULT_TOLERANCE_OPTIONS,
};

interface PostingResolution {
    postings: ResolvedPosting[];
    inventory: Inventory;
}

// ============================================================================
// Helpers
// ============================================================================

function attribution(transaction: Transaction, posting: Posting, index: number): ErrorContext {
    return { date: transaction.date, account: formatAccount(posting.account), postingIndex: index };
}

function annotations(posting: Posting): Pick<ResolvedPosting, 'flag' | 'meta'> {
    return posting.flag !== undefined ? { flag: posting.flag, meta: posting.meta } : { meta: posting.meta };
}

function resolvePrice(posting: Posting): Result<ResolvedPrice | undefined> {
    const { price } = posting;
    if (price === undefined) return ok(undefined);
    const { num, currency } = price.amount;
    if (num === undefined || currency === undefined) {
        return fail(new LedgerError('IncompleteConversion', 'Price is missing its number or currency'));
    }
    return ok({ kind: price.kind, amount: { num, currency } });
}

/**
 * Negative units written without a cost still reduce the lots held at cost.
 */
function reducesHeldLots(inventory: Inventory, units: Amount): boolean {
    return isNegativeDecimal(units.num) && lotsOf(inventory, units.currency).length > 0;
}

/**
 * Book one posting that carries units against its account's inventory.
 */
function resolvePosting(posting: Posting, date: LedgerDate, inventory: Inventory, method: Booking): Result<PostingResolution> {
    const { num, currency } = posting.units;
    if (num === undefined || currency === undefined) {
        return fail(new LedgerError('IncompleteConversion', 'Posting units are missing their currency'));
    }
    const units: Amount = { num, currency };

    const price = resolvePrice(posting);
    if (!price.ok) return price;
    const priced = price.value !== undefined ? { price: price.value } : {};

    const spec = posting.cost ?? (reducesHeldLots(inventory, units) ? createCostSpec() : undefined);
    if (spec === undefined) {
        return ok({
            postings: [{ account: posting.account, units, ...priced, ...annotations(posting) }],
            inventory: addPosition(inventory, { units }),
        });
    }

    const booked = bookPosting(inventory, { units, spec, date }, method);
    if (!booked.ok) return booked;
    return ok({
        postings: booked.value.legs.map((leg) => ({
            account: posting.account,
            units: leg.units,
            cost: leg.cost,
            ...(leg.total !== undefined ? { costTotal: leg.total } : {}),
            ...priced,
            ...annotations(posting),
        })),
        inventory: booked.value.inventory,
    });
}

/**
 * Largest number of decimal places written for each currency, across units,
 * costs and prices. Used to round the inferred auto-balance amount.
 */
function writtenPrecision(postings: readonly Posting[]): Map<Currency, number> {
    const precision = new Map<Currency, number>();
    const note = (num: string | undefined, currency: Currency | undefined): void => {
        if (num === undefined || currency === undefined) return;
        precision.set(currency, Math.max(precision.get(currency) ?? 0, decimalPlaces(num)));
    };
    for (const posting of postings) {
        note(posting.units.num, posting.units.currency);
        note(posting.cost?.numberPer, posting.cost?.currency);
        note(posting.cost?.numberTotal, posting.cost?.currency);
        note(posting.price?.amount.num, posting.price?.amount.currency);
    }
    return precision;
}

/**
 * Signed sum of the postings' weights, per weight currency.
 */
export function residuals(postings: readonly ResolvedPosting[]): Result<Map<Currency, Decimal>> {
    const sums = new Map<Currency, Decimal>();
    for (const posting of postings) {
        const weight = computeWeight(posting);
        if (!weight.ok) return weight;
        const { num, currency } = weight.value;
        sums.set(currency, (sums.get(currency) ?? new Decimal(0)).plus(num));
    }
    return ok(sums);
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Book every posting and infer the auto-balance posting, if any.
 *
 * The auto-balance posting takes the negated residual of its currency. With no
 * currency written, the residual must be non-zero in exactly one currency.
 */
export function resolveTransaction(
    transaction: Transaction,
    context: Partial<BalanceContext> = {}
): Result<ResolvedTransaction> {
    const { inventories, bookings, defaultBooking } = { ...DEFAULT_CONTEXT, ...context };
    const { date, postings } = transaction;

    const autoIndexes = postings.flatMap((posting, i) => (isAutoBalancePosting(posting) ? [i] : []));
    if (autoIndexes.length > 1) {
        return fail(new LedgerError(
            'AmbiguousAutobalance',
            `${autoIndexes.length} postings have no amount; at most one can be inferred`,
            { date }
        ));
    }

    const working = new Map<string, Inventory>();
    const inventoryOf = (key: string): Inventory => working.get(key) ?? inventories.get(key) ?? EMPTY_INVENTORY;
    const resolved: ResolvedPosting[][] = postings.map(() => []);

    for (const [index, posting] of postings.entries()) {
        if (isAutoBalancePosting(posting)) continue;
        const key = accountKey(posting.account);
        const step = resolvePosting(posting, date, inventoryOf(key), bookings.get(key) ?? defaultBooking);
        if (!step.ok) return fail(step.error.withContext(attribution(transaction, posting, index)));
        working.set(key, step.value.inventory);
        resolved[index] = step.value.postings;
    }

    const sums = residuals(resolved.flat());
    if (!sums.ok) return fail(sums.error.withContext({ date }));

    const autoIndex = autoIndexes[0];
    const auto = autoIndex !== undefined ? postings[autoIndex] : undefined;
    if (autoIndex !== undefined && auto !== undefined) {
        const where = attribution(transaction, auto, autoIndex);
        if (auto.cost !== undefined || auto.price !== undefined) {
            return fail(new LedgerError(
                'AmbiguousAutobalance',
                'The posting with no amount cannot carry a cost or a price',
                where
            ));
        }

        const unbalanced = [...sums.value.entries()].filter(([, sum]) => !sum.isZero()).map(([currency]) => currency);
        const currency = auto.units.currency ?? (unbalanced.length === 1 ? unbalanced[0] : undefined);
        if (currency === undefined) {
            return fail(new LedgerError(
                'AmbiguousAutobalance',
                unbalanced.length === 0
                    ? 'Nothing to balance: the posting with no amount has no currency and the other postings net to zero'
                    : `Cannot infer the amount: ${unbalanced.sort().join(', ')} are all unbalanced`,
                where
            ));
        }

        const missing = (sums.value.get(currency) ?? new Decimal(0)).negated();
        const places = writtenPrecision(postings).get(currency);
        const units: Amount = { num: places !== undefined ? quantize(missing, places) : fromDecimal(missing), currency };
        const key = accountKey(auto.account);
        working.set(key, addPosition(inventoryOf(key), { units }));
        resolved[autoIndex] = [{ account: auto.account, units, ...annotations(auto) }];
    }

    const value: ResolvedTransaction = { status: 'resolved', transaction, postings: resolved.flat(), inventories: working };
    return ok(value);
}

// ============================================================================
// Balance Check
// ============================================================================

/**
 * Check that every currency's residual is within tolerance of zero.
 * Fails with UnbalancedTransaction naming the first currency (alphabetically) that is not.
 */
export function checkBalance(
    resolved: ResolvedTransaction,
    tolerances: ReadonlyMap<Currency, Decimal>,
    options: ToleranceOptions = DEFAULT_TOLERANCE_OPTIONS
): Result<ResolvedTransaction> {
    const { date } = resolved.transaction;
    const sums = residuals(resolved.postings);
    if (!sums.ok) return fail(sums.error.withContext({ date }));

    const currencies = [...sums.value.keys()].sort();
    for (const currency of currencies) {
        const residual = sums.value.get(currency) ?? new Decimal(0);
        const tolerance = toleranceFor(tolerances, currency, options);
        if (residual.abs().greaterThan(tolerance)) {
            return fail(new LedgerError(
                'UnbalancedTransaction',
                `Transaction does not balance: residual ${fromDecimal(residual)} ${currency} exceeds tolerance ${fromDecimal(tolerance)}`,
                { date, currency, residual: fromDecimal(residual) }
            ));
        }
    }
    const balanced: ResolvedTransaction = { ...resolved, status: 'balanced' };
    return ok(balanced);
}

/**
 * Resolve then check one transaction against the inventories held before it.
 */
export function balanceTransaction(
    transaction: Transaction,
    context: Partial<BalanceContext> = {}
): Result<ResolvedTransaction> {
    const tolerance = context.tolerance ?? DEFAULT_TOLERANCE_OPTIONS;
    const resolved = resolveTransaction(transaction, context);
    if (!resolved.ok) return resolved;
    return checkBalance(resolved.value, inferTolerances(transaction.postings, tolerance), tolerance);
}

// ============================================================================
// Inventory Fold
// ============================================================================

/**
 * Inventories after `resolved` applies. `inventories` must be the snapshot the
 * transaction was resolved against; the input map is left as it is.
 */
export function foldTransaction(inventories: Inventories, resolved: ResolvedTransaction): Inventories {
    const next = new Map(inventories);
    for (const [key, inventory] of resolved.inventories) {
        next.set(key, inventory);
    }
    return next;
}
