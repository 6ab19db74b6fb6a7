/**
 * Balance module: tolerance inference, transaction resolution and the inventory fold.
 */

export { DEFAULT_TOLERANCE_OPTIONS, unitTolerance, inferTolerances, toleranceFor } from './tolerance.js';
export type { ToleranceOptions } from './tolerance.js';
export { residuals, resolveTransaction, checkBalance, balanceTransaction, foldTransaction } from './transaction.js';
export type { BalanceContext, Inventories, TransactionStatus, ResolvedTransaction } from './types.js';
