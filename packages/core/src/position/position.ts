import type { Amount } from '../primitives/amount.js';
import { formatAmount } from '../primitives/amount.js';
import { formatCost, type Cost } from './cost.js';

/**
 * One lot held by an account: some units, optionally at a cost.
 */
export interface Position {
    readonly units: Amount;
    readonly cost?: Cost;
}

export function createPosition(units: Amount, cost?: Cost): Position {
    return cost !== undefined ? { units, cost } : { units };
}

export function formatPosition(position: Position): string {
    const units = formatAmount(position.units);
    return position.cost !== undefined ? `${units} ${formatCost(position.cost)}` : units;
}
