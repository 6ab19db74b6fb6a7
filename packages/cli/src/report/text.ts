import {
    formatAccount,
    formatPosition,
    isEmptyInventory,
    parseAccount,
    type Inventories,
    type LedgerStats,
    type RootNames,
} from '@plainbook/core';

/**
 * One block per account holding something: the account name, then its positions
 * indented below it. Accounts come in name order; emptied accounts are left out.
 */
export function formatHoldings(inventories: Inventories, rootNames: RootNames): string[] {
    const lines: string[] = [];
    const keys = [...inventories.keys()].sort();
    for (const key of keys) {
        const inventory = inventories.get(key);
        if (inventory === undefined || isEmptyInventory(inventory)) continue;

        lines.push(formatAccount(parseAccount(key), rootNames));
        for (const position of inventory) {
            lines.push(`  ${formatPosition(position)}`);
        }
    }
    return lines;
}

export function formatStats(stats: LedgerStats): string[] {
    return [
        `Directives:     ${stats.directives}`,
        `Transactions:   ${stats.transactions}`,
        `Rejected:       ${stats.rejected}`,
        `Padding:        ${stats.padding}`,
        `Balance checks: ${stats.balanceChecks}`,
    ];
}
