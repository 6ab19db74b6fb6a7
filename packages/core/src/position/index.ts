/**
 * Position module: costs, cost specs, lots and inventories.
 */

export {
    createCost,
    createCostSpec,
    isEmptyCostSpec,
    perUnitNumber,
    costMatchesSpec,
    costsEqual,
    compareCostDates,
    formatCost,
    formatCostSpec,
} from './cost.js';
export type { Cost, CostSpec, CostOptions, CostSpecOptions } from './cost.js';
export { createPosition, formatPosition } from './position.js';
export type { Position } from './position.js';
export {
    EMPTY_INVENTORY,
    addPosition,
    addPositions,
    lotsOf,
    unitsOf,
    inventoryBalance,
    isEmptyInventory,
} from './inventory.js';
export type { Inventory } from './inventory.js';
