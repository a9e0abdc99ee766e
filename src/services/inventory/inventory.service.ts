import { config, type NegativeStockPolicy } from '../../config/env';
import type { DatabaseAdapter, TransactionContext } from '../../db/types';
import type { Id, InventoryItem } from '../../types/database';
import type { Clock } from '../../utils/datetime';
import { InsufficientStockError, NotFoundError, ValidationError } from '../../utils/errors';
import { createChildLogger } from '../../utils/logger';
import { BaseService } from '../base.service';
import { CatalogService } from '../catalog/catalog.service';

const log = createChildLogger({ module: 'inventory' });

// =============================================================================
// TYPES
// =============================================================================

export interface InventoryOptions {
  negativeStock?: NegativeStockPolicy;
  catalog?: CatalogService;
}

export interface StockLevel extends InventoryItem {
  ingredient_name: string;
  unit: string;
  min_threshold: number;
}

export interface StockMovement {
  ingredient_id: Id;
  previous_quantity: number;
  quantity_change: number;
  new_quantity: number;
  min_threshold: number;
}

export interface ConsumedItem {
  menu_item_id: Id;
  quantity: number;
}

export interface ConsumptionResult {
  movements: StockMovement[];
  lowStock: StockMovement[];
}

// Stock and recipe amounts are REAL; ledger arithmetic is kept to this many
// decimal places so 3 x 0.1 draws exactly 0.3
const QUANTITY_DECIMALS = 6;

export function roundQuantity(value: number): number {
  const scale = 10 ** QUANTITY_DECIMALS;
  return Math.round(value * scale) / scale;
}

const STOCK_LEVEL_SQL = `
  SELECT inv.id, inv.ingredient_id, inv.quantity, inv.last_updated,
         ing.name AS ingredient_name, ing.unit, ing.min_threshold
  FROM inventory inv
  JOIN ingredients ing ON ing.id = inv.ingredient_id`;

// =============================================================================
// SERVICE
// =============================================================================

export class InventoryService extends BaseService {
  private readonly negativeStock: NegativeStockPolicy;
  private readonly catalog: CatalogService;

  constructor(databaseAdapter?: DatabaseAdapter, clock?: Clock, options: InventoryOptions = {}) {
    super(databaseAdapter, clock);
    this.negativeStock = options.negativeStock ?? config.billing.negativeStock;
    this.catalog = options.catalog ?? new CatalogService(databaseAdapter, clock);
  }

  // ===========================================================================
  // LEDGER (runs inside the caller's transaction)
  // ===========================================================================

  /**
   * Reduce stock of one ingredient by `requested`, rounded to the ledger
   * precision
   */
  decrement(tx: TransactionContext, ingredientId: Id, requested: number): StockMovement {
    if (!Number.isFinite(requested) || requested < 0) {
      throw new ValidationError('Stock decrement must be a non-negative number', [
        { ingredient_id: ingredientId, amount: requested }
      ]);
    }
    const amount = roundQuantity(requested);

    const [current] = tx.query<StockLevel>(`${STOCK_LEVEL_SQL} WHERE inv.ingredient_id = ?`, [
      ingredientId
    ]);

    if (!current) {
      throw new NotFoundError('Inventory for ingredient', ingredientId);
    }

    const newQuantity = roundQuantity(current.quantity - amount);
    if (newQuantity < 0 && this.negativeStock === 'reject') {
      throw new InsufficientStockError(ingredientId, current.quantity, amount);
    }

    // The scope holds the write lock, so the row cannot change since the read
    tx.execute('UPDATE inventory SET quantity = ?, last_updated = ? WHERE ingredient_id = ?', [
      newQuantity,
      this.now(),
      ingredientId
    ]);

    return {
      ingredient_id: ingredientId,
      previous_quantity: current.quantity,
      quantity_change: -amount,
      new_quantity: newQuantity,
      min_threshold: current.min_threshold
    };
  }

  /**
   * Decrement every ingredient in the recipe of each item, scaled by quantity.
   * Menu items without a recipe consume nothing.
   */
  consumeForItems(tx: TransactionContext, items: ConsumedItem[]): ConsumptionResult {
    const movements: StockMovement[] = [];

    for (const item of items) {
      for (const line of this.catalog.getRecipe(tx, item.menu_item_id)) {
        movements.push(this.decrement(tx, line.ingredient_id, item.quantity * line.quantity_per_unit));
      }
    }

    const lowStock = movements.filter((m) => m.new_quantity < m.min_threshold);
    for (const movement of lowStock) {
      log.warn(
        {
          ingredientId: movement.ingredient_id,
          quantity: movement.new_quantity,
          minThreshold: movement.min_threshold
        },
        'Ingredient below minimum threshold'
      );
    }

    return { movements, lowStock };
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  async listInventory(): Promise<StockLevel[]> {
    const result = await this.db.query<StockLevel>(`${STOCK_LEVEL_SQL} ORDER BY ing.name ASC`);

    if (result.error) {
      throw new Error(`Failed to fetch inventory: ${result.error}`);
    }

    return result.data;
  }

  /**
   * Ingredients whose stock is below their minimum threshold
   */
  async getLowStock(): Promise<StockLevel[]> {
    const result = await this.db.query<StockLevel>(
      `${STOCK_LEVEL_SQL} WHERE inv.quantity < ing.min_threshold ORDER BY inv.quantity ASC`
    );

    if (result.error) {
      throw new Error(`Failed to fetch low stock: ${result.error}`);
    }

    return result.data;
  }

  async getStockLevel(ingredientId: Id): Promise<StockLevel> {
    const result = await this.db.query<StockLevel>(`${STOCK_LEVEL_SQL} WHERE inv.ingredient_id = ?`, [
      ingredientId
    ]);

    if (result.error) {
      throw new Error(`Failed to fetch stock level: ${result.error}`);
    }

    const [level] = result.data;
    if (!level) {
      throw new NotFoundError('Inventory for ingredient', ingredientId);
    }

    return level;
  }
}
