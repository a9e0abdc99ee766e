import type { TransactionContext } from '../../db/types';
import type { Discount, Id, MenuItem, RecipeLine, Tax } from '../../types/database';
import { BaseService } from '../base.service';
import type { CatalogSnapshot } from '../orders/order-builder';

export interface SnapshotRequest {
  menuItemIds: Id[];
  discountId?: Id | null;
  taxId?: Id | null;
}

/**
 * Read-only access to menu, recipe, discount and tax reference data.
 * Catalog maintenance lives outside the billing engine.
 */
export class CatalogService extends BaseService {
  /**
   * Resolve everything an order needs from the catalog inside the order's own
   * transaction, so prices and rules cannot change between lookup and commit.
   */
  resolveSnapshot(tx: TransactionContext, request: SnapshotRequest): CatalogSnapshot {
    const ids = [...new Set(request.menuItemIds)];
    const menuItems = tx.select<MenuItem>('menu_items', {
      where: [{ column: 'id', operator: 'in', value: ids }]
    });

    return {
      menuItems: new Map(menuItems.map((item) => [item.id, item])),
      discount: request.discountId ? tx.selectOne<Discount>('discounts', request.discountId) : null,
      tax: request.taxId ? tx.selectOne<Tax>('taxes', request.taxId) : null
    };
  }

  getRecipe(tx: TransactionContext, menuItemId: Id): RecipeLine[] {
    return tx.select<RecipeLine>('menu_item_ingredients', {
      where: [{ column: 'menu_item_id', operator: '=', value: menuItemId }],
      orderBy: [{ column: 'id', direction: 'asc' }]
    });
  }

  async getMenuItems(activeOnly = true): Promise<MenuItem[]> {
    const result = await this.db.select<MenuItem>('menu_items', {
      where: activeOnly ? [{ column: 'is_active', operator: '=', value: 1 }] : [],
      orderBy: [{ column: 'name', direction: 'asc' }]
    });

    if (result.error) {
      throw new Error(`Failed to fetch menu items: ${result.error}`);
    }

    return result.data;
  }

  async getDiscounts(): Promise<Discount[]> {
    const result = await this.db.select<Discount>('discounts', {
      orderBy: [{ column: 'name', direction: 'asc' }]
    });

    if (result.error) {
      throw new Error(`Failed to fetch discounts: ${result.error}`);
    }

    return result.data;
  }

  async getTaxes(): Promise<Tax[]> {
    const result = await this.db.select<Tax>('taxes', {
      orderBy: [{ column: 'name', direction: 'asc' }]
    });

    if (result.error) {
      throw new Error(`Failed to fetch taxes: ${result.error}`);
    }

    return result.data;
  }
}
