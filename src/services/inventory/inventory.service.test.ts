import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SqliteAdapter } from '../../db';
import type { InventoryItem } from '../../types/database';
import { InsufficientStockError, NotFoundError, ValidationError } from '../../utils/errors';
import { FIXED_NOW, seedReferenceData, seedStockedItem } from '../../__tests__/fixtures';
import { FailingDatabase, createTestDatabase, fixedClock, getAll } from '../../__tests__/helpers/mock-db';
import { InventoryService, roundQuantity } from './inventory.service';

describe('InventoryService', () => {
  let adapter: SqliteAdapter;
  let service: InventoryService;
  const clock = fixedClock(FIXED_NOW);

  beforeEach(async () => {
    adapter = await createTestDatabase();
    service = new InventoryService(adapter, clock, { negativeStock: 'reject' });
  });

  afterEach(() => {
    adapter.close();
  });

  describe('decrement', () => {
    it('should reduce the quantity and report the movement', async () => {
      const { ingredientId } = await seedStockedItem(adapter, { stock: 100, perUnit: 1, minThreshold: 20 });

      const movement = await adapter.transaction((tx) => service.decrement(tx, ingredientId, 30));

      expect(movement).toEqual({
        ingredient_id: ingredientId,
        previous_quantity: 100,
        quantity_change: -30,
        new_quantity: 70,
        min_threshold: 20
      });
      const [stock] = await getAll<InventoryItem>(adapter, 'inventory');
      expect(stock).toMatchObject({ quantity: 70, last_updated: FIXED_NOW });
    });

    it('should allow drawing stock down to exactly zero', async () => {
      const { ingredientId } = await seedStockedItem(adapter, { stock: 8, perUnit: 1 });

      const movement = await adapter.transaction((tx) => service.decrement(tx, ingredientId, 8));

      expect(movement.new_quantity).toBe(0);
    });

    it('should reject a decrement below zero', async () => {
      const { ingredientId } = await seedStockedItem(adapter, { stock: 5, perUnit: 1 });

      const work = adapter.transaction((tx) => service.decrement(tx, ingredientId, 6));

      await expect(work).rejects.toBeInstanceOf(InsufficientStockError);
      await expect(work).rejects.toMatchObject({
        code: 'INSUFFICIENT_STOCK',
        ingredientId,
        available: 5,
        requested: 6
      });
    });

    it('should throw NotFoundError for an ingredient without stock', async () => {
      await expect(adapter.transaction((tx) => service.decrement(tx, 77, 1))).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('should reject a negative amount', async () => {
      const { ingredientId } = await seedStockedItem(adapter, { stock: 5, perUnit: 1 });

      await expect(
        adapter.transaction((tx) => service.decrement(tx, ingredientId, -1))
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('consumeForItems', () => {
    it('should scale every recipe line by the item quantity', async () => {
      const ids = await seedReferenceData(adapter);

      const { movements, lowStock } = await adapter.transaction((tx) =>
        service.consumeForItems(tx, [
          { menu_item_id: ids.menuItems.Latte, quantity: 3 },
          { menu_item_id: ids.menuItems.Espresso, quantity: 2 }
        ])
      );

      expect(movements.map((m) => [m.ingredient_id, m.quantity_change])).toEqual([
        [ids.ingredients['Coffee Beans'], -54],
        [ids.ingredients.Milk, -600],
        [ids.ingredients['Coffee Beans'], -36]
      ]);
      expect(lowStock).toEqual([]);
      const levels = await service.listInventory();
      expect(levels.find((l) => l.ingredient_name === 'Coffee Beans')?.quantity).toBe(4910);
    });

    it('should draw a fractional recipe down to exactly the stock on hand', async () => {
      const { menuItemId } = await seedStockedItem(adapter, { stock: 0.3, perUnit: 0.1 });

      const { movements } = await adapter.transaction((tx) =>
        service.consumeForItems(tx, [{ menu_item_id: menuItemId, quantity: 3 }])
      );

      expect(movements).toMatchObject([{ previous_quantity: 0.3, quantity_change: -0.3, new_quantity: 0 }]);
      const [stock] = await getAll<InventoryItem>(adapter, 'inventory');
      expect(stock?.quantity).toBe(0);
    });

    it('should store fractional remainders without drift', async () => {
      const { menuItemId } = await seedStockedItem(adapter, { stock: 1, perUnit: 0.1 });

      await adapter.transaction((tx) => service.consumeForItems(tx, [{ menu_item_id: menuItemId, quantity: 7 }]));

      const [stock] = await getAll<InventoryItem>(adapter, 'inventory');
      expect(stock?.quantity).toBe(0.3);
    });
  });

  describe('roundQuantity', () => {
    it('should round to six decimal places', () => {
      expect(roundQuantity(3 * 0.1)).toBe(0.3);
      expect(roundQuantity(1.23456789)).toBe(1.234568);
    });
  });

  describe('reads', () => {
    it('should list stock with ingredient details', async () => {
      await seedReferenceData(adapter);

      const levels = await service.listInventory();

      expect(levels.map((l) => [l.ingredient_name, l.unit, l.quantity, l.min_threshold])).toEqual([
        ['Butter', 'g', 2000, 500],
        ['Coffee Beans', 'g', 5000, 500],
        ['Milk', 'ml', 5000, 1000]
      ]);
    });

    it('should list only ingredients below their threshold', async () => {
      const { ingredientId } = await seedStockedItem(adapter, { stock: 3, perUnit: 1, minThreshold: 10 });

      const low = await service.getLowStock();

      expect(low).toEqual([
        {
          id: 1,
          ingredient_id: ingredientId,
          quantity: 3,
          last_updated: FIXED_NOW,
          ingredient_name: 'Cocoa',
          unit: 'g',
          min_threshold: 10
        }
      ]);
    });

    it('should get the stock level of one ingredient', async () => {
      const { ingredientId } = await seedStockedItem(adapter, { stock: 12, perUnit: 1 });

      await expect(service.getStockLevel(ingredientId)).resolves.toMatchObject({ quantity: 12 });
      await expect(service.getStockLevel(99)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should throw error on database failure', async () => {
      const failing = new InventoryService(new FailingDatabase(), clock, { negativeStock: 'reject' });

      await expect(failing.listInventory()).rejects.toThrow('Failed to fetch inventory');
      await expect(failing.getLowStock()).rejects.toThrow('Failed to fetch low stock');
    });
  });
});
