import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SqliteAdapter } from '../../db';
import type { AuditLogEntry, Discount, InventoryItem, Order, OrderItem } from '../../types/database';
import { InsufficientStockError, NotFoundError, ValidationError } from '../../utils/errors';
import { FIXED_NOW, seedReferenceData, seedStockedItem } from '../../__tests__/fixtures';
import { FailingDatabase, countRows, createTestDatabase, fixedClock, getAll } from '../../__tests__/helpers/mock-db';
import { createServices, type Services } from '../container';
import { InventoryService } from '../inventory/inventory.service';
import { OrderService } from './order.service';

describe('OrderService', () => {
  let adapter: SqliteAdapter;
  let services: Services;
  const clock = fixedClock(FIXED_NOW);

  beforeEach(async () => {
    adapter = await createTestDatabase();
    services = createServices(adapter, clock);
  });

  afterEach(() => {
    adapter.close();
  });

  describe('createOrder', () => {
    it('should persist a priced order with its items', async () => {
      const ids = await seedReferenceData(adapter);

      const { order, items } = await services.orders.createOrder({
        customer_name: 'Nadia',
        customer_category: 'STUDENT',
        discount_id: ids.discountId,
        tax_id: ids.taxId,
        items: [
          { menu_item_id: ids.menuItems.Latte, quantity: 2 },
          { menu_item_id: ids.menuItems.Croissant, quantity: 1 }
        ]
      });

      // 1180 subtotal, 10% = 118 off, 15% of 1062 = 159.3 -> 159
      expect(order).toMatchObject({
        customer_name: 'Nadia',
        customer_category: 'STUDENT',
        status: 'PENDING',
        subtotal_cents: 1180,
        discount_cents: 118,
        tax_cents: 159,
        total_cents: 1221,
        created_at: FIXED_NOW,
        updated_at: FIXED_NOW
      });
      expect(items).toEqual([
        {
          id: 1,
          order_id: order.id,
          menu_item_id: ids.menuItems.Latte,
          quantity: 2,
          unit_price_cents: 450,
          line_total_cents: 900
        },
        {
          id: 2,
          order_id: order.id,
          menu_item_id: ids.menuItems.Croissant,
          quantity: 1,
          unit_price_cents: 280,
          line_total_cents: 280
        }
      ]);

      const stored = await getAll<Order>(adapter, 'orders');
      expect(stored).toEqual([order]);
    });

    it('should draw down the recipe ingredients', async () => {
      const ids = await seedReferenceData(adapter);

      await services.orders.createOrder({
        items: [
          { menu_item_id: ids.menuItems.Latte, quantity: 2 },
          { menu_item_id: ids.menuItems.Croissant, quantity: 1 }
        ]
      });

      const stock = await getAll<InventoryItem>(adapter, 'inventory');
      expect(stock.map((s) => [s.ingredient_id, s.quantity])).toEqual([
        [ids.ingredients['Coffee Beans'], 4964],
        [ids.ingredients.Milk, 4600],
        [ids.ingredients.Butter, 1985]
      ]);
      expect(stock.every((s) => s.last_updated === FIXED_NOW)).toBe(true);
    });

    it('should append an ORDER_CREATED audit entry', async () => {
      const ids = await seedReferenceData(adapter);

      const { order } = await services.orders.createOrder({
        actor_id: 12,
        items: [{ menu_item_id: ids.menuItems.Espresso, quantity: 1 }]
      });

      const logs = await getAll<AuditLogEntry>(adapter, 'audit_logs');
      expect(logs).toEqual([
        {
          id: 1,
          actor_id: 12,
          action: 'ORDER_CREATED',
          entity_type: 'orders',
          entity_id: order.id,
          details: `Order ${order.id} created with 1 item(s)`,
          created_at: FIXED_NOW
        }
      ]);
    });

    it('should report ingredients that fall below their threshold', async () => {
      const { menuItemId, ingredientId } = await seedStockedItem(adapter, {
        stock: 10,
        perUnit: 4,
        minThreshold: 5
      });

      const { lowStock } = await services.orders.createOrder({
        items: [{ menu_item_id: menuItemId, quantity: 2 }]
      });

      expect(lowStock).toEqual([
        {
          ingredient_id: ingredientId,
          previous_quantity: 10,
          quantity_change: -8,
          new_quantity: 2,
          min_threshold: 5
        }
      ]);
    });

    it('should roll everything back when stock is insufficient', async () => {
      const { menuItemId } = await seedStockedItem(adapter, { stock: 10, perUnit: 4 });

      await expect(
        services.orders.createOrder({ items: [{ menu_item_id: menuItemId, quantity: 3 }] })
      ).rejects.toBeInstanceOf(InsufficientStockError);

      expect(await countRows(adapter, 'orders')).toBe(0);
      expect(await countRows(adapter, 'order_items')).toBe(0);
      expect(await countRows(adapter, 'audit_logs')).toBe(0);
      const [stock] = await getAll<InventoryItem>(adapter, 'inventory');
      expect(stock?.quantity).toBe(10);
    });

    it('should accept an order that a fractional recipe exactly exhausts', async () => {
      const { menuItemId } = await seedStockedItem(adapter, { stock: 0.3, perUnit: 0.1 });

      const { order } = await services.orders.createOrder({ items: [{ menu_item_id: menuItemId, quantity: 3 }] });

      expect(order.total_cents).toBe(1500);
      const [stock] = await getAll<InventoryItem>(adapter, 'inventory');
      expect(stock?.quantity).toBe(0);
    });

    it('should cap an oversized percent discount so the order totals zero', async () => {
      const ids = await seedReferenceData(adapter);
      const discount = await adapter.transaction((tx) =>
        tx.insert<Discount>('discounts', { name: 'Everything Free', type: 'PERCENT', value: 150, applies_to: 'GENERAL' })
      );

      const { order } = await services.orders.createOrder({
        discount_id: discount.id,
        tax_id: ids.taxId,
        items: [{ menu_item_id: ids.menuItems.Latte, quantity: 2 }]
      });

      expect(order).toMatchObject({ subtotal_cents: 900, discount_cents: 900, tax_cents: 0, total_cents: 0 });
    });

    it('should let stock go negative under the allow policy', async () => {
      const { menuItemId } = await seedStockedItem(adapter, { stock: 10, perUnit: 4 });
      const orders = new OrderService(adapter, clock, {
        inventory: new InventoryService(adapter, clock, { negativeStock: 'allow' })
      });

      await orders.createOrder({ items: [{ menu_item_id: menuItemId, quantity: 3 }] });

      const [stock] = await getAll<InventoryItem>(adapter, 'inventory');
      expect(stock?.quantity).toBe(-2);
    });

    it('should reject an unknown menu item without writing anything', async () => {
      await seedReferenceData(adapter);

      await expect(
        services.orders.createOrder({ items: [{ menu_item_id: 999, quantity: 1 }] })
      ).rejects.toBeInstanceOf(ValidationError);

      expect(await countRows(adapter, 'orders')).toBe(0);
    });

    it('should reject invalid input before opening a transaction', async () => {
      await expect(services.orders.createOrder({ items: [] })).rejects.toThrow('Invalid order');
    });

    it('should consume nothing for items without a recipe', async () => {
      const ids = await seedReferenceData(adapter);
      await adapter.transaction((tx) =>
        tx.execute('DELETE FROM menu_item_ingredients WHERE menu_item_id = ?', [ids.menuItems.Croissant])
      );

      const { lowStock } = await services.orders.createOrder({
        items: [{ menu_item_id: ids.menuItems.Croissant, quantity: 4 }]
      });

      expect(lowStock).toEqual([]);
      const stock = await getAll<InventoryItem>(adapter, 'inventory');
      expect(stock.map((s) => s.quantity)).toEqual([5000, 5000, 2000]);
    });
  });

  describe('reads', () => {
    it('should get an order by id', async () => {
      const ids = await seedReferenceData(adapter);
      const { order } = await services.orders.createOrder({
        items: [{ menu_item_id: ids.menuItems.Espresso, quantity: 1 }]
      });

      await expect(services.orders.getOrderById(order.id)).resolves.toEqual(order);
    });

    it('should throw NotFoundError for a missing order', async () => {
      await expect(services.orders.getOrderById(404)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should return items for an order', async () => {
      const ids = await seedReferenceData(adapter);
      const { order, items } = await services.orders.createOrder({
        items: [{ menu_item_id: ids.menuItems.Espresso, quantity: 3 }]
      });

      await expect(services.orders.getOrderItems(order.id)).resolves.toEqual(items);
    });

    it('should include payments and invoice in the details', async () => {
      const ids = await seedReferenceData(adapter);
      const { order } = await services.orders.createOrder({
        items: [{ menu_item_id: ids.menuItems.Espresso, quantity: 1 }]
      });

      const before = await services.orders.getOrderWithDetails(order.id);
      expect(before.payments).toEqual([]);
      expect(before.invoice).toBeNull();

      await services.payments.recordPayment({ order_id: order.id, amount_cents: 350, method: 'CASH' });

      const after = await services.orders.getOrderWithDetails(order.id);
      expect(after.order.status).toBe('PAID');
      expect(after.payments).toHaveLength(1);
      expect(after.invoice?.invoice_number).toBe('INV-20260128-000001');
    });

    it('should filter orders by status', async () => {
      const ids = await seedReferenceData(adapter);
      const first = await services.orders.createOrder({
        items: [{ menu_item_id: ids.menuItems.Espresso, quantity: 1 }]
      });
      await services.orders.createOrder({ items: [{ menu_item_id: ids.menuItems.Latte, quantity: 1 }] });
      await services.payments.recordPayment({
        order_id: first.order.id,
        amount_cents: first.order.total_cents,
        method: 'CARD'
      });

      const pending = await services.orders.searchOrders({ status: 'PENDING' });
      const all = await services.orders.searchOrders({ status: ['PENDING', 'PAID'] });

      expect(pending.orders.map((o) => o.id)).toEqual([2]);
      expect(all.orders.map((o) => o.id)).toEqual([2, 1]);
    });

    it('should count every match when returning one page', async () => {
      const ids = await seedReferenceData(adapter);
      for (let i = 0; i < 3; i++) {
        await services.orders.createOrder({ items: [{ menu_item_id: ids.menuItems.Espresso, quantity: 1 }] });
      }

      const page = await services.orders.searchOrders({ limit: 2, offset: 2 });

      expect(page.orders.map((o) => o.id)).toEqual([1]);
      expect(page.total).toBe(3);
    });

    it('should throw error on database failure', async () => {
      const failing = new OrderService(new FailingDatabase(), clock);

      await expect(failing.searchOrders()).rejects.toThrow('Failed to search orders: disk I/O error');
    });
  });
});
