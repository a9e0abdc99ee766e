import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { dispatch } from '../../__tests__/helpers/mock-router';
import { createTestApp, type TestApp } from '../../__tests__/helpers/test-app';

describe('Inventory Routes', () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(() => {
    app.adapter.close();
  });

  describe('GET /api/v1/inventory', () => {
    it('should list stock by ingredient name', async () => {
      const { statusCode, body } = await dispatch(app.router, { url: '/api/v1/inventory' });

      expect(statusCode).toBe(200);
      expect(body).toMatchObject({
        success: true,
        data: [
          { ingredient_name: 'Butter', quantity: 2000 },
          { ingredient_name: 'Coffee Beans', quantity: 5000 },
          { ingredient_name: 'Milk', quantity: 5000 }
        ]
      });
    });
  });

  describe('GET /api/v1/inventory/low-stock', () => {
    it('should list ingredients below threshold after orders draw them down', async () => {
      // 21 lattes use 4200 ml of milk, leaving 800 under the 1000 threshold
      await app.services.orders.createOrder({
        items: [{ menu_item_id: app.ids.menuItems.Latte, quantity: 21 }]
      });

      const { body } = await dispatch(app.router, { url: '/api/v1/inventory/low-stock' });

      expect(body).toEqual({
        success: true,
        data: [expect.objectContaining({ ingredient_name: 'Milk', quantity: 800, min_threshold: 1000 })],
        meta: expect.any(Object)
      });
    });
  });
});
