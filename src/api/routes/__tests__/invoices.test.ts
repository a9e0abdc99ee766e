import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { dispatch } from '../../__tests__/helpers/mock-router';
import { createTestApp, type TestApp } from '../../__tests__/helpers/test-app';

describe('Invoice Routes', () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp();
    await app.services.orders.createOrder({
      items: [{ menu_item_id: app.ids.menuItems.Espresso, quantity: 2 }]
    });
  });

  afterEach(() => {
    app.adapter.close();
  });

  it('should return 404 before the order is paid', async () => {
    const { statusCode, body } = await dispatch(app.router, { url: '/api/v1/orders/1/invoice' });

    expect(statusCode).toBe(404);
    expect(body).toMatchObject({ error: { message: "Invoice for order with id '1' not found" } });
  });

  it('should return the invoice of a paid order', async () => {
    await app.services.payments.recordPayment({ order_id: 1, amount_cents: 700, method: 'CASH' });

    const { statusCode, body } = await dispatch(app.router, { url: '/api/v1/orders/1/invoice' });

    expect(statusCode).toBe(200);
    expect(body).toMatchObject({
      data: { order_id: 1, invoice_number: 'INV-20260128-000001', total_cents: 700 }
    });
  });

  it('should look an invoice up by number', async () => {
    await app.services.payments.recordPayment({ order_id: 1, amount_cents: 700, method: 'CASH' });

    const { statusCode, body } = await dispatch(app.router, { url: '/api/v1/invoices/INV-20260128-000001' });

    expect(statusCode).toBe(200);
    expect(body).toMatchObject({ data: { order_id: 1 } });
  });

  it('should reject a malformed invoice number', async () => {
    const { statusCode } = await dispatch(app.router, { url: '/api/v1/invoices/12345' });

    expect(statusCode).toBe(400);
  });
});
