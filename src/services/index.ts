/**
 * Service layer exports
 */

export * from './base.service';
export * from './pricing/pricing';
export * from './orders/order-builder';
export * from './orders/order.service';
export * from './catalog/catalog.service';
export * from './inventory/inventory.service';
export * from './invoices/invoice-number';
export * from './invoices/invoice.service';
export * from './payments/payment.service';
export * from './audit/audit.service';
export * from './container';
