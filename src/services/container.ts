import type { DatabaseAdapter } from '../db/types';
import type { Clock } from '../utils/datetime';
import { AuditService } from './audit/audit.service';
import { CatalogService } from './catalog/catalog.service';
import { InventoryService } from './inventory/inventory.service';
import { InvoiceService } from './invoices/invoice.service';
import { OrderService } from './orders/order.service';
import { PaymentService } from './payments/payment.service';

export interface Services {
  catalog: CatalogService;
  inventory: InventoryService;
  audit: AuditService;
  invoices: InvoiceService;
  payments: PaymentService;
  orders: OrderService;
}

/**
 * Wire every service against one database adapter and clock
 */
export function createServices(databaseAdapter?: DatabaseAdapter, clock?: Clock): Services {
  const catalog = new CatalogService(databaseAdapter, clock);
  const inventory = new InventoryService(databaseAdapter, clock, { catalog });
  const audit = new AuditService(databaseAdapter, clock);
  const invoices = new InvoiceService(databaseAdapter, clock);
  const payments = new PaymentService(databaseAdapter, clock, { audit, invoices });
  const orders = new OrderService(databaseAdapter, clock, {
    catalog,
    inventory,
    audit,
    invoices,
    payments
  });

  return { catalog, inventory, audit, invoices, payments, orders };
}
