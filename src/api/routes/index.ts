import type { Services } from '../../services/container';
import type { RouteRegistrar } from '../../types/api';
import { registerAuditRoutes } from './audit';
import { registerCatalogRoutes } from './catalog';
import { registerHealthRoutes, type HealthProbe } from './health';
import { registerInventoryRoutes } from './inventory';
import { registerInvoiceRoutes } from './invoices';
import { registerOrderRoutes } from './orders';
import { registerPaymentRoutes } from './payments';

export function registerRoutes(router: RouteRegistrar, services: Services, database: HealthProbe): void {
  // Root level routes (health, readiness)
  registerHealthRoutes(router, database);

  // API v1 routes
  registerOrderRoutes(router, services);
  registerPaymentRoutes(router, services);
  registerInvoiceRoutes(router, services);
  registerInventoryRoutes(router, services);
  registerAuditRoutes(router, services);
  registerCatalogRoutes(router, services);
}
