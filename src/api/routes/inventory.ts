import type { Services } from '../../services/container';
import type { ApiRequest, ApiResponse, RouteRegistrar } from '../../types/api';
import { successResponse } from '../response';

export function registerInventoryRoutes(router: RouteRegistrar, services: Pick<Services, 'inventory'>): void {
  const { inventory } = services;

  /**
   * GET /api/v1/inventory
   * Stock level of every ingredient
   */
  router.get('/api/v1/inventory', async (req: ApiRequest, res: ApiResponse) => {
    const levels = await inventory.listInventory();
    successResponse(res, levels, 200, { requestId: req.requestId });
  });

  /**
   * GET /api/v1/inventory/low-stock
   * Ingredients below their minimum threshold
   */
  router.get('/api/v1/inventory/low-stock', async (req: ApiRequest, res: ApiResponse) => {
    const levels = await inventory.getLowStock();
    successResponse(res, levels, 200, { requestId: req.requestId });
  });
}
