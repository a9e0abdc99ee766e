import { z } from 'zod';
import type { Services } from '../../services/container';
import type { ApiRequest, ApiResponse, RouteRegistrar } from '../../types/api';
import { validateQuery } from '../middleware/validation';
import { successResponse } from '../response';

const menuQuerySchema = z.object({
  include_inactive: z.enum(['true', 'false']).default('false')
});

export function registerCatalogRoutes(router: RouteRegistrar, services: Pick<Services, 'catalog'>): void {
  const { catalog } = services;

  /**
   * GET /api/v1/menu-items
   * Active menu items by name; include_inactive=true lists all
   */
  router.get(
    '/api/v1/menu-items',
    async (req: ApiRequest, res: ApiResponse) => {
      const query = menuQuerySchema.parse(req.query);
      const items = await catalog.getMenuItems(query.include_inactive === 'false');

      successResponse(res, items, 200, { requestId: req.requestId });
    },
    [validateQuery(menuQuerySchema)]
  );

  router.get('/api/v1/discounts', async (req: ApiRequest, res: ApiResponse) => {
    const discounts = await catalog.getDiscounts();
    successResponse(res, discounts, 200, { requestId: req.requestId });
  });

  router.get('/api/v1/taxes', async (req: ApiRequest, res: ApiResponse) => {
    const taxes = await catalog.getTaxes();
    successResponse(res, taxes, 200, { requestId: req.requestId });
  });
}
