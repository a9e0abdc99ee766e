import { z } from 'zod';
import type { Services } from '../../services/container';
import { createOrderSchema } from '../../services/orders/order-builder';
import { CUSTOMER_CATEGORIES, ORDER_STATUSES } from '../../types/database';
import type { ApiRequest, ApiResponse, RouteRegistrar } from '../../types/api';
import { validateBody, validateParams, validateQuery } from '../middleware/validation';
import { paginatedResponse, successResponse } from '../response';
import { idParamSchema, paginationSchema } from './params';

// =============================================================================
// SCHEMAS
// =============================================================================

const orderBodySchema = createOrderSchema.omit({ actor_id: true });

const querySchema = paginationSchema.extend({
  status: z
    .union([z.enum(ORDER_STATUSES), z.array(z.enum(ORDER_STATUSES))])
    .optional(),
  customer_category: z.enum(CUSTOMER_CATEGORIES).optional(),
  from_date: z.string().datetime().optional(),
  to_date: z.string().datetime().optional()
});

// =============================================================================
// ROUTES
// =============================================================================

export function registerOrderRoutes(router: RouteRegistrar, services: Pick<Services, 'orders'>): void {
  const { orders } = services;

  /**
   * GET /api/v1/orders
   * List orders with filters
   */
  router.get(
    '/api/v1/orders',
    async (req: ApiRequest, res: ApiResponse) => {
      const query = querySchema.parse(req.query);
      const { orders: page, total } = await orders.searchOrders({
        status: query.status,
        customer_category: query.customer_category,
        from_date: query.from_date,
        to_date: query.to_date,
        limit: query.limit,
        offset: (query.page - 1) * query.limit
      });

      paginatedResponse(res, page, total, query.page, query.limit, {
        requestId: req.requestId
      });
    },
    [validateQuery(querySchema)]
  );

  /**
   * GET /api/v1/orders/:id
   * Order with items, payments and invoice
   */
  router.get(
    '/api/v1/orders/:id',
    async (req: ApiRequest, res: ApiResponse) => {
      const { id } = idParamSchema.parse(req.params);
      const details = await orders.getOrderWithDetails(id);

      successResponse(res, details, 200, { requestId: req.requestId });
    },
    [validateParams(idParamSchema)]
  );

  /**
   * GET /api/v1/orders/:id/items
   */
  router.get(
    '/api/v1/orders/:id/items',
    async (req: ApiRequest, res: ApiResponse) => {
      const { id } = idParamSchema.parse(req.params);
      await orders.getOrderById(id);
      const items = await orders.getOrderItems(id);

      successResponse(res, items, 200, { requestId: req.requestId });
    },
    [validateParams(idParamSchema)]
  );

  /**
   * POST /api/v1/orders
   * Create and price an order, drawing down inventory
   */
  router.post(
    '/api/v1/orders',
    async (req: ApiRequest, res: ApiResponse) => {
      const input = orderBodySchema.parse(req.body);

      const created = await orders.createOrder({ ...input, actor_id: req.actorId ?? null });

      successResponse(res, created, 201, { requestId: req.requestId });
    },
    [validateBody(orderBodySchema)]
  );
}
