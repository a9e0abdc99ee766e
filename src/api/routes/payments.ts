import type { Services } from '../../services/container';
import { recordPaymentSchema } from '../../services/payments/payment.service';
import type { ApiRequest, ApiResponse, RouteRegistrar } from '../../types/api';
import { validateBody, validateParams } from '../middleware/validation';
import { successResponse } from '../response';
import { idParamSchema } from './params';

const paymentBodySchema = recordPaymentSchema.omit({ order_id: true, actor_id: true });

export function registerPaymentRoutes(
  router: RouteRegistrar,
  services: Pick<Services, 'orders' | 'payments'>
): void {
  const { orders, payments } = services;

  /**
   * POST /api/v1/orders/:id/payments
   * Record the payment and issue the invoice
   */
  router.post(
    '/api/v1/orders/:id/payments',
    async (req: ApiRequest, res: ApiResponse) => {
      const { id } = idParamSchema.parse(req.params);
      const input = paymentBodySchema.parse(req.body);

      const recorded = await payments.recordPayment({
        ...input,
        order_id: id,
        actor_id: req.actorId ?? null
      });

      successResponse(res, recorded, 201, { requestId: req.requestId });
    },
    [validateParams(idParamSchema), validateBody(paymentBodySchema)]
  );

  /**
   * GET /api/v1/orders/:id/payments
   */
  router.get(
    '/api/v1/orders/:id/payments',
    async (req: ApiRequest, res: ApiResponse) => {
      const { id } = idParamSchema.parse(req.params);
      await orders.getOrderById(id);
      const list = await payments.getPaymentsForOrder(id);

      successResponse(res, list, 200, { requestId: req.requestId });
    },
    [validateParams(idParamSchema)]
  );
}
