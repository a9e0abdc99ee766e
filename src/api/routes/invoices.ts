import { z } from 'zod';
import type { Services } from '../../services/container';
import type { ApiRequest, ApiResponse, RouteRegistrar } from '../../types/api';
import { validateParams } from '../middleware/validation';
import { successResponse } from '../response';
import { idParamSchema } from './params';

const invoiceNumberParamSchema = z.object({
  invoiceNumber: z.string().regex(/^INV-\d{8}-\d{6,}$/, 'Malformed invoice number')
});

export function registerInvoiceRoutes(router: RouteRegistrar, services: Pick<Services, 'invoices'>): void {
  const { invoices } = services;

  /**
   * GET /api/v1/orders/:id/invoice
   */
  router.get(
    '/api/v1/orders/:id/invoice',
    async (req: ApiRequest, res: ApiResponse) => {
      const { id } = idParamSchema.parse(req.params);
      const invoice = await invoices.getInvoiceForOrder(id);

      successResponse(res, invoice, 200, { requestId: req.requestId });
    },
    [validateParams(idParamSchema)]
  );

  /**
   * GET /api/v1/invoices/:invoiceNumber
   */
  router.get(
    '/api/v1/invoices/:invoiceNumber',
    async (req: ApiRequest, res: ApiResponse) => {
      const { invoiceNumber } = invoiceNumberParamSchema.parse(req.params);
      const invoice = await invoices.getInvoiceByNumber(invoiceNumber);

      successResponse(res, invoice, 200, { requestId: req.requestId });
    },
    [validateParams(invoiceNumberParamSchema)]
  );
}
