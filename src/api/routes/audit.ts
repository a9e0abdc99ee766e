import { z } from 'zod';
import type { Services } from '../../services/container';
import { AUDIT_ACTIONS } from '../../types/database';
import type { ApiRequest, ApiResponse, RouteRegistrar } from '../../types/api';
import { validateQuery } from '../middleware/validation';
import { paginatedResponse } from '../response';
import { paginationSchema } from './params';

const querySchema = paginationSchema.extend({
  action: z.enum(AUDIT_ACTIONS).optional(),
  entity_type: z.string().min(1).optional(),
  entity_id: z.coerce.number().int().positive().optional(),
  actor_id: z.coerce.number().int().positive().optional()
});

export function registerAuditRoutes(router: RouteRegistrar, services: Pick<Services, 'audit'>): void {
  const { audit } = services;

  /**
   * GET /api/v1/audit-logs
   * Audit entries, newest first
   */
  router.get(
    '/api/v1/audit-logs',
    async (req: ApiRequest, res: ApiResponse) => {
      const query = querySchema.parse(req.query);

      const { logs, total } = await audit.search({
        action: query.action,
        entity_type: query.entity_type,
        entity_id: query.entity_id,
        actor_id: query.actor_id,
        limit: query.limit,
        offset: (query.page - 1) * query.limit
      });

      paginatedResponse(res, logs, total, query.page, query.limit, { requestId: req.requestId });
    },
    [validateQuery(querySchema)]
  );
}
