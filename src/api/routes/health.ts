import { config } from '../../config/env';
import type { PoolStats } from '../../db/types';
import type { RouteRegistrar } from '../../types/api';

export interface HealthProbe {
  ping(): Promise<boolean>;
  poolStats(): PoolStats;
}

export function registerHealthRoutes(router: RouteRegistrar, database: HealthProbe): void {
  router.get('/health', (_req, res) => {
    res.json({
      success: true,
      data: {
        status: 'ok',
        timestamp: new Date().toISOString(),
        uptime: process.uptime()
      }
    });
  });

  router.get('/ready', async (_req, res) => {
    const reachable = await database.ping();

    res.json(
      {
        success: reachable,
        data: {
          status: reachable ? 'ready' : 'unavailable',
          environment: config.server.nodeEnv,
          pool: database.poolStats()
        }
      },
      reachable ? 200 : 503
    );
  });
}
