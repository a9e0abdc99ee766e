import { config } from '../config/env';
import { ConnectionPool, type PoolOptions } from './pool';
import { SCHEMA } from './schema';
import { SqliteAdapter } from './sqlite-adapter';

export * from './types';
export { ConnectionPool, IN_MEMORY_DB } from './pool';
export { SqliteAdapter } from './sqlite-adapter';

/**
 * Build an adapter over its own pool. Connections open lazily on first use.
 */
export function createDatabase(overrides: Partial<PoolOptions> = {}): SqliteAdapter {
  const pool = new ConnectionPool({
    filename: config.database.path,
    max: config.database.pool.max,
    acquireTimeoutMs: config.database.pool.acquireTimeoutMs,
    idleTimeoutMs: config.database.pool.idleTimeoutMs,
    maxLifetimeMs: config.database.pool.maxLifetimeMs,
    busyTimeoutMs: config.database.busyTimeoutMs,
    ...overrides
  });
  return new SqliteAdapter(pool);
}

export async function initializeSchema(adapter: SqliteAdapter): Promise<void> {
  await adapter.initSchema(SCHEMA);
}

export const db = createDatabase();
