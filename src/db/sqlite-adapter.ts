import type Database from 'better-sqlite3';
import type { Id } from '../types/database';
import {
  ConnectionUnavailableError,
  ConstraintViolationError,
  NotFoundError,
  TransactionFailureError,
  isAppError
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import type { ConnectionPool } from './pool';
import type {
  DatabaseAdapter,
  ExecuteResult,
  PoolStats,
  QueryResult,
  SelectOptions,
  SingleResult,
  SqlValue,
  TransactionContext,
  WhereClause
} from './types';

const log = createChildLogger({ module: 'sqlite-adapter' });

// =============================================================================
// SQL BUILDING
// =============================================================================

function buildSqlWhere(where: WhereClause[]): { sql: string; params: SqlValue[] } {
  if (!where.length) {
    return { sql: '', params: [] };
  }

  const conditions: string[] = [];
  const params: SqlValue[] = [];

  for (const clause of where) {
    switch (clause.operator) {
      case 'in': {
        const values = Array.isArray(clause.value) ? clause.value : [clause.value];
        if (values.length === 0) {
          conditions.push('1 = 0');
          break;
        }
        conditions.push(`${clause.column} IN (${values.map(() => '?').join(', ')})`);
        params.push(...values.map(toSqlValue));
        break;
      }
      case 'is':
        if (clause.value === null) {
          conditions.push(`${clause.column} IS NULL`);
        } else {
          conditions.push(`${clause.column} IS ?`);
          params.push(toSqlValue(clause.value));
        }
        break;
      default:
        conditions.push(`${clause.column} ${clause.operator} ?`);
        params.push(toSqlValue(clause.value));
    }
  }

  return { sql: ` WHERE ${conditions.join(' AND ')}`, params };
}

export function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  throw new TypeError(`Unsupported SQL parameter type: ${typeof value}`);
}

function toColumns<T>(data: Partial<T>): { columns: string[]; values: SqlValue[] } {
  const columns: string[] = [];
  const values: SqlValue[] = [];
  for (const column in data) {
    const value = data[column];
    if (value === undefined) {
      continue;
    }
    columns.push(column);
    values.push(toSqlValue(value));
  }
  return { columns, values };
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

function isConstraintError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_CONSTRAINT')
  );
}

/**
 * Map store errors to the application's error taxonomy. Constraint failures
 * become ConstraintViolationError; other errors pass through unchanged.
 */
export function mapStoreError(error: unknown): unknown {
  if (isConstraintError(error)) {
    const constraint = error.code.replace(/^SQLITE_CONSTRAINT_?/, '').toLowerCase() || 'constraint';
    return new ConstraintViolationError(error.message, constraint);
  }
  return error;
}

function runMapped<T>(statement: () => T): T {
  try {
    return statement();
  } catch (error) {
    throw mapStoreError(error);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// =============================================================================
// STATEMENTS (shared by autocommit calls and transactional scopes)
// =============================================================================

function selectRows<T>(db: Database.Database, table: string, options: SelectOptions = {}): T[] {
  const columns = options.columns?.join(', ') ?? '*';
  let sql = `SELECT ${columns} FROM ${table}`;
  let params: SqlValue[] = [];

  if (options.where?.length) {
    const whereResult = buildSqlWhere(options.where);
    sql += whereResult.sql;
    params = whereResult.params;
  }

  if (options.orderBy?.length) {
    const orderClauses = options.orderBy.map((o) => `${o.column} ${o.direction.toUpperCase()}`);
    sql += ` ORDER BY ${orderClauses.join(', ')}`;
  }

  if (options.limit) {
    sql += ` LIMIT ${options.limit}`;
    if (options.offset) {
      sql += ` OFFSET ${options.offset}`;
    }
  } else if (options.offset) {
    sql += ` LIMIT -1 OFFSET ${options.offset}`;
  }

  return db.prepare(sql).all(...params) as T[];
}

function countRows(db: Database.Database, table: string, where: WhereClause[] = []): number {
  const whereResult = buildSqlWhere(where);
  const row = db
    .prepare(`SELECT COUNT(*) AS count FROM ${table}${whereResult.sql}`)
    .get(...whereResult.params) as { count: number };
  return row.count;
}

function selectById<T>(db: Database.Database, table: string, id: Id): T | null {
  const row = db.prepare(`SELECT * FROM ${table} WHERE id = ?`).get(id) as T | undefined;
  return row ?? null;
}

function insertRow<T>(db: Database.Database, table: string, data: Partial<T>): T {
  const { columns, values } = toColumns<T>(data);
  const sql = columns.length
    ? `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`
    : `INSERT INTO ${table} DEFAULT VALUES`;

  const info = runMapped(() => db.prepare(sql).run(...values));
  const inserted = selectById<T>(db, table, Number(info.lastInsertRowid));
  if (!inserted) {
    throw new Error(`Inserted row in ${table} could not be read back`);
  }
  return inserted;
}

function updateRow<T>(db: Database.Database, table: string, id: Id, data: Partial<T>): T {
  const { columns, values } = toColumns<T>(data);

  if (columns.length) {
    const setClauses = columns.map((col) => `${col} = ?`).join(', ');
    const info = runMapped(() =>
      db.prepare(`UPDATE ${table} SET ${setClauses} WHERE id = ?`).run(...values, id)
    );
    if (info.changes === 0) {
      throw new NotFoundError(table, id);
    }
  }

  const updated = selectById<T>(db, table, id);
  if (!updated) {
    throw new NotFoundError(table, id);
  }
  return updated;
}

function createTransactionContext(db: Database.Database): TransactionContext {
  return {
    select: <T>(table: string, options?: SelectOptions) => selectRows<T>(db, table, options),
    selectOne: <T>(table: string, id: Id) => selectById<T>(db, table, id),
    query: <T>(sql: string, params: unknown[] = []) =>
      db.prepare(sql).all(...params.map(toSqlValue)) as T[],
    insert: <T>(table: string, data: Partial<T>) => insertRow<T>(db, table, data),
    insertMany: <T>(table: string, rows: Partial<T>[]) => rows.map((row) => insertRow<T>(db, table, row)),
    update: <T>(table: string, id: Id, data: Partial<T>) => updateRow<T>(db, table, id, data),
    execute: (sql: string, params: unknown[] = []): ExecuteResult => {
      const info = runMapped(() => db.prepare(sql).run(...params.map(toSqlValue)));
      return { changes: info.changes };
    }
  };
}

// =============================================================================
// ADAPTER
// =============================================================================

export class SqliteAdapter implements DatabaseAdapter {
  constructor(private readonly pool: ConnectionPool) {}

  poolStats(): PoolStats {
    return this.pool.stats();
  }

  async select<T>(table: string, options: SelectOptions = {}): Promise<QueryResult<T>> {
    try {
      return await this.pool.use((db) => {
        const data = selectRows<T>(db, table, options);
        // Get count if needed
        const count =
          options.limit || options.offset ? countRows(db, table, options.where) : undefined;
        return { data, count };
      });
    } catch (error) {
      if (error instanceof ConnectionUnavailableError) {
        throw error;
      }
      return { data: [], error: errorMessage(error) };
    }
  }

  async selectOne<T>(table: string, id: Id): Promise<SingleResult<T>> {
    try {
      return await this.pool.use((db) => ({ data: selectById<T>(db, table, id) }));
    } catch (error) {
      if (error instanceof ConnectionUnavailableError) {
        throw error;
      }
      return { data: null, error: errorMessage(error) };
    }
  }

  async query<T>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    try {
      return await this.pool.use((db) => ({
        data: db.prepare(sql).all(...params.map(toSqlValue)) as T[]
      }));
    } catch (error) {
      if (error instanceof ConnectionUnavailableError) {
        throw error;
      }
      return { data: [], error: errorMessage(error) };
    }
  }

  /**
   * Run `work` as one all-or-nothing unit on its own pooled connection.
   *
   * The scope opens with BEGIN IMMEDIATE, taking the database write lock up
   * front, so no other writer can interleave with a read-then-write inside
   * it. `work` must be synchronous. When it throws, the scope is rolled back
   * before the error propagates: application errors keep their type,
   * constraint failures become ConstraintViolationError and anything else is
   * wrapped in TransactionFailureError.
   */
  async transaction<T>(work: (tx: TransactionContext) => T): Promise<T> {
    const connection = await this.pool.acquire();
    try {
      const tx = createTransactionContext(connection.db);
      return connection.db.transaction(() => work(tx)).immediate();
    } catch (error) {
      const mapped = mapStoreError(error);
      if (isAppError(mapped)) {
        throw mapped;
      }
      log.error({ error: mapped, connectionId: connection.id }, 'Transaction rolled back');
      throw new TransactionFailureError(`Transaction rolled back: ${errorMessage(mapped)}`, mapped);
    } finally {
      this.pool.release(connection);
    }
  }

  // Initialize database schema
  async initSchema(schema: string): Promise<void> {
    await this.pool.use((db) => db.exec(schema));
    log.info('Database schema initialized');
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.use((db) => db.prepare('SELECT 1').get());
      return true;
    } catch (error) {
      log.warn({ error }, 'Database ping failed');
      return false;
    }
  }

  close(): void {
    this.pool.close();
  }
}
