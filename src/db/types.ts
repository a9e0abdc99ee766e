// Database types for the SQLite store

import type { Id } from '../types/database';

export type SqlValue = string | number | bigint | null;

export interface QueryResult<T> {
  data: T[];
  count?: number;
  error?: string;
}

export interface SingleResult<T> {
  data: T | null;
  error?: string;
}

export interface SelectOptions {
  columns?: string[];
  where?: WhereClause[];
  orderBy?: OrderByClause[];
  limit?: number;
  offset?: number;
}

export interface WhereClause {
  column: string;
  operator: '=' | '!=' | '>' | '>=' | '<' | '<=' | 'in' | 'is';
  value: unknown;
}

export interface OrderByClause {
  column: string;
  direction: 'asc' | 'desc';
}

export interface ExecuteResult {
  changes: number;
}

/**
 * Statements bound to one open transaction. Every method runs synchronously on
 * the connection that owns the scope and throws on failure, which rolls the
 * whole scope back.
 */
export interface TransactionContext {
  select<T>(table: string, options?: SelectOptions): T[];
  selectOne<T>(table: string, id: Id): T | null;
  query<T>(sql: string, params?: unknown[]): T[];
  insert<T>(table: string, data: Partial<T>): T;
  insertMany<T>(table: string, rows: Partial<T>[]): T[];
  update<T>(table: string, id: Id, data: Partial<T>): T;
  execute(sql: string, params?: unknown[]): ExecuteResult;
}

export interface DatabaseAdapter {
  // Query operations (autocommit, one pooled connection per call)
  select<T>(table: string, options?: SelectOptions): Promise<QueryResult<T>>;
  selectOne<T>(table: string, id: Id): Promise<SingleResult<T>>;
  query<T>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;

  // Transaction support
  transaction<T>(work: (tx: TransactionContext) => T): Promise<T>;
}

export interface PoolStats {
  max: number;
  total: number;
  idle: number;
  leased: number;
  waiting: number;
}
