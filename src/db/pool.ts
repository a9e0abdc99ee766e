/**
 * SQLite Connection Pool
 *
 * Hands out better-sqlite3 connections to one caller at a time:
 * - Bounded number of open connections
 * - FIFO queue of callers waiting for a connection, each with a timeout
 * - Idle and lifetime limits, checked whenever a connection changes hands
 * - Explicit shutdown that rejects waiters and closes every connection
 *
 * An in-memory database exists only inside the connection that created it, so
 * `:memory:` pools hold exactly one connection that is never evicted.
 */

import Database from 'better-sqlite3';
import { ConnectionUnavailableError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import type { PoolStats } from './types';

const log = createChildLogger({ module: 'db-pool' });

export const IN_MEMORY_DB = ':memory:';

export interface PoolOptions {
  filename: string;
  max: number;
  acquireTimeoutMs: number;
  idleTimeoutMs: number; // 0 disables
  maxLifetimeMs: number; // 0 disables
  busyTimeoutMs?: number;
  now?: () => number;
}

export interface PooledConnection {
  readonly id: number;
  readonly db: Database.Database;
  readonly createdAt: number;
  releasedAt: number;
}

interface Waiter {
  resolve: (connection: PooledConnection) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class ConnectionPool {
  private idle: PooledConnection[] = [];
  private leased: Set<PooledConnection> = new Set();
  private waiters: Waiter[] = [];
  private closed = false;
  private nextId = 1;
  private readonly inMemory: boolean;
  private readonly max: number;
  private readonly now: () => number;

  constructor(private readonly options: PoolOptions) {
    this.inMemory = options.filename === IN_MEMORY_DB;
    this.max = this.inMemory ? 1 : options.max;
    this.now = options.now ?? Date.now;

    if (this.inMemory && options.max > 1) {
      log.warn({ requestedMax: options.max }, 'In-memory database limited to a single pooled connection');
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Lease a connection. Waits up to `acquireTimeoutMs` when every connection
   * is in use, then fails with ConnectionUnavailableError.
   */
  async acquire(): Promise<PooledConnection> {
    if (this.closed) {
      throw new ConnectionUnavailableError('Connection pool is closed');
    }

    const connection = this.takeIdle();
    if (connection) {
      this.leased.add(connection);
      return connection;
    }

    if (this.size() < this.max) {
      const created = this.open();
      this.leased.add(created);
      return created;
    }

    return new Promise<PooledConnection>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          log.warn(
            { timeoutMs: this.options.acquireTimeoutMs, ...this.stats() },
            'Timed out waiting for a database connection'
          );
          reject(
            new ConnectionUnavailableError(
              `Timed out after ${this.options.acquireTimeoutMs}ms waiting for a database connection`
            )
          );
        }, this.options.acquireTimeoutMs)
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Return a leased connection. Any transaction still open on it is rolled
   * back so the next holder starts in autocommit mode.
   */
  release(connection: PooledConnection): void {
    if (!this.leased.delete(connection)) {
      log.warn({ connectionId: connection.id }, 'Ignoring release of a connection that is not leased');
      return;
    }

    if (connection.db.inTransaction) {
      log.warn({ connectionId: connection.id }, 'Rolling back transaction left open on released connection');
      connection.db.exec('ROLLBACK');
    }

    if (this.closed) {
      this.destroy(connection);
      return;
    }

    connection.releasedAt = this.now();

    if (this.isExpired(connection)) {
      this.destroy(connection);
      this.serveWaiterWithNewConnection();
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      this.leased.add(connection);
      waiter.resolve(connection);
      return;
    }

    this.idle.push(connection);
  }

  /**
   * Run `work` on a leased connection, releasing it on every exit path
   */
  async use<T>(work: (db: Database.Database) => T): Promise<T> {
    const connection = await this.acquire();
    try {
      return work(connection.db);
    } finally {
      this.release(connection);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(new ConnectionUnavailableError('Connection pool is closed'));
    }
    this.waiters = [];

    for (const connection of this.idle) {
      this.destroy(connection);
    }
    this.idle = [];

    log.info({ leased: this.leased.size }, 'Connection pool closed');
  }

  stats(): PoolStats {
    return {
      max: this.max,
      total: this.size(),
      idle: this.idle.length,
      leased: this.leased.size,
      waiting: this.waiters.length
    };
  }

  private size(): number {
    return this.idle.length + this.leased.size;
  }

  private takeIdle(): PooledConnection | undefined {
    let connection = this.idle.pop();
    while (connection && this.isExpired(connection)) {
      this.destroy(connection);
      connection = this.idle.pop();
    }
    return connection;
  }

  private isExpired(connection: PooledConnection): boolean {
    if (this.inMemory) {
      return false;
    }
    const now = this.now();
    const { idleTimeoutMs, maxLifetimeMs } = this.options;
    if (maxLifetimeMs > 0 && now - connection.createdAt >= maxLifetimeMs) {
      return true;
    }
    return idleTimeoutMs > 0 && now - connection.releasedAt >= idleTimeoutMs;
  }

  private open(): PooledConnection {
    let db: Database.Database;
    try {
      db = new Database(this.options.filename, { timeout: this.options.busyTimeoutMs ?? 5000 });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new ConnectionUnavailableError(`Failed to open database connection: ${message}`);
    }

    db.pragma('foreign_keys = ON');
    if (!this.inMemory) {
      db.pragma('journal_mode = WAL');
    }

    const now = this.now();
    const connection: PooledConnection = { id: this.nextId++, db, createdAt: now, releasedAt: now };
    log.debug({ connectionId: connection.id, filename: this.options.filename }, 'Opened database connection');
    return connection;
  }

  private destroy(connection: PooledConnection): void {
    connection.db.close();
    log.debug({ connectionId: connection.id }, 'Closed database connection');
  }

  private serveWaiterWithNewConnection(): void {
    const waiter = this.waiters.shift();
    if (!waiter) {
      return;
    }
    clearTimeout(waiter.timer);
    try {
      const connection = this.open();
      this.leased.add(connection);
      waiter.resolve(connection);
    } catch (error) {
      waiter.reject(error instanceof Error ? error : new ConnectionUnavailableError());
    }
  }
}
