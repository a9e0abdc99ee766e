import { db } from '../db';
import type { DatabaseAdapter } from '../db/types';
import { type Clock, systemClock } from '../utils/datetime';

/**
 * Base service class that all services should extend
 * Provides common database access and the clock used for timestamps
 */
export abstract class BaseService {
  protected db: DatabaseAdapter;
  protected clock: Clock;

  constructor(databaseAdapter?: DatabaseAdapter, clock?: Clock) {
    this.db = databaseAdapter || db;
    this.clock = clock || systemClock;
  }

  /**
   * Current time as an ISO 8601 string
   */
  protected now(): string {
    return this.clock().toISOString();
  }
}
