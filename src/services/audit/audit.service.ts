import type { TransactionContext, WhereClause } from '../../db/types';
import type { AuditAction, AuditLogEntry, Id } from '../../types/database';
import { BaseService } from '../base.service';

// =============================================================================
// TYPES
// =============================================================================

export interface AppendAuditInput {
  actor_id?: Id | null;
  action: AuditAction;
  entity_type: string;
  entity_id?: Id | null;
  details?: string | null;
}

export interface AuditSearchInput {
  action?: AuditAction;
  entity_type?: string;
  entity_id?: Id;
  actor_id?: Id;
  limit?: number;
  offset?: number;
}

// =============================================================================
// SERVICE
// =============================================================================

export class AuditService extends BaseService {
  /**
   * Append an entry inside the caller's transaction. A failed append fails
   * the whole scope: an event is never committed without its audit record.
   */
  append(tx: TransactionContext, input: AppendAuditInput, createdAt = this.now()): AuditLogEntry {
    return tx.insert<AuditLogEntry>('audit_logs', {
      actor_id: input.actor_id ?? null,
      action: input.action,
      entity_type: input.entity_type,
      entity_id: input.entity_id ?? null,
      details: input.details ?? null,
      created_at: createdAt
    });
  }

  /**
   * Search audit logs with filters, newest first
   */
  async search(input: AuditSearchInput = {}): Promise<{ logs: AuditLogEntry[]; total: number }> {
    const where: WhereClause[] = [];

    if (input.action) {
      where.push({ column: 'action', operator: '=', value: input.action });
    }
    if (input.entity_type) {
      where.push({ column: 'entity_type', operator: '=', value: input.entity_type });
    }
    if (input.entity_id !== undefined) {
      where.push({ column: 'entity_id', operator: '=', value: input.entity_id });
    }
    if (input.actor_id !== undefined) {
      where.push({ column: 'actor_id', operator: '=', value: input.actor_id });
    }

    const result = await this.db.select<AuditLogEntry>('audit_logs', {
      where,
      orderBy: [{ column: 'id', direction: 'desc' }],
      limit: input.limit || 50,
      offset: input.offset || 0
    });

    if (result.error) {
      throw new Error(`Failed to search audit logs: ${result.error}`);
    }

    return {
      logs: result.data,
      total: result.count ?? result.data.length
    };
  }

  /**
   * Get audit logs for a specific entity, oldest first
   */
  async getEntityHistory(entityType: string, entityId: Id, limit = 50): Promise<AuditLogEntry[]> {
    const result = await this.db.select<AuditLogEntry>('audit_logs', {
      where: [
        { column: 'entity_type', operator: '=', value: entityType },
        { column: 'entity_id', operator: '=', value: entityId }
      ],
      orderBy: [{ column: 'id', direction: 'asc' }],
      limit
    });

    if (result.error) {
      throw new Error(`Failed to fetch entity history: ${result.error}`);
    }

    return result.data;
  }
}
