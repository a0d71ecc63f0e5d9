// =============================================================================
// RAMPART — Audit repository (pg)
//
// Append-only. The audit_records trigger rejects UPDATE and DELETE; this
// class offers neither.
// =============================================================================

import type { AuditQuery, AuditRecord } from '../../types/audit';
import { AUDIT_DEFAULT_LIMIT, AUDIT_MAX_LIMIT } from '../../types/audit';
import type { AuditRepository } from '../../types/store';
import { toAuditRecord } from '../rows';
import { many, one, Query, wellFormed } from './query';

export class PgAuditRepository implements AuditRepository {
  constructor(private readonly run: Query) {}

  insert(record: AuditRecord): Promise<AuditRecord> {
    return one(
      this.run,
      {
        text: `INSERT INTO audit_records
                 (id, business_type, operation_type, target_type, target_id,
                  actor_id, actor_name, reason, request_id, ip,
                  before_state, after_state, metadata, tenant_id,
                  operated_at, event_hash)
               VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)
               RETURNING *`,
        values: [
          record.id,
          record.businessType,
          record.operationType,
          record.targetType,
          record.targetId,
          record.actorId,
          record.actorName,
          record.reason,
          record.requestId,
          record.ip,
          record.before === null ? null : JSON.stringify(record.before),
          record.after === null ? null : JSON.stringify(record.after),
          JSON.stringify(record.metadata),
          record.tenantId,
          record.operatedAt,
          record.eventHash,
        ],
      },
      toAuditRecord
    );
  }

  query(filter: AuditQuery): Promise<AuditRecord[]> {
    if (!wellFormed(filter.tenantId || null, filter.targetId || null, filter.actorId || null)) {
      return Promise.resolve([]);
    }
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filter.tenantId) {
      conditions.push(`tenant_id = $${paramIndex++}`);
      params.push(filter.tenantId);
    }
    if (filter.businessType) {
      conditions.push(`business_type = $${paramIndex++}`);
      params.push(filter.businessType);
    }
    if (filter.operationType) {
      conditions.push(`operation_type = $${paramIndex++}`);
      params.push(filter.operationType);
    }
    if (filter.targetId) {
      conditions.push(`target_id = $${paramIndex++}`);
      params.push(filter.targetId);
    }
    if (filter.actorId) {
      conditions.push(`actor_id = $${paramIndex++}`);
      params.push(filter.actorId);
    }
    if (filter.from) {
      conditions.push(`operated_at >= $${paramIndex++}`);
      params.push(filter.from);
    }
    if (filter.to) {
      conditions.push(`operated_at <= $${paramIndex++}`);
      params.push(filter.to);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = Math.min(filter.limit || AUDIT_DEFAULT_LIMIT, AUDIT_MAX_LIMIT);
    const offset = filter.offset || 0;
    params.push(limit, offset);

    return many(
      this.run,
      `SELECT * FROM audit_records
       ${where}
       ORDER BY operated_at DESC, id
       LIMIT $${paramIndex++} OFFSET $${paramIndex}`,
      params,
      toAuditRecord
    );
  }
}
