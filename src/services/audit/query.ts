import type { AuditQuery, AuditRecord } from '../../types/audit';
import { ValidationError } from '../../errors';
import type { UnitOfWork } from '../unit-of-work';

/**
 * Query audit records, newest first. Read-only.
 */
export async function queryAuditRecords(uow: UnitOfWork, filter: AuditQuery): Promise<AuditRecord[]> {
  if (filter.limit !== undefined && (!Number.isInteger(filter.limit) || filter.limit < 1)) {
    throw new ValidationError('limit must be a positive integer');
  }
  if (filter.offset !== undefined && (!Number.isInteger(filter.offset) || filter.offset < 0)) {
    throw new ValidationError('offset must be a non-negative integer');
  }
  if (filter.from && filter.to && filter.from > filter.to) {
    throw new ValidationError('from must not be after to');
  }
  return uow.session.audit.query(filter);
}
