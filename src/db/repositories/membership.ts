// =============================================================================
// RAMPART — Tenant membership repository (pg)
// =============================================================================

import type { TenantUser } from '../../types/grants';
import type { Patch, TenantUserRepository } from '../../types/store';
import { toTenantUser } from '../rows';
import { table } from '../sql';
import { insertOne, many, maybeOne, Query, updateOne, wellFormed } from './query';

const TENANT_USERS = table('tenant_users', {
  tenantId: 'tenant_id',
  userId: 'user_id',
  isPrimary: 'is_primary',
  isAssigned: 'is_assigned',
  expiresAt: 'expires_at',
});

export class PgTenantUserRepository implements TenantUserRepository {
  constructor(private readonly query: Query) {}

  find(tenantId: string, userId: string): Promise<TenantUser | null> {
    if (!wellFormed(tenantId, userId)) return Promise.resolve(null);
    return maybeOne(
      this.query,
      'SELECT * FROM tenant_users WHERE tenant_id = $1 AND user_id = $2 AND NOT is_deleted',
      [tenantId, userId],
      toTenantUser
    );
  }

  listByUser(userId: string): Promise<TenantUser[]> {
    if (!wellFormed(userId)) return Promise.resolve([]);
    return many(
      this.query,
      'SELECT * FROM tenant_users WHERE user_id = $1 AND NOT is_deleted ORDER BY created_at',
      [userId],
      toTenantUser
    );
  }

  lockPrimaries(userId: string): Promise<TenantUser[]> {
    if (!wellFormed(userId)) return Promise.resolve([]);
    return many(
      this.query,
      `SELECT * FROM tenant_users
       WHERE user_id = $1 AND is_primary AND NOT is_deleted
       FOR UPDATE`,
      [userId],
      toTenantUser
    );
  }

  async clearPrimary(userId: string, at: Date): Promise<number> {
    const rows = await this.query(
      `UPDATE tenant_users SET is_primary = false, updated_at = $2
       WHERE user_id = $1 AND is_primary AND NOT is_deleted
       RETURNING id`,
      [userId, at]
    );
    return rows.length;
  }

  insert(row: TenantUser): Promise<TenantUser> {
    return insertOne(this.query, TENANT_USERS, row, toTenantUser);
  }

  update(id: string, patch: Patch<TenantUser>): Promise<TenantUser> {
    return updateOne(this.query, TENANT_USERS, id, patch, toTenantUser);
  }
}
