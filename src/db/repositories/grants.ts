// =============================================================================
// RAMPART — Grant repositories (pg)
//
// role_permissions and user_roles share their expiry and cascade statements;
// only the table and the grant-flag column differ.
// =============================================================================

import type { RolePermission, UserRole } from '../../types/grants';
import type {
  ExpiringGrantRepository,
  Patch,
  RolePermissionRepository,
  UserRoleRepository,
} from '../../types/store';
import type { Row } from '../rows';
import { toRolePermission, toUserRole } from '../rows';
import { table, TableMeta } from '../sql';
import { insertOne, many, maybeOne, Query, updateOne, wellFormed } from './query';

const GRANT_COLUMNS = {
  tenantId: 'tenant_id',
  effectiveFrom: 'effective_from',
  effectiveTo: 'effective_to',
  grantedBy: 'granted_by',
  grantedAt: 'granted_at',
  revokedBy: 'revoked_by',
  revokedAt: 'revoked_at',
  reason: 'reason',
};

const ROLE_PERMISSIONS = table('role_permissions', {
  ...GRANT_COLUMNS,
  roleId: 'role_id',
  permissionId: 'permission_id',
  isGranted: 'is_granted',
});

const USER_ROLES = table('user_roles', {
  ...GRANT_COLUMNS,
  userId: 'user_id',
  roleId: 'role_id',
  isAssigned: 'is_assigned',
});

/** Window predicate: effective_from <= $n AND $n < effective_to, null bounds open */
function coversAt(param: string): string {
  return `(effective_from IS NULL OR effective_from <= ${param})
      AND (effective_to IS NULL OR ${param} < effective_to)`;
}

abstract class PgGrantRepository<G extends object> implements ExpiringGrantRepository<G> {
  protected abstract readonly meta: TableMeta;
  protected abstract readonly flag: string;
  protected abstract map(row: Row): G;

  constructor(protected readonly query: Query) {}

  lockExpired(before: Date, limit: number): Promise<G[]> {
    return many(
      this.query,
      `SELECT * FROM ${this.meta.table}
       WHERE ${this.flag} AND NOT is_deleted
         AND effective_to IS NOT NULL AND effective_to <= $1
       ORDER BY effective_to, id
       LIMIT $2
       FOR UPDATE SKIP LOCKED`,
      [before, limit],
      (row) => this.map(row)
    );
  }

  async markExpired(ids: string[], at: Date): Promise<number> {
    if (ids.length === 0) return 0;
    const rows = await this.query(
      `UPDATE ${this.meta.table}
       SET ${this.flag} = false, revoked_at = $2, revoked_by = NULL,
           reason = 'expired', updated_at = $2
       WHERE id = ANY($1::uuid[]) AND ${this.flag}
       RETURNING id`,
      [ids, at]
    );
    return rows.length;
  }

  async softDeleteByRole(roleId: string, at: Date): Promise<number> {
    if (!wellFormed(roleId)) return 0;
    const rows = await this.query(
      `UPDATE ${this.meta.table}
       SET is_deleted = true, deleted_at = $2, ${this.flag} = false, updated_at = $2
       WHERE role_id = $1 AND NOT is_deleted
       RETURNING id`,
      [roleId, at]
    );
    return rows.length;
  }

  findById(id: string): Promise<G | null> {
    if (!wellFormed(id)) return Promise.resolve(null);
    return maybeOne(this.query, `SELECT * FROM ${this.meta.table} WHERE id = $1`, [id], (row) =>
      this.map(row)
    );
  }

  insert(grant: G): Promise<G> {
    return insertOne(this.query, this.meta, grant, (row) => this.map(row));
  }

  update(id: string, patch: object): Promise<G> {
    return updateOne(this.query, this.meta, id, patch, (row) => this.map(row));
  }
}

export class PgRolePermissionRepository
  extends PgGrantRepository<RolePermission>
  implements RolePermissionRepository
{
  protected readonly meta = ROLE_PERMISSIONS;
  protected readonly flag = 'is_granted';

  protected map(row: Row): RolePermission {
    return toRolePermission(row);
  }

  findCurrent(roleId: string, permissionId: string, tenantId: string): Promise<RolePermission | null> {
    if (!wellFormed(roleId, permissionId, tenantId)) return Promise.resolve(null);
    return maybeOne(
      this.query,
      `SELECT * FROM role_permissions
       WHERE role_id = $1 AND permission_id = $2 AND tenant_id = $3 AND NOT is_deleted
       ORDER BY is_granted DESC, updated_at DESC
       LIMIT 1`,
      [roleId, permissionId, tenantId],
      toRolePermission
    );
  }

  listByRole(roleId: string): Promise<RolePermission[]> {
    if (!wellFormed(roleId)) return Promise.resolve([]);
    return many(
      this.query,
      'SELECT * FROM role_permissions WHERE role_id = $1 AND NOT is_deleted ORDER BY created_at',
      [roleId],
      toRolePermission
    );
  }

  listInForce(roleIds: string[], at: Date, permissionIds?: string[]): Promise<RolePermission[]> {
    const roleKeys = roleIds.filter((id) => wellFormed(id));
    if (roleKeys.length === 0) return Promise.resolve([]);
    const values: unknown[] = [roleKeys, at];
    let permissionFilter = '';
    if (permissionIds) {
      values.push(permissionIds.filter((id) => wellFormed(id)));
      permissionFilter = 'AND permission_id = ANY($3::uuid[])';
    }
    return many(
      this.query,
      `SELECT * FROM role_permissions
       WHERE role_id = ANY($1::uuid[]) AND NOT is_deleted
         AND ${coversAt('$2')}
         ${permissionFilter}`,
      values,
      toRolePermission
    );
  }

  override update(id: string, patch: Patch<RolePermission>): Promise<RolePermission> {
    return super.update(id, patch);
  }
}

export class PgUserRoleRepository extends PgGrantRepository<UserRole> implements UserRoleRepository {
  protected readonly meta = USER_ROLES;
  protected readonly flag = 'is_assigned';

  protected map(row: Row): UserRole {
    return toUserRole(row);
  }

  findCurrent(userId: string, roleId: string, tenantId: string): Promise<UserRole | null> {
    if (!wellFormed(userId, roleId, tenantId)) return Promise.resolve(null);
    return maybeOne(
      this.query,
      `SELECT * FROM user_roles
       WHERE user_id = $1 AND role_id = $2 AND tenant_id = $3 AND NOT is_deleted
       LIMIT 1`,
      [userId, roleId, tenantId],
      toUserRole
    );
  }

  listByUser(userId: string, tenantId: string): Promise<UserRole[]> {
    if (!wellFormed(userId, tenantId)) return Promise.resolve([]);
    return many(
      this.query,
      `SELECT * FROM user_roles
       WHERE user_id = $1 AND tenant_id = $2 AND NOT is_deleted
       ORDER BY created_at`,
      [userId, tenantId],
      toUserRole
    );
  }

  listEffective(userId: string, tenantId: string, at: Date): Promise<UserRole[]> {
    if (!wellFormed(userId, tenantId)) return Promise.resolve([]);
    return many(
      this.query,
      `SELECT * FROM user_roles
       WHERE user_id = $1 AND tenant_id = $2 AND is_assigned AND NOT is_deleted
         AND ${coversAt('$3')}`,
      [userId, tenantId, at],
      toUserRole
    );
  }

  override update(id: string, patch: Patch<UserRole>): Promise<UserRole> {
    return super.update(id, patch);
  }
}
