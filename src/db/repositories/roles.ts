// =============================================================================
// RAMPART — Role repository (pg)
// =============================================================================

import type { Role } from '../../types/roles';
import type { Patch, RoleRepository } from '../../types/store';
import { toRole } from '../rows';
import { table } from '../sql';
import { insertOne, many, maybeOne, Query, updateOne, wellFormed } from './query';

const ROLES = table('roles', {
  tenantId: 'tenant_id',
  code: 'code',
  name: 'name',
  roleType: 'role_type',
  description: 'description',
  level: 'level',
  parentId: 'parent_id',
  isEnabled: 'is_enabled',
  isSystem: 'is_system',
  isDefault: 'is_default',
});

export class PgRoleRepository implements RoleRepository {
  constructor(private readonly query: Query) {}

  findById(id: string): Promise<Role | null> {
    if (!wellFormed(id)) return Promise.resolve(null);
    return maybeOne(this.query, 'SELECT * FROM roles WHERE id = $1', [id], toRole);
  }

  findByCode(tenantId: string, code: string): Promise<Role | null> {
    if (!wellFormed(tenantId)) return Promise.resolve(null);
    return maybeOne(
      this.query,
      'SELECT * FROM roles WHERE tenant_id = $1 AND code = $2 AND NOT is_deleted',
      [tenantId, code],
      toRole
    );
  }

  listByTenant(tenantId: string): Promise<Role[]> {
    if (!wellFormed(tenantId)) return Promise.resolve([]);
    return many(
      this.query,
      'SELECT * FROM roles WHERE tenant_id = $1 AND NOT is_deleted ORDER BY level DESC, code',
      [tenantId],
      toRole
    );
  }

  listChildren(parentIds: string[]): Promise<Role[]> {
    const keys = parentIds.filter((id) => wellFormed(id));
    if (keys.length === 0) return Promise.resolve([]);
    return many(
      this.query,
      'SELECT * FROM roles WHERE parent_id = ANY($1::uuid[]) AND NOT is_deleted',
      [keys],
      toRole
    );
  }

  insert(role: Role): Promise<Role> {
    return insertOne(this.query, ROLES, role, toRole);
  }

  update(id: string, patch: Patch<Role>): Promise<Role> {
    return updateOne(this.query, ROLES, id, patch, toRole);
  }

  async clearParent(parentId: string, at: Date): Promise<number> {
    const rows = await this.query(
      `UPDATE roles SET parent_id = NULL, updated_at = $2
       WHERE parent_id = $1 AND NOT is_deleted
       RETURNING id`,
      [parentId, at]
    );
    return rows.length;
  }
}
