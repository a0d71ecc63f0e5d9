// =============================================================================
// RAMPART — Catalog repositories (pg)
// =============================================================================

import type { Permission, Tenant, User } from '../../types/catalog';
import type {
  Patch,
  PermissionRepository,
  TenantRepository,
  UserRepository,
} from '../../types/store';
import { toPermission, toTenant, toUser } from '../rows';
import { table } from '../sql';
import { insertOne, many, maybeOne, Query, updateOne, wellFormed } from './query';

const TENANTS = table('tenants', {
  code: 'code',
  name: 'name',
  tenantType: 'tenant_type',
  isEnabled: 'is_enabled',
  isSystem: 'is_system',
  expiresAt: 'expires_at',
});

const USERS = table('users', {
  username: 'username',
  email: 'email',
  mobile: 'mobile',
  displayName: 'display_name',
  status: 'status',
  isSystem: 'is_system',
});

const PERMISSIONS = table('permissions', {
  code: 'code',
  tenantId: 'tenant_id',
  name: 'name',
  category: 'category',
  module: 'module',
  action: 'action',
  resourceType: 'resource_type',
  resourceId: 'resource_id',
  isEnabled: 'is_enabled',
  isSystem: 'is_system',
});

export class PgTenantRepository implements TenantRepository {
  constructor(private readonly query: Query) {}

  findById(id: string): Promise<Tenant | null> {
    if (!wellFormed(id)) return Promise.resolve(null);
    return maybeOne(this.query, 'SELECT * FROM tenants WHERE id = $1', [id], toTenant);
  }

  findByCode(code: string): Promise<Tenant | null> {
    return maybeOne(
      this.query,
      'SELECT * FROM tenants WHERE code = $1 AND NOT is_deleted',
      [code],
      toTenant
    );
  }

  insert(tenant: Tenant): Promise<Tenant> {
    return insertOne(this.query, TENANTS, tenant, toTenant);
  }

  update(id: string, patch: Patch<Tenant>): Promise<Tenant> {
    return updateOne(this.query, TENANTS, id, patch, toTenant);
  }
}

export class PgUserRepository implements UserRepository {
  constructor(private readonly query: Query) {}

  findById(id: string): Promise<User | null> {
    if (!wellFormed(id)) return Promise.resolve(null);
    return maybeOne(this.query, 'SELECT * FROM users WHERE id = $1', [id], toUser);
  }

  insert(user: User): Promise<User> {
    return insertOne(this.query, USERS, user, toUser);
  }

  update(id: string, patch: Patch<User>): Promise<User> {
    return updateOne(this.query, USERS, id, patch, toUser);
  }
}

export class PgPermissionRepository implements PermissionRepository {
  constructor(private readonly query: Query) {}

  findById(id: string): Promise<Permission | null> {
    if (!wellFormed(id)) return Promise.resolve(null);
    return maybeOne(this.query, 'SELECT * FROM permissions WHERE id = $1', [id], toPermission);
  }

  findByIds(ids: string[]): Promise<Permission[]> {
    const keys = ids.filter((id) => wellFormed(id));
    if (keys.length === 0) return Promise.resolve([]);
    return many(this.query, 'SELECT * FROM permissions WHERE id = ANY($1::uuid[])', [keys], toPermission);
  }

  findByCode(tenantId: string | null, code: string): Promise<Permission | null> {
    if (!wellFormed(tenantId)) return Promise.resolve(null);
    return maybeOne(
      this.query,
      `SELECT * FROM permissions
       WHERE code = $1 AND tenant_id IS NOT DISTINCT FROM $2 AND NOT is_deleted`,
      [code, tenantId],
      toPermission
    );
  }

  findVisibleByCode(tenantId: string, code: string): Promise<Permission[]> {
    if (!wellFormed(tenantId)) return Promise.resolve([]);
    return many(
      this.query,
      `SELECT * FROM permissions
       WHERE code = $1 AND (tenant_id = $2 OR tenant_id IS NULL) AND NOT is_deleted`,
      [code, tenantId],
      toPermission
    );
  }

  listVisible(tenantId: string): Promise<Permission[]> {
    if (!wellFormed(tenantId)) return Promise.resolve([]);
    return many(
      this.query,
      `SELECT * FROM permissions
       WHERE (tenant_id = $1 OR tenant_id IS NULL) AND NOT is_deleted
       ORDER BY code`,
      [tenantId],
      toPermission
    );
  }

  insert(permission: Permission): Promise<Permission> {
    return insertOne(this.query, PERMISSIONS, permission, toPermission);
  }

  update(id: string, patch: Patch<Permission>): Promise<Permission> {
    return updateOne(this.query, PERMISSIONS, id, patch, toPermission);
  }
}
