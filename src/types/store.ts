// =============================================================================
// RAMPART — Store Port
//
// Everything the engine needs from durable storage. The PostgreSQL adapter
// lives in src/db/; tests run against an in-process implementation.
//
// Conventions:
//   - find* by id returns the row even when soft-deleted; callers decide.
//   - find* by natural key and list* skip soft-deleted rows.
//   - Unique-index violations surface as ConflictError.
// =============================================================================

import type { Permission, Tenant, User } from './catalog';
import type { Role } from './roles';
import type { RolePermission, TenantUser, UserRole } from './grants';
import type { AuditQuery, AuditRecord } from './audit';

export type Patch<T> = Partial<Omit<T, 'id' | 'createdAt' | 'kind'>>;

export interface TenantRepository {
  findById(id: string): Promise<Tenant | null>;
  findByCode(code: string): Promise<Tenant | null>;
  insert(tenant: Tenant): Promise<Tenant>;
  update(id: string, patch: Patch<Tenant>): Promise<Tenant>;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  insert(user: User): Promise<User>;
  update(id: string, patch: Patch<User>): Promise<User>;
}

export interface RoleRepository {
  findById(id: string): Promise<Role | null>;
  findByCode(tenantId: string, code: string): Promise<Role | null>;
  listByTenant(tenantId: string): Promise<Role[]>;
  insert(role: Role): Promise<Role>;
  update(id: string, patch: Patch<Role>): Promise<Role>;
  /** Live roles whose parent is one of parentIds */
  listChildren(parentIds: string[]): Promise<Role[]>;
  /** Detaches every live child of parentId; returns the number detached */
  clearParent(parentId: string, at: Date): Promise<number>;
}

export interface PermissionRepository {
  findById(id: string): Promise<Permission | null>;
  findByIds(ids: string[]): Promise<Permission[]>;
  /** Exact scope: tenantId null looks among globals only */
  findByCode(tenantId: string | null, code: string): Promise<Permission | null>;
  /** Tenant-owned and global permissions with this code */
  findVisibleByCode(tenantId: string, code: string): Promise<Permission[]>;
  listVisible(tenantId: string): Promise<Permission[]>;
  insert(permission: Permission): Promise<Permission>;
  update(id: string, patch: Patch<Permission>): Promise<Permission>;
}

/** Operations common to both grant tables, used by the sweep */
export interface ExpiringGrantRepository<G> {
  /** Active rows with effectiveTo <= before, locked for this transaction */
  lockExpired(before: Date, limit: number): Promise<G[]>;
  /** Flips the grant flag off with reason 'expired'; returns rows changed */
  markExpired(ids: string[], at: Date): Promise<number>;
  /** Soft-deletes every live row pointing at roleId; returns rows changed */
  softDeleteByRole(roleId: string, at: Date): Promise<number>;
}

export interface RolePermissionRepository extends ExpiringGrantRepository<RolePermission> {
  findById(id: string): Promise<RolePermission | null>;
  /** The live row for a triple, if any */
  findCurrent(roleId: string, permissionId: string, tenantId: string): Promise<RolePermission | null>;
  listByRole(roleId: string): Promise<RolePermission[]>;
  /** Live rows whose window covers `at`, whatever their grant flag */
  listInForce(roleIds: string[], at: Date, permissionIds?: string[]): Promise<RolePermission[]>;
  insert(grant: RolePermission): Promise<RolePermission>;
  update(id: string, patch: Patch<RolePermission>): Promise<RolePermission>;
}

export interface UserRoleRepository extends ExpiringGrantRepository<UserRole> {
  findById(id: string): Promise<UserRole | null>;
  findCurrent(userId: string, roleId: string, tenantId: string): Promise<UserRole | null>;
  listByUser(userId: string, tenantId: string): Promise<UserRole[]>;
  /** Assigned live rows whose window covers `at` */
  listEffective(userId: string, tenantId: string, at: Date): Promise<UserRole[]>;
  insert(grant: UserRole): Promise<UserRole>;
  update(id: string, patch: Patch<UserRole>): Promise<UserRole>;
}

export interface TenantUserRepository {
  find(tenantId: string, userId: string): Promise<TenantUser | null>;
  listByUser(userId: string): Promise<TenantUser[]>;
  /** Locks the user's live primary rows for this transaction */
  lockPrimaries(userId: string): Promise<TenantUser[]>;
  /** Clears isPrimary on every live row of the user; returns rows changed */
  clearPrimary(userId: string, at: Date): Promise<number>;
  insert(row: TenantUser): Promise<TenantUser>;
  update(id: string, patch: Patch<TenantUser>): Promise<TenantUser>;
}

/** Append-only: there is deliberately no update or delete */
export interface AuditRepository {
  insert(record: AuditRecord): Promise<AuditRecord>;
  query(filter: AuditQuery): Promise<AuditRecord[]>;
}

/** Repositories bound to one connection (and, for writes, one transaction) */
export interface StoreSession {
  tenants: TenantRepository;
  users: UserRepository;
  roles: RoleRepository;
  permissions: PermissionRepository;
  rolePermissions: RolePermissionRepository;
  userRoles: UserRoleRepository;
  tenantUsers: TenantUserRepository;
  audit: AuditRepository;
  /**
   * Runs fn inside a savepoint. A throw rolls back to the savepoint and is
   * rethrown; the enclosing transaction stays usable.
   */
  savepoint<T>(name: string, fn: () => Promise<T>): Promise<T>;
}

export interface AuthzStore {
  transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;
  read<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
