// =============================================================================
// RAMPART — Authorization Engine
//
// Facade over the services. Every write runs in one store transaction and
// one unit of work: validate, persist, audit. Reads recompute from store
// state on each call.
//
// Pass `context` to have the call's unit of work carry an operation
// context, or `uow` to run inside a unit of work you already hold:
//
//   await engine.unitOfWork(async (uow) => {
//     uow.setOperationContext({ businessType: 'role_permission', actorId });
//     await engine.grantRolePermission({ roleId, permissionId }, { uow });
//   });
// =============================================================================

import { config } from './config';
import type {
  AuditQuery,
  AuditRecord,
  OperationContext,
} from './types/audit';
import type {
  CreatePermissionInput,
  CreateTenantInput,
  CreateUserInput,
  Permission,
  Tenant,
  UpdateTenantInput,
  User,
} from './types/catalog';
import type {
  AssignTenantUserOptions,
  AssignUserRoleInput,
  GrantRolePermissionInput,
  GrantWindow,
  RolePermission,
  SyncResult,
  TenantUser,
  UserRole,
} from './types/grants';
import type { CreateRoleInput, Role, RoleNode, UpdateRoleInput } from './types/roles';
import type { AuthzStore } from './types/store';
import { AuditRecorder } from './services/audit/recorder';
import { AuditRegistry, auditRegistry } from './services/audit/registry';
import { queryAuditRecords } from './services/audit/query';
import * as catalog from './services/catalog';
import * as grants from './services/grants';
import * as membership from './services/membership';
import * as resolution from './services/resolution';
import * as roles from './services/roles';
import { SweepOptions, SweepResult, sweepExpired } from './services/sweep';
import { EngineLimits, UnitOfWork } from './services/unit-of-work';

export interface EngineOptions {
  registry?: AuditRegistry;
  /** Roll the business write back when its audit write fails */
  auditStrict?: boolean;
  maxChainDepth?: number;
  sweepBatchSize?: number;
  clock?: () => Date;
}

export interface WriteOptions {
  context?: OperationContext;
  uow?: UnitOfWork;
}

export class AuthzEngine {
  readonly registry: AuditRegistry;
  readonly limits: EngineLimits;
  private readonly recorder: AuditRecorder;
  private readonly clock: () => Date;

  constructor(
    private readonly store: AuthzStore,
    options: EngineOptions = {}
  ) {
    this.registry = options.registry ?? auditRegistry;
    this.recorder = new AuditRecorder(this.registry, {
      strict: options.auditStrict ?? config.audit.strict,
    });
    this.clock = options.clock ?? (() => new Date());
    this.limits = {
      maxChainDepth: options.maxChainDepth ?? config.roles.maxChainDepth,
      sweepBatchSize: options.sweepBatchSize ?? config.sweep.batchSize,
    };
  }

  now(): Date {
    return this.clock();
  }

  /**
   * Runs fn in one transaction with a fresh unit of work. The operation
   * context is cleared when fn settles, whether it resolved or threw.
   */
  unitOfWork<T>(fn: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return this.store.transaction(async (session) => {
      const uow = new UnitOfWork(session, this.recorder, this.clock, this.limits);
      try {
        return await fn(uow);
      } finally {
        uow.clearOperationContext();
      }
    });
  }

  private write<T>(opts: WriteOptions, fn: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    if (opts.uow) {
      if (opts.context) opts.uow.setOperationContext(opts.context);
      return fn(opts.uow);
    }
    return this.unitOfWork((uow) => {
      if (opts.context) uow.setOperationContext(opts.context);
      return fn(uow);
    });
  }

  private read<T>(fn: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return this.store.read((session) =>
      fn(new UnitOfWork(session, this.recorder, this.clock, this.limits))
    );
  }

  ping(): Promise<boolean> {
    return this.store.ping();
  }

  // ── Catalog ───────────────────────────────────────────────────────────

  createTenant(input: CreateTenantInput, opts: WriteOptions = {}): Promise<Tenant> {
    return this.write(opts, (uow) => catalog.createTenant(uow, input));
  }

  updateTenant(tenantId: string, patch: UpdateTenantInput, opts: WriteOptions = {}): Promise<Tenant> {
    return this.write(opts, (uow) => catalog.updateTenant(uow, tenantId, patch));
  }

  enableTenant(tenantId: string, opts: WriteOptions = {}): Promise<Tenant> {
    return this.write(opts, (uow) => catalog.enableTenant(uow, tenantId));
  }

  disableTenant(tenantId: string, opts: WriteOptions = {}): Promise<Tenant> {
    return this.write(opts, (uow) => catalog.disableTenant(uow, tenantId));
  }

  deleteTenant(tenantId: string, opts: WriteOptions = {}): Promise<boolean> {
    return this.write(opts, (uow) => catalog.deleteTenant(uow, tenantId));
  }

  getTenant(tenantId: string): Promise<Tenant | null> {
    return this.read((uow) => catalog.getTenant(uow, tenantId));
  }

  createUser(input: CreateUserInput, opts: WriteOptions = {}): Promise<User> {
    return this.write(opts, (uow) => catalog.createUser(uow, input));
  }

  updateUserStatus(userId: string, status: string, opts: WriteOptions = {}): Promise<User> {
    return this.write(opts, (uow) => catalog.updateUserStatus(uow, userId, status));
  }

  deleteUser(userId: string, opts: WriteOptions = {}): Promise<boolean> {
    return this.write(opts, (uow) => catalog.deleteUser(uow, userId));
  }

  getUser(userId: string): Promise<User | null> {
    return this.read((uow) => catalog.getUser(uow, userId));
  }

  createPermission(input: CreatePermissionInput, opts: WriteOptions = {}): Promise<Permission> {
    return this.write(opts, (uow) => catalog.createPermission(uow, input));
  }

  enablePermission(permissionId: string, opts: WriteOptions = {}): Promise<Permission> {
    return this.write(opts, (uow) => catalog.enablePermission(uow, permissionId));
  }

  disablePermission(permissionId: string, opts: WriteOptions = {}): Promise<Permission> {
    return this.write(opts, (uow) => catalog.disablePermission(uow, permissionId));
  }

  deletePermission(permissionId: string, opts: WriteOptions = {}): Promise<boolean> {
    return this.write(opts, (uow) => catalog.deletePermission(uow, permissionId));
  }

  getPermission(permissionId: string): Promise<Permission | null> {
    return this.read((uow) => catalog.getPermission(uow, permissionId));
  }

  listPermissions(tenantId: string): Promise<Permission[]> {
    return this.read((uow) => catalog.listPermissions(uow, tenantId));
  }

  // ── Role graph ────────────────────────────────────────────────────────

  createRole(input: CreateRoleInput, opts: WriteOptions = {}): Promise<Role> {
    return this.write(opts, (uow) => roles.createRole(uow, input));
  }

  updateRole(roleId: string, patch: UpdateRoleInput, opts: WriteOptions = {}): Promise<Role> {
    return this.write(opts, (uow) => roles.updateRole(uow, roleId, patch));
  }

  setRoleParent(roleId: string, parentId: string | null, opts: WriteOptions = {}): Promise<Role> {
    return this.write(opts, (uow) => roles.setRoleParent(uow, roleId, parentId));
  }

  enableRole(roleId: string, opts: WriteOptions = {}): Promise<Role> {
    return this.write(opts, (uow) => roles.enableRole(uow, roleId));
  }

  disableRole(roleId: string, opts: WriteOptions = {}): Promise<Role> {
    return this.write(opts, (uow) => roles.disableRole(uow, roleId));
  }

  deleteRole(roleId: string, opts: WriteOptions = {}): Promise<boolean> {
    return this.write(opts, (uow) => roles.deleteRole(uow, roleId));
  }

  getRole(roleId: string): Promise<Role | null> {
    return this.read((uow) => roles.getRole(uow, roleId));
  }

  listRoles(tenantId: string, filter: { enabled?: boolean } = {}): Promise<Role[]> {
    return this.read((uow) => roles.listRoles(uow, tenantId, filter));
  }

  getDefaultRoles(tenantId: string): Promise<Role[]> {
    return this.read((uow) => roles.getDefaultRoles(uow, tenantId));
  }

  getRoleTree(tenantId: string): Promise<RoleNode[]> {
    return this.read((uow) => roles.getRoleTree(uow, tenantId));
  }

  /** [role, parent, grandparent, ...], fail-closed */
  roleChain(roleId: string): Promise<Role[]> {
    return this.read((uow) => roles.roleChain(uow, roleId));
  }

  // ── Grants ────────────────────────────────────────────────────────────

  grantRolePermission(input: GrantRolePermissionInput, opts: WriteOptions = {}): Promise<RolePermission> {
    return this.write(opts, (uow) => grants.grantRolePermission(uow, input));
  }

  revokeRolePermission(
    roleId: string,
    permissionId: string,
    opts: WriteOptions & { reason?: string } = {}
  ): Promise<boolean> {
    return this.write(opts, (uow) => grants.revokeRolePermission(uow, roleId, permissionId, opts.reason));
  }

  activateRolePermission(roleId: string, permissionId: string, opts: WriteOptions = {}): Promise<boolean> {
    return this.write(opts, (uow) => grants.activateRolePermission(uow, roleId, permissionId));
  }

  updateRolePermissionWindow(
    roleId: string,
    permissionId: string,
    window: GrantWindow,
    opts: WriteOptions = {}
  ): Promise<RolePermission> {
    return this.write(opts, (uow) => grants.updateRolePermissionWindow(uow, roleId, permissionId, window));
  }

  bulkGrantRolePermissions(
    roleId: string,
    permissionIds: string[],
    window: GrantWindow = {},
    opts: WriteOptions = {}
  ): Promise<RolePermission[]> {
    return this.write(opts, (uow) => grants.bulkGrantRolePermissions(uow, roleId, permissionIds, window));
  }

  syncRolePermissions(
    roleId: string,
    permissionIds: string[],
    window: GrantWindow = {},
    opts: WriteOptions = {}
  ): Promise<SyncResult> {
    return this.write(opts, (uow) => grants.syncRolePermissions(uow, roleId, permissionIds, window));
  }

  listRolePermissions(roleId: string): Promise<RolePermission[]> {
    return this.read((uow) => grants.listRolePermissions(uow, roleId));
  }

  assignUserRole(input: AssignUserRoleInput, opts: WriteOptions = {}): Promise<UserRole> {
    return this.write(opts, (uow) => grants.assignUserRole(uow, input));
  }

  revokeUserRole(
    userId: string,
    roleId: string,
    tenantId: string,
    opts: WriteOptions & { reason?: string } = {}
  ): Promise<boolean> {
    return this.write(opts, (uow) => grants.revokeUserRole(uow, userId, roleId, tenantId, opts.reason));
  }

  activateUserRole(userId: string, roleId: string, tenantId: string, opts: WriteOptions = {}): Promise<boolean> {
    return this.write(opts, (uow) => grants.activateUserRole(uow, userId, roleId, tenantId));
  }

  updateUserRoleWindow(
    userId: string,
    roleId: string,
    tenantId: string,
    window: GrantWindow,
    opts: WriteOptions = {}
  ): Promise<UserRole> {
    return this.write(opts, (uow) => grants.updateUserRoleWindow(uow, userId, roleId, tenantId, window));
  }

  listUserRoles(userId: string, tenantId: string): Promise<UserRole[]> {
    return this.read((uow) => grants.listUserRoles(uow, userId, tenantId));
  }

  // ── Membership ────────────────────────────────────────────────────────

  assignUser(
    tenantId: string,
    userId: string,
    options: AssignTenantUserOptions = {},
    opts: WriteOptions = {}
  ): Promise<TenantUser> {
    return this.write(opts, (uow) => membership.assignUser(uow, tenantId, userId, options));
  }

  revokeUser(tenantId: string, userId: string, opts: WriteOptions = {}): Promise<boolean> {
    return this.write(opts, (uow) => membership.revokeUser(uow, tenantId, userId));
  }

  setPrimaryTenant(userId: string, tenantId: string, opts: WriteOptions = {}): Promise<TenantUser> {
    return this.write(opts, (uow) => membership.setPrimaryTenant(uow, userId, tenantId));
  }

  getPrimaryTenant(userId: string): Promise<Tenant | null> {
    return this.read((uow) => membership.getPrimaryTenant(uow, userId));
  }

  listUserTenants(userId: string): Promise<Tenant[]> {
    return this.read((uow) => membership.listUserTenants(uow, userId));
  }

  // ── Resolution ────────────────────────────────────────────────────────

  effectivePermissions(userId: string, tenantId: string, at?: Date): Promise<Set<string>> {
    return this.read((uow) => resolution.effectivePermissions(uow, userId, tenantId, at ?? uow.now()));
  }

  hasPermission(userId: string, tenantId: string, code: string, at?: Date): Promise<boolean> {
    return this.read((uow) => resolution.hasPermission(uow, userId, tenantId, code, at ?? uow.now()));
  }

  // ── Audit & sweep ─────────────────────────────────────────────────────

  queryAuditRecords(filter: AuditQuery): Promise<AuditRecord[]> {
    return this.read((uow) => queryAuditRecords(uow, filter));
  }

  /** Flips expired grants inactive; resolves with the number flipped */
  async sweepExpired(before?: Date, opts: SweepOptions = {}): Promise<number> {
    const result = await this.sweepExpiredDetailed(before, opts);
    return result.total;
  }

  sweepExpiredDetailed(before?: Date, opts: SweepOptions = {}): Promise<SweepResult> {
    return sweepExpired(this, before ?? this.now(), opts);
  }
}
