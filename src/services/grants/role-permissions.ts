// =============================================================================
// RAMPART — RolePermission grants
//
// One live row per (role, permission, tenant). Granting again reinstates a
// revoked or expired row instead of inserting a second one; granting over a
// row that is still active and not yet expired is a conflict.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { ConflictError, NotFoundError, TenantMismatchError } from '../../errors';
import type { Permission } from '../../types/catalog';
import type { Role } from '../../types/roles';
import type {
  GrantRolePermissionInput,
  GrantWindow,
  RolePermission,
  SyncResult,
} from '../../types/grants';
import { snapshot } from '../../utils/json';
import { requirePermission } from '../catalog/permissions';
import { requireRole } from '../roles';
import type { UnitOfWork } from '../unit-of-work';
import { isCurrentOrFuture, mergeWindow, newWindow } from './lifecycle';
import { forEachWithContext } from './context';

interface Scope {
  role: Role;
  permission: Permission;
  tenantId: string;
}

/** Permission tenant when it has one, else the role's */
function scopeOf(role: Role, permission: Permission): Scope {
  if (permission.tenantId !== null && permission.tenantId !== role.tenantId) {
    throw new TenantMismatchError(
      `Permission ${permission.id} belongs to another tenant than role ${role.id}`,
      { roleTenant: role.tenantId, permissionTenant: permission.tenantId }
    );
  }
  return { role, permission, tenantId: permission.tenantId ?? role.tenantId };
}

async function resolveScope(uow: UnitOfWork, roleId: string, permissionId: string): Promise<Scope> {
  const role = await requireRole(uow, roleId);
  const permission = await requirePermission(uow, permissionId);
  return scopeOf(role, permission);
}

/** Scope for revokes: missing rows mean there is nothing to do */
async function findScope(uow: UnitOfWork, roleId: string, permissionId: string): Promise<Scope | null> {
  const role = await uow.session.roles.findById(roleId);
  const permission = await uow.session.permissions.findById(permissionId);
  if (!role || !permission) return null;
  return scopeOf(role, permission);
}

export async function grantRolePermission(
  uow: UnitOfWork,
  input: GrantRolePermissionInput
): Promise<RolePermission> {
  const window = newWindow(input);
  const { tenantId } = await resolveScope(uow, input.roleId, input.permissionId);
  const now = uow.now();

  const existing = await uow.session.rolePermissions.findCurrent(
    input.roleId,
    input.permissionId,
    tenantId
  );

  if (existing) {
    if (isCurrentOrFuture(existing, now)) {
      throw new ConflictError(
        `Role ${input.roleId} already holds permission ${input.permissionId}`,
        { grantId: existing.id }
      );
    }
    const updated = await uow.session.rolePermissions.update(existing.id, {
      ...window,
      isGranted: true,
      grantedBy: uow.actorId,
      grantedAt: now,
      revokedBy: null,
      revokedAt: null,
      reason: input.reason ?? null,
      metadata: input.metadata ?? existing.metadata,
      updatedAt: now,
    });
    await uow.audit({
      businessType: 'role_permission',
      event: 'update',
      operationType: existing.isGranted ? 'RENEW' : 'GRANT',
      targetId: updated.id,
      tenantId,
      before: snapshot(existing),
      after: snapshot(updated),
    });
    return updated;
  }

  const created = await uow.session.rolePermissions.insert({
    id: uuidv4(),
    kind: 'role_permission',
    roleId: input.roleId,
    permissionId: input.permissionId,
    tenantId,
    isGranted: true,
    ...window,
    grantedBy: uow.actorId,
    grantedAt: now,
    revokedBy: null,
    revokedAt: null,
    reason: input.reason ?? null,
    metadata: input.metadata ?? {},
    createdAt: now,
    updatedAt: now,
    isDeleted: false,
    deletedAt: null,
  });
  await uow.audit({
    businessType: 'role_permission',
    event: 'insert',
    operationType: 'GRANT',
    targetId: created.id,
    tenantId,
    before: null,
    after: snapshot(created),
  });
  return created;
}

/** Resolves true when a grant was switched off, false when there was none active */
export async function revokeRolePermission(
  uow: UnitOfWork,
  roleId: string,
  permissionId: string,
  reason?: string | null
): Promise<boolean> {
  const scope = await findScope(uow, roleId, permissionId);
  if (!scope) return false;
  const existing = await uow.session.rolePermissions.findCurrent(roleId, permissionId, scope.tenantId);
  if (!existing || !existing.isGranted) return false;

  const now = uow.now();
  const updated = await uow.session.rolePermissions.update(existing.id, {
    isGranted: false,
    revokedBy: uow.actorId,
    revokedAt: now,
    reason: reason ?? uow.operationContext?.reason ?? null,
    updatedAt: now,
  });
  await uow.audit({
    businessType: 'role_permission',
    event: 'update',
    operationType: 'REVOKE',
    targetId: existing.id,
    tenantId: scope.tenantId,
    before: snapshot(existing),
    after: snapshot(updated),
  });
  return true;
}

/** Reinstates a revoked grant with its stored window; false when already active */
export async function activateRolePermission(
  uow: UnitOfWork,
  roleId: string,
  permissionId: string
): Promise<boolean> {
  const { tenantId } = await resolveScope(uow, roleId, permissionId);
  const existing = await uow.session.rolePermissions.findCurrent(roleId, permissionId, tenantId);
  if (!existing) throw new NotFoundError('RolePermission', `${roleId}/${permissionId}`);
  if (existing.isGranted) return false;

  const now = uow.now();
  const updated = await uow.session.rolePermissions.update(existing.id, {
    isGranted: true,
    grantedBy: uow.actorId,
    grantedAt: now,
    revokedBy: null,
    revokedAt: null,
    updatedAt: now,
  });
  await uow.audit({
    businessType: 'role_permission',
    event: 'update',
    operationType: 'ACTIVATE',
    targetId: existing.id,
    tenantId,
    before: snapshot(existing),
    after: snapshot(updated),
  });
  return true;
}

export async function updateRolePermissionWindow(
  uow: UnitOfWork,
  roleId: string,
  permissionId: string,
  patch: GrantWindow
): Promise<RolePermission> {
  const { tenantId } = await resolveScope(uow, roleId, permissionId);
  const existing = await uow.session.rolePermissions.findCurrent(roleId, permissionId, tenantId);
  if (!existing) throw new NotFoundError('RolePermission', `${roleId}/${permissionId}`);

  const window = mergeWindow(existing, patch);
  const updated = await uow.session.rolePermissions.update(existing.id, {
    ...window,
    updatedAt: uow.now(),
  });
  await uow.audit({
    businessType: 'role_permission',
    event: 'update',
    operationType: 'UPDATE_EFFECTIVE',
    targetId: existing.id,
    tenantId,
    before: snapshot(existing),
    after: snapshot(updated),
  });
  return updated;
}

/**
 * Grants each permission, skipping the ones already held. Each item runs in
 * its own savepoint so a conflict raised mid-item leaves nothing behind and
 * the transaction usable.
 */
export async function bulkGrantRolePermissions(
  uow: UnitOfWork,
  roleId: string,
  permissionIds: string[],
  window: GrantWindow = {}
): Promise<RolePermission[]> {
  await requireRole(uow, roleId);
  const created: RolePermission[] = [];
  await forEachWithContext(uow, [...new Set(permissionIds)], async (permissionId) => {
    try {
      const grant = await uow.session.savepoint('bulk_grant', () =>
        grantRolePermission(uow, { roleId, permissionId, ...window })
      );
      created.push(grant);
    } catch (err) {
      if (!(err instanceof ConflictError)) throw err;
    }
  });
  return created;
}

/**
 * Makes the role's active grants match permissionIds exactly: grants the
 * missing ones, revokes the extra ones, leaves the rest alone.
 */
export async function syncRolePermissions(
  uow: UnitOfWork,
  roleId: string,
  permissionIds: string[],
  window: GrantWindow = {}
): Promise<SyncResult> {
  await requireRole(uow, roleId);
  const now = uow.now();
  const desired = new Set(permissionIds);
  const held = new Set(
    (await uow.session.rolePermissions.listByRole(roleId))
      .filter((g) => isCurrentOrFuture(g, now))
      .map((g) => g.permissionId)
  );

  const result: SyncResult = { added: [], removed: [], kept: [] };
  for (const id of held) {
    if (desired.has(id)) result.kept.push(id);
    else result.removed.push(id);
  }
  for (const id of desired) {
    if (!held.has(id)) result.added.push(id);
  }

  await forEachWithContext(uow, result.removed, async (permissionId) => {
    await revokeRolePermission(uow, roleId, permissionId);
  });
  await forEachWithContext(uow, result.added, async (permissionId) => {
    await grantRolePermission(uow, { roleId, permissionId, ...window });
  });
  return result;
}

export function listRolePermissions(uow: UnitOfWork, roleId: string): Promise<RolePermission[]> {
  return uow.session.rolePermissions.listByRole(roleId);
}
