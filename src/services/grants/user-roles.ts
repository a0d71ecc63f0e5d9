// =============================================================================
// RAMPART — UserRole assignments
//
// Same lifecycle as RolePermission, keyed by (user, role, tenant). The
// tenant given must be the role's own tenant.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { ConflictError, NotFoundError, TenantMismatchError, ValidationError } from '../../errors';
import type { AssignUserRoleInput, GrantWindow, UserRole } from '../../types/grants';
import type { Role } from '../../types/roles';
import { snapshot } from '../../utils/json';
import { requireUser } from '../catalog/users';
import { requireRole } from '../roles';
import type { UnitOfWork } from '../unit-of-work';
import { isCurrentOrFuture, mergeWindow, newWindow } from './lifecycle';

function assertRoleTenant(role: Role, tenantId: string): void {
  if (role.tenantId !== tenantId) {
    throw new TenantMismatchError(`Role ${role.id} does not belong to tenant ${tenantId}`, {
      roleTenant: role.tenantId,
      tenantId,
    });
  }
}

export async function assignUserRole(uow: UnitOfWork, input: AssignUserRoleInput): Promise<UserRole> {
  const window = newWindow(input);
  await requireUser(uow, input.userId);
  const role = await requireRole(uow, input.roleId);
  assertRoleTenant(role, input.tenantId);
  if (!role.isEnabled) throw new ValidationError(`Role ${role.id} is disabled`);

  const now = uow.now();
  const existing = await uow.session.userRoles.findCurrent(input.userId, input.roleId, input.tenantId);

  if (existing) {
    if (isCurrentOrFuture(existing, now)) {
      throw new ConflictError(`User ${input.userId} already holds role ${input.roleId}`, {
        grantId: existing.id,
      });
    }
    const updated = await uow.session.userRoles.update(existing.id, {
      ...window,
      isAssigned: true,
      grantedBy: uow.actorId,
      grantedAt: now,
      revokedBy: null,
      revokedAt: null,
      reason: input.reason ?? null,
      metadata: input.metadata ?? existing.metadata,
      updatedAt: now,
    });
    await uow.audit({
      businessType: 'user_role',
      event: 'update',
      operationType: existing.isAssigned ? 'RENEW' : 'GRANT',
      targetId: updated.id,
      tenantId: input.tenantId,
      before: snapshot(existing),
      after: snapshot(updated),
    });
    return updated;
  }

  const created = await uow.session.userRoles.insert({
    id: uuidv4(),
    kind: 'user_role',
    userId: input.userId,
    roleId: input.roleId,
    tenantId: input.tenantId,
    isAssigned: true,
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
    businessType: 'user_role',
    event: 'insert',
    operationType: 'GRANT',
    targetId: created.id,
    tenantId: input.tenantId,
    before: null,
    after: snapshot(created),
  });
  return created;
}

export async function revokeUserRole(
  uow: UnitOfWork,
  userId: string,
  roleId: string,
  tenantId: string,
  reason?: string | null
): Promise<boolean> {
  const existing = await uow.session.userRoles.findCurrent(userId, roleId, tenantId);
  if (!existing || !existing.isAssigned) return false;

  const now = uow.now();
  const updated = await uow.session.userRoles.update(existing.id, {
    isAssigned: false,
    revokedBy: uow.actorId,
    revokedAt: now,
    reason: reason ?? uow.operationContext?.reason ?? null,
    updatedAt: now,
  });
  await uow.audit({
    businessType: 'user_role',
    event: 'update',
    operationType: 'REVOKE',
    targetId: existing.id,
    tenantId,
    before: snapshot(existing),
    after: snapshot(updated),
  });
  return true;
}

async function requireAssignment(
  uow: UnitOfWork,
  userId: string,
  roleId: string,
  tenantId: string
): Promise<UserRole> {
  const existing = await uow.session.userRoles.findCurrent(userId, roleId, tenantId);
  if (!existing) throw new NotFoundError('UserRole', `${userId}/${roleId}/${tenantId}`);
  return existing;
}

export async function activateUserRole(
  uow: UnitOfWork,
  userId: string,
  roleId: string,
  tenantId: string
): Promise<boolean> {
  const existing = await requireAssignment(uow, userId, roleId, tenantId);
  if (existing.isAssigned) return false;

  const now = uow.now();
  const updated = await uow.session.userRoles.update(existing.id, {
    isAssigned: true,
    grantedBy: uow.actorId,
    grantedAt: now,
    revokedBy: null,
    revokedAt: null,
    updatedAt: now,
  });
  await uow.audit({
    businessType: 'user_role',
    event: 'update',
    operationType: 'ACTIVATE',
    targetId: existing.id,
    tenantId,
    before: snapshot(existing),
    after: snapshot(updated),
  });
  return true;
}

export async function updateUserRoleWindow(
  uow: UnitOfWork,
  userId: string,
  roleId: string,
  tenantId: string,
  patch: GrantWindow
): Promise<UserRole> {
  const existing = await requireAssignment(uow, userId, roleId, tenantId);
  const window = mergeWindow(existing, patch);

  const updated = await uow.session.userRoles.update(existing.id, { ...window, updatedAt: uow.now() });
  await uow.audit({
    businessType: 'user_role',
    event: 'update',
    operationType: 'UPDATE_EFFECTIVE',
    targetId: existing.id,
    tenantId,
    before: snapshot(existing),
    after: snapshot(updated),
  });
  return updated;
}

export function listUserRoles(uow: UnitOfWork, userId: string, tenantId: string): Promise<UserRole[]> {
  return uow.session.userRoles.listByUser(userId, tenantId);
}
