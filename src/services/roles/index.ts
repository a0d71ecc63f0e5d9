// =============================================================================
// RAMPART — Role Graph
//
// Roles belong to one tenant and point at an optional parent in the same
// tenant. System roles are roots, never default, and cannot be disabled or
// deleted. Deleting a role retires its grants and detaches its children in
// the same transaction.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import {
  ConflictError,
  CycleError,
  NotFoundError,
  TenantMismatchError,
  ValidationError,
} from '../../errors';
import type { CreateRoleInput, Role, RoleNode, UpdateRoleInput } from '../../types/roles';
import { snapshot } from '../../utils/json';
import { requireTenant } from '../catalog/tenants';
import type { UnitOfWork } from '../unit-of-work';
import { assertParentOk } from './chain';

export { roleChain, isRoleUsable } from './chain';

export const ROLE_CODE = /^[A-Z_][A-Z0-9_]{0,49}$/;

export async function requireRole(uow: UnitOfWork, roleId: string): Promise<Role> {
  const role = await uow.session.roles.findById(roleId);
  if (!role || role.isDeleted) throw new NotFoundError('Role', roleId);
  return role;
}

function assertCode(code: string): void {
  if (!ROLE_CODE.test(code)) {
    throw new ValidationError(`Invalid role code "${code}"`, { field: 'code' });
  }
}

function assertLevel(level: number): void {
  if (!Number.isInteger(level) || level < 0) {
    throw new ValidationError('Role level must be a non-negative integer', { field: 'level' });
  }
}

async function assertCodeFree(uow: UnitOfWork, tenantId: string, code: string, selfId?: string): Promise<void> {
  const existing = await uow.session.roles.findByCode(tenantId, code);
  if (existing && existing.id !== selfId) {
    throw new ConflictError(`Role code "${code}" already exists in tenant ${tenantId}`);
  }
}

async function assertParentAllowed(
  uow: UnitOfWork,
  role: Pick<Role, 'id' | 'tenantId' | 'isSystem'>,
  parentId: string
): Promise<void> {
  if (parentId === role.id) {
    throw new CycleError(`Role ${role.id} cannot be its own parent`, { roleId: role.id });
  }
  if (role.isSystem) throw new ValidationError('System roles cannot have a parent');

  const parent = await uow.session.roles.findById(parentId);
  if (!parent || parent.isDeleted) throw new NotFoundError('Role', parentId);
  if (parent.tenantId !== role.tenantId) {
    throw new TenantMismatchError(`Parent role ${parentId} belongs to another tenant`, {
      roleTenant: role.tenantId,
      parentTenant: parent.tenantId,
    });
  }
  await assertParentOk(uow, role.id, parent);
}

export async function createRole(uow: UnitOfWork, input: CreateRoleInput): Promise<Role> {
  await requireTenant(uow, input.tenantId);
  assertCode(input.code);
  if (!input.name?.trim()) throw new ValidationError('Role name is required', { field: 'name' });
  const level = input.level ?? 0;
  assertLevel(level);

  const isSystem = input.isSystem ?? false;
  const isDefault = input.isDefault ?? false;
  if (isSystem && isDefault) throw new ValidationError('System roles cannot be default roles');

  await assertCodeFree(uow, input.tenantId, input.code);

  const id = uuidv4();
  const parentId = input.parentId ?? null;
  if (parentId !== null) {
    await assertParentAllowed(uow, { id, tenantId: input.tenantId, isSystem }, parentId);
  }

  const now = uow.now();
  const role = await uow.session.roles.insert({
    id,
    tenantId: input.tenantId,
    code: input.code,
    name: input.name.trim(),
    roleType: input.roleType ?? (isSystem ? 'system' : 'custom'),
    description: input.description ?? null,
    level,
    parentId,
    isEnabled: true,
    isSystem,
    isDefault,
    metadata: input.metadata ?? {},
    createdAt: now,
    updatedAt: now,
    isDeleted: false,
    deletedAt: null,
  });

  await uow.audit({
    businessType: 'role',
    event: 'insert',
    operationType: 'CREATE',
    targetId: role.id,
    tenantId: role.tenantId,
    before: null,
    after: snapshot(role),
  });
  return role;
}

export async function updateRole(uow: UnitOfWork, roleId: string, patch: UpdateRoleInput): Promise<Role> {
  const role = await requireRole(uow, roleId);

  if (patch.code !== undefined && patch.code !== role.code) {
    assertCode(patch.code);
    await assertCodeFree(uow, role.tenantId, patch.code, role.id);
  }
  if (patch.level !== undefined) assertLevel(patch.level);
  if (patch.name !== undefined && !patch.name.trim()) {
    throw new ValidationError('Role name is required', { field: 'name' });
  }
  if (patch.isDefault && role.isSystem) {
    throw new ValidationError('System roles cannot be default roles');
  }

  const updated = await uow.session.roles.update(roleId, {
    code: patch.code,
    name: patch.name?.trim(),
    roleType: patch.roleType,
    description: patch.description,
    level: patch.level,
    isDefault: patch.isDefault,
    metadata: patch.metadata,
    updatedAt: uow.now(),
  });
  await uow.audit({
    businessType: 'role',
    event: 'update',
    operationType: 'UPDATE',
    targetId: roleId,
    tenantId: role.tenantId,
    before: snapshot(role),
    after: snapshot(updated),
  });
  return updated;
}

/**
 * Moves a role under a new parent, or makes it a root with null. Refused
 * links leave the stored graph untouched.
 */
export async function setRoleParent(
  uow: UnitOfWork,
  roleId: string,
  parentId: string | null
): Promise<Role> {
  const role = await requireRole(uow, roleId);
  if (parentId !== null) await assertParentAllowed(uow, role, parentId);
  if (role.parentId === parentId) return role;

  const updated = await uow.session.roles.update(roleId, { parentId, updatedAt: uow.now() });
  await uow.audit({
    businessType: 'role',
    event: 'update',
    operationType: 'SET_PARENT',
    targetId: roleId,
    tenantId: role.tenantId,
    before: snapshot(role),
    after: snapshot(updated),
  });
  return updated;
}

async function setRoleEnabled(uow: UnitOfWork, roleId: string, isEnabled: boolean): Promise<Role> {
  const role = await requireRole(uow, roleId);
  if (!isEnabled && role.isSystem) throw new ValidationError('System roles cannot be disabled');
  if (role.isEnabled === isEnabled) return role;

  const updated = await uow.session.roles.update(roleId, { isEnabled, updatedAt: uow.now() });
  await uow.audit({
    businessType: 'role',
    event: 'update',
    operationType: isEnabled ? 'ENABLE' : 'DISABLE',
    targetId: roleId,
    tenantId: role.tenantId,
    before: snapshot(role),
    after: snapshot(updated),
  });
  return updated;
}

export function enableRole(uow: UnitOfWork, roleId: string): Promise<Role> {
  return setRoleEnabled(uow, roleId, true);
}

export function disableRole(uow: UnitOfWork, roleId: string): Promise<Role> {
  return setRoleEnabled(uow, roleId, false);
}

/**
 * Soft-deletes the role, retires its RolePermission and UserRole rows and
 * detaches its children. Resolves false when the role is missing or
 * already deleted.
 */
export async function deleteRole(uow: UnitOfWork, roleId: string): Promise<boolean> {
  const role = await uow.session.roles.findById(roleId);
  if (!role || role.isDeleted) return false;
  if (role.isSystem) throw new ValidationError('System roles cannot be deleted');

  const now = uow.now();
  const updated = await uow.session.roles.update(roleId, {
    isDeleted: true,
    deletedAt: now,
    isEnabled: false,
    updatedAt: now,
  });
  const rolePermissions = await uow.session.rolePermissions.softDeleteByRole(roleId, now);
  const userRoles = await uow.session.userRoles.softDeleteByRole(roleId, now);
  const children = await uow.session.roles.clearParent(roleId, now);

  await uow.audit({
    businessType: 'role',
    event: 'delete',
    operationType: 'DELETE',
    targetId: roleId,
    tenantId: role.tenantId,
    before: snapshot(role),
    after: { ...snapshot(updated), cascade: { rolePermissions, userRoles, children } },
  });
  return true;
}

export async function getRole(uow: UnitOfWork, roleId: string): Promise<Role | null> {
  const role = await uow.session.roles.findById(roleId);
  return role && !role.isDeleted ? role : null;
}

export async function listRoles(
  uow: UnitOfWork,
  tenantId: string,
  filter: { enabled?: boolean } = {}
): Promise<Role[]> {
  const roles = await uow.session.roles.listByTenant(tenantId);
  return filter.enabled === undefined ? roles : roles.filter((r) => r.isEnabled === filter.enabled);
}

/** Enabled default roles, highest level first */
export async function getDefaultRoles(uow: UnitOfWork, tenantId: string): Promise<Role[]> {
  const roles = await uow.session.roles.listByTenant(tenantId);
  return roles
    .filter((r) => r.isDefault && r.isEnabled)
    .sort((a, b) => b.level - a.level || a.code.localeCompare(b.code));
}

export async function getRoleTree(uow: UnitOfWork, tenantId: string): Promise<RoleNode[]> {
  const roles = await uow.session.roles.listByTenant(tenantId);
  const nodes = new Map<string, RoleNode>();
  for (const role of roles) nodes.set(role.id, { role, children: [] });

  const roots: RoleNode[] = [];
  for (const node of nodes.values()) {
    const parent = node.role.parentId === null ? undefined : nodes.get(node.role.parentId);
    if (parent) parent.children.push(node);
    else roots.push(node);
  }
  return roots;
}
