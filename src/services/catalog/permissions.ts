// =============================================================================
// RAMPART — Permission catalog
//
// Codes read resource:action[:scope]. A permission with no tenant is global
// and visible to every tenant; system permissions must be global.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { ConflictError, NotFoundError, ValidationError } from '../../errors';
import type { CreatePermissionInput, Permission } from '../../types/catalog';
import { snapshot } from '../../utils/json';
import type { UnitOfWork } from '../unit-of-work';
import { requireTenant } from './tenants';

export const PERMISSION_CODE = /^([a-z][a-z0-9_-]*):([a-z][a-z0-9_-]*)(?::([a-z0-9_*-]+))?$/;

export interface ParsedPermissionCode {
  resourceType: string;
  action: string;
  scope: string | null;
}

export function parsePermissionCode(code: string): ParsedPermissionCode {
  const match = PERMISSION_CODE.exec(code);
  if (!match) {
    throw new ValidationError(`Invalid permission code "${code}"; expected resource:action[:scope]`, {
      field: 'code',
    });
  }
  return { resourceType: match[1], action: match[2], scope: match[3] ?? null };
}

/** Live, enabled and owned by the tenant or global */
export function isPermissionVisible(permission: Permission, tenantId: string): boolean {
  return (
    !permission.isDeleted &&
    permission.isEnabled &&
    (permission.tenantId === null || permission.tenantId === tenantId)
  );
}

export async function requirePermission(uow: UnitOfWork, permissionId: string): Promise<Permission> {
  const permission = await uow.session.permissions.findById(permissionId);
  if (!permission || permission.isDeleted) throw new NotFoundError('Permission', permissionId);
  return permission;
}

export async function createPermission(
  uow: UnitOfWork,
  input: CreatePermissionInput
): Promise<Permission> {
  const { resourceType, action } = parsePermissionCode(input.code);
  if (!input.name?.trim()) throw new ValidationError('Permission name is required', { field: 'name' });

  const tenantId = input.tenantId ?? null;
  const isSystem = input.isSystem ?? false;
  if (isSystem && tenantId !== null) {
    throw new ValidationError('System permissions must be global');
  }
  if (tenantId !== null) await requireTenant(uow, tenantId);

  if (await uow.session.permissions.findByCode(tenantId, input.code)) {
    throw new ConflictError(`Permission "${input.code}" already exists in this scope`);
  }

  const now = uow.now();
  const permission = await uow.session.permissions.insert({
    id: uuidv4(),
    code: input.code,
    tenantId,
    name: input.name.trim(),
    category: input.category ?? null,
    module: input.module ?? null,
    action,
    resourceType,
    resourceId: input.resourceId ?? null,
    isEnabled: true,
    isSystem,
    metadata: input.metadata ?? {},
    createdAt: now,
    updatedAt: now,
    isDeleted: false,
    deletedAt: null,
  });

  await uow.audit({
    businessType: 'permission',
    event: 'insert',
    operationType: 'CREATE',
    targetId: permission.id,
    tenantId,
    before: null,
    after: snapshot(permission),
  });
  return permission;
}

async function setPermissionEnabled(
  uow: UnitOfWork,
  permissionId: string,
  isEnabled: boolean
): Promise<Permission> {
  const permission = await requirePermission(uow, permissionId);
  if (!isEnabled && permission.isSystem) {
    throw new ValidationError('System permissions cannot be disabled');
  }
  if (permission.isEnabled === isEnabled) return permission;

  const updated = await uow.session.permissions.update(permissionId, {
    isEnabled,
    updatedAt: uow.now(),
  });
  await uow.audit({
    businessType: 'permission',
    event: 'update',
    operationType: isEnabled ? 'ENABLE' : 'DISABLE',
    targetId: permissionId,
    tenantId: permission.tenantId,
    before: snapshot(permission),
    after: snapshot(updated),
  });
  return updated;
}

export function enablePermission(uow: UnitOfWork, permissionId: string): Promise<Permission> {
  return setPermissionEnabled(uow, permissionId, true);
}

export function disablePermission(uow: UnitOfWork, permissionId: string): Promise<Permission> {
  return setPermissionEnabled(uow, permissionId, false);
}

export async function deletePermission(uow: UnitOfWork, permissionId: string): Promise<boolean> {
  const permission = await uow.session.permissions.findById(permissionId);
  if (!permission || permission.isDeleted) return false;
  if (permission.isSystem) throw new ValidationError('System permissions cannot be deleted');

  const now = uow.now();
  const updated = await uow.session.permissions.update(permissionId, {
    isDeleted: true,
    deletedAt: now,
    isEnabled: false,
    updatedAt: now,
  });
  await uow.audit({
    businessType: 'permission',
    event: 'delete',
    operationType: 'DELETE',
    targetId: permissionId,
    tenantId: permission.tenantId,
    before: snapshot(permission),
    after: snapshot(updated),
  });
  return true;
}

export async function getPermission(uow: UnitOfWork, permissionId: string): Promise<Permission | null> {
  const permission = await uow.session.permissions.findById(permissionId);
  return permission && !permission.isDeleted ? permission : null;
}

/** Tenant-owned plus global permissions */
export function listPermissions(uow: UnitOfWork, tenantId: string): Promise<Permission[]> {
  return uow.session.permissions.listVisible(tenantId);
}
