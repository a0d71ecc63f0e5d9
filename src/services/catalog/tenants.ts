// =============================================================================
// RAMPART — Tenant catalog
//
// The system tenant (isSystem) hosts platform administration: it never
// expires and cannot be disabled or deleted.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { ConflictError, NotFoundError, ValidationError } from '../../errors';
import type { CreateTenantInput, Tenant, UpdateTenantInput } from '../../types/catalog';
import { snapshot } from '../../utils/json';
import type { UnitOfWork } from '../unit-of-work';

export const TENANT_CODE = /^[a-z][a-z0-9_-]{0,63}$/;

/** Live, enabled and unexpired at `at` */
export function isTenantActive(tenant: Tenant | null, at: Date): tenant is Tenant {
  return (
    tenant !== null &&
    !tenant.isDeleted &&
    tenant.isEnabled &&
    (tenant.expiresAt === null || tenant.expiresAt > at)
  );
}

export async function requireTenant(uow: UnitOfWork, tenantId: string): Promise<Tenant> {
  const tenant = await uow.session.tenants.findById(tenantId);
  if (!tenant || tenant.isDeleted) throw new NotFoundError('Tenant', tenantId);
  return tenant;
}

function assertExpiry(isSystem: boolean, expiresAt: Date | null | undefined, now: Date): void {
  if (!expiresAt) return;
  if (isSystem) throw new ValidationError('System tenant cannot carry an expiry');
  if (expiresAt <= now) throw new ValidationError('expiresAt must be in the future');
}

export async function createTenant(uow: UnitOfWork, input: CreateTenantInput): Promise<Tenant> {
  if (!TENANT_CODE.test(input.code)) {
    throw new ValidationError(`Invalid tenant code "${input.code}"`, { field: 'code' });
  }
  if (!input.name?.trim()) throw new ValidationError('Tenant name is required', { field: 'name' });

  const now = uow.now();
  const isSystem = input.isSystem ?? false;
  assertExpiry(isSystem, input.expiresAt, now);

  if (await uow.session.tenants.findByCode(input.code)) {
    throw new ConflictError(`Tenant code "${input.code}" already exists`);
  }

  const tenant = await uow.session.tenants.insert({
    id: uuidv4(),
    code: input.code,
    name: input.name.trim(),
    tenantType: input.tenantType ?? 'standard',
    isEnabled: true,
    isSystem,
    expiresAt: input.expiresAt ?? null,
    metadata: input.metadata ?? {},
    createdAt: now,
    updatedAt: now,
    isDeleted: false,
    deletedAt: null,
  });

  await uow.audit({
    businessType: 'tenant',
    event: 'insert',
    operationType: 'CREATE',
    targetId: tenant.id,
    tenantId: tenant.id,
    before: null,
    after: snapshot(tenant),
  });
  return tenant;
}

export async function updateTenant(
  uow: UnitOfWork,
  tenantId: string,
  patch: UpdateTenantInput
): Promise<Tenant> {
  const tenant = await requireTenant(uow, tenantId);
  assertExpiry(tenant.isSystem, patch.expiresAt, uow.now());
  if (patch.name !== undefined && !patch.name.trim()) {
    throw new ValidationError('Tenant name is required', { field: 'name' });
  }

  const updated = await uow.session.tenants.update(tenantId, {
    name: patch.name?.trim(),
    tenantType: patch.tenantType,
    expiresAt: patch.expiresAt,
    metadata: patch.metadata,
    updatedAt: uow.now(),
  });
  await uow.audit({
    businessType: 'tenant',
    event: 'update',
    operationType: 'UPDATE',
    targetId: tenantId,
    tenantId,
    before: snapshot(tenant),
    after: snapshot(updated),
  });
  return updated;
}

async function setTenantEnabled(uow: UnitOfWork, tenantId: string, isEnabled: boolean): Promise<Tenant> {
  const tenant = await requireTenant(uow, tenantId);
  if (!isEnabled && tenant.isSystem) throw new ValidationError('System tenant cannot be disabled');
  if (tenant.isEnabled === isEnabled) return tenant;

  const updated = await uow.session.tenants.update(tenantId, { isEnabled, updatedAt: uow.now() });
  await uow.audit({
    businessType: 'tenant',
    event: 'update',
    operationType: isEnabled ? 'ENABLE' : 'DISABLE',
    targetId: tenantId,
    tenantId,
    before: snapshot(tenant),
    after: snapshot(updated),
  });
  return updated;
}

export function enableTenant(uow: UnitOfWork, tenantId: string): Promise<Tenant> {
  return setTenantEnabled(uow, tenantId, true);
}

export function disableTenant(uow: UnitOfWork, tenantId: string): Promise<Tenant> {
  return setTenantEnabled(uow, tenantId, false);
}

/** Soft delete. Resolves false when the tenant is missing or already deleted. */
export async function deleteTenant(uow: UnitOfWork, tenantId: string): Promise<boolean> {
  const tenant = await uow.session.tenants.findById(tenantId);
  if (!tenant || tenant.isDeleted) return false;
  if (tenant.isSystem) throw new ValidationError('System tenant cannot be deleted');

  const now = uow.now();
  const updated = await uow.session.tenants.update(tenantId, {
    isDeleted: true,
    deletedAt: now,
    isEnabled: false,
    updatedAt: now,
  });
  await uow.audit({
    businessType: 'tenant',
    event: 'delete',
    operationType: 'DELETE',
    targetId: tenantId,
    tenantId,
    before: snapshot(tenant),
    after: snapshot(updated),
  });
  return true;
}

export async function getTenant(uow: UnitOfWork, tenantId: string): Promise<Tenant | null> {
  const tenant = await uow.session.tenants.findById(tenantId);
  return tenant && !tenant.isDeleted ? tenant : null;
}
