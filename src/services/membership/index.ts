// =============================================================================
// RAMPART — Tenant membership
//
// A user can belong to many tenants but has at most one primary. Changing
// the primary locks the user's current primary rows and clears them in the
// same transaction as the new one is set.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, ValidationError } from '../../errors';
import type { Tenant } from '../../types/catalog';
import type { AssignTenantUserOptions, TenantUser } from '../../types/grants';
import { snapshot } from '../../utils/json';
import { isTenantActive, requireTenant } from '../catalog/tenants';
import { requireUser } from '../catalog/users';
import type { UnitOfWork } from '../unit-of-work';

/** Assigned, live and unexpired at `at` */
export function isMembershipValid(row: TenantUser, at: Date): boolean {
  return row.isAssigned && !row.isDeleted && (row.expiresAt === null || row.expiresAt > at);
}

async function clearPrimaries(uow: UnitOfWork, userId: string): Promise<void> {
  const now = uow.now();
  await uow.session.tenantUsers.lockPrimaries(userId);
  await uow.session.tenantUsers.clearPrimary(userId, now);
}

export async function assignUser(
  uow: UnitOfWork,
  tenantId: string,
  userId: string,
  options: AssignTenantUserOptions = {}
): Promise<TenantUser> {
  await requireTenant(uow, tenantId);
  await requireUser(uow, userId);

  const now = uow.now();
  if (options.expiresAt && options.expiresAt <= now) {
    throw new ValidationError('expiresAt must be in the future', { field: 'expiresAt' });
  }

  const existing = await uow.session.tenantUsers.find(tenantId, userId);
  if (existing) {
    const expiresAt = options.expiresAt === undefined ? existing.expiresAt : options.expiresAt;
    if (options.isPrimary && expiresAt !== null && expiresAt <= now) {
      throw new ValidationError('An expired membership cannot be primary', { field: 'expiresAt' });
    }
    if (options.isPrimary) await clearPrimaries(uow, userId);
    const updated = await uow.session.tenantUsers.update(existing.id, {
      isAssigned: true,
      isPrimary: options.isPrimary ?? existing.isPrimary,
      expiresAt,
      updatedAt: now,
    });
    await uow.audit({
      businessType: 'tenant_user',
      event: 'update',
      operationType: 'GRANT',
      targetId: existing.id,
      tenantId,
      before: snapshot(existing),
      after: snapshot(updated),
    });
    return updated;
  }

  if (options.isPrimary) await clearPrimaries(uow, userId);
  const created = await uow.session.tenantUsers.insert({
    id: uuidv4(),
    tenantId,
    userId,
    isPrimary: options.isPrimary ?? false,
    isAssigned: true,
    expiresAt: options.expiresAt ?? null,
    metadata: {},
    createdAt: now,
    updatedAt: now,
    isDeleted: false,
    deletedAt: null,
  });
  await uow.audit({
    businessType: 'tenant_user',
    event: 'insert',
    operationType: 'GRANT',
    targetId: created.id,
    tenantId,
    before: null,
    after: snapshot(created),
  });
  return created;
}

/** Unassigns and unprimaries the row; it stays for history. */
export async function revokeUser(uow: UnitOfWork, tenantId: string, userId: string): Promise<boolean> {
  const existing = await uow.session.tenantUsers.find(tenantId, userId);
  if (!existing || (!existing.isAssigned && !existing.isPrimary)) return false;

  const updated = await uow.session.tenantUsers.update(existing.id, {
    isAssigned: false,
    isPrimary: false,
    updatedAt: uow.now(),
  });
  await uow.audit({
    businessType: 'tenant_user',
    event: 'update',
    operationType: 'REVOKE',
    targetId: existing.id,
    tenantId,
    before: snapshot(existing),
    after: snapshot(updated),
  });
  return true;
}

export async function setPrimaryTenant(uow: UnitOfWork, userId: string, tenantId: string): Promise<TenantUser> {
  const existing = await uow.session.tenantUsers.find(tenantId, userId);
  if (!existing) throw new NotFoundError('TenantUser', `${tenantId}/${userId}`);
  if (!isMembershipValid(existing, uow.now())) {
    throw new ValidationError('Only an assigned, unexpired membership can be primary');
  }
  if (existing.isPrimary) return existing;

  await clearPrimaries(uow, userId);
  const updated = await uow.session.tenantUsers.update(existing.id, {
    isPrimary: true,
    updatedAt: uow.now(),
  });
  await uow.audit({
    businessType: 'tenant_user',
    event: 'update',
    operationType: 'SET_PRIMARY',
    targetId: existing.id,
    tenantId,
    before: snapshot(existing),
    after: snapshot(updated),
  });
  return updated;
}

export async function getPrimaryTenant(uow: UnitOfWork, userId: string): Promise<Tenant | null> {
  const now = uow.now();
  const rows = await uow.session.tenantUsers.listByUser(userId);
  const primary = rows.find((r) => r.isPrimary && isMembershipValid(r, now));
  if (!primary) return null;
  const tenant = await uow.session.tenants.findById(primary.tenantId);
  return isTenantActive(tenant, now) ? tenant : null;
}

/** Tenants the user validly belongs to, skipping disabled or expired ones */
export async function listUserTenants(uow: UnitOfWork, userId: string): Promise<Tenant[]> {
  const now = uow.now();
  const rows = await uow.session.tenantUsers.listByUser(userId);
  const tenants: Tenant[] = [];
  for (const row of rows) {
    if (!isMembershipValid(row, now)) continue;
    const tenant = await uow.session.tenants.findById(row.tenantId);
    if (isTenantActive(tenant, now)) tenants.push(tenant);
  }
  return tenants;
}
