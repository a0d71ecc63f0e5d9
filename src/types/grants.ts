// =============================================================================
// RAMPART — Grant Types
//
// RolePermission and UserRole share one lifecycle: a grant flag, a
// half-open effective window [effectiveFrom, effectiveTo) and grant/revoke
// stamps. The `kind` discriminator doubles as the audit business type.
// =============================================================================

import type { EntityBase } from './catalog';

interface GrantBase extends EntityBase {
  tenantId: string;
  effectiveFrom: Date | null;
  effectiveTo: Date | null;
  grantedBy: string | null;
  grantedAt: Date | null;
  revokedBy: string | null;
  revokedAt: Date | null;
  reason: string | null;
}

export interface RolePermission extends GrantBase {
  kind: 'role_permission';
  roleId: string;
  permissionId: string;
  isGranted: boolean;
}

export interface UserRole extends GrantBase {
  kind: 'user_role';
  userId: string;
  roleId: string;
  isAssigned: boolean;
}

export type Grant = RolePermission | UserRole;
export type GrantKind = Grant['kind'];

/** Bounds left undefined keep their stored value; null clears them */
export interface GrantWindow {
  effectiveFrom?: Date | null;
  effectiveTo?: Date | null;
}

export interface GrantRolePermissionInput extends GrantWindow {
  roleId: string;
  permissionId: string;
  reason?: string | null;
  metadata?: Record<string, unknown>;
}

export interface AssignUserRoleInput extends GrantWindow {
  userId: string;
  roleId: string;
  tenantId: string;
  reason?: string | null;
  metadata?: Record<string, unknown>;
}

export interface SyncResult {
  added: string[];
  removed: string[];
  kept: string[];
}

export interface TenantUser extends EntityBase {
  tenantId: string;
  userId: string;
  isPrimary: boolean;
  isAssigned: boolean;
  expiresAt: Date | null;
}

export interface AssignTenantUserOptions {
  isPrimary?: boolean;
  expiresAt?: Date | null;
}
