// =============================================================================
// RAMPART — Catalog Types
//
// Tenants, users and permissions. Every entity is soft-deleted only; the
// store keeps the row and flips isDeleted.
// =============================================================================

/** Columns shared by every persisted entity */
export interface EntityBase {
  id: string;
  createdAt: Date;
  updatedAt: Date;
  isDeleted: boolean;
  deletedAt: Date | null;
  metadata: Record<string, unknown>;
}

export interface Tenant extends EntityBase {
  /** Lowercase slug, unique across the deployment */
  code: string;
  name: string;
  tenantType: string;
  isEnabled: boolean;
  /** The platform tenant: never disabled, never expires, never deleted */
  isSystem: boolean;
  expiresAt: Date | null;
}

export type UserStatus = 'unverified' | 'pending' | 'active' | 'inactive' | 'closed';

export const USER_STATUSES: readonly UserStatus[] = [
  'unverified',
  'pending',
  'active',
  'inactive',
  'closed',
];

export interface User extends EntityBase {
  username: string;
  email: string | null;
  mobile: string | null;
  displayName: string | null;
  status: UserStatus;
  isSystem: boolean;
}

export interface Permission extends EntityBase {
  /** resource:action[:scope] */
  code: string;
  /** null for global permissions visible to every tenant */
  tenantId: string | null;
  name: string;
  category: string | null;
  module: string | null;
  /** Derived from the code */
  action: string;
  /** Derived from the code */
  resourceType: string;
  resourceId: string | null;
  isEnabled: boolean;
  isSystem: boolean;
}

export interface CreateTenantInput {
  code: string;
  name: string;
  tenantType?: string;
  isSystem?: boolean;
  expiresAt?: Date | null;
  metadata?: Record<string, unknown>;
}

export interface UpdateTenantInput {
  name?: string;
  tenantType?: string;
  expiresAt?: Date | null;
  metadata?: Record<string, unknown>;
}

export interface CreateUserInput {
  username: string;
  email?: string | null;
  mobile?: string | null;
  displayName?: string | null;
  status?: UserStatus;
  isSystem?: boolean;
  metadata?: Record<string, unknown>;
}

export interface CreatePermissionInput {
  code: string;
  name: string;
  tenantId?: string | null;
  category?: string | null;
  module?: string | null;
  resourceId?: string | null;
  isSystem?: boolean;
  metadata?: Record<string, unknown>;
}
