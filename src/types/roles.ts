// =============================================================================
// RAMPART — Role Types
//
// Roles live inside one tenant and form a forest through parentId. A role
// inherits every permission its ancestors hold unless an override with a
// higher level says otherwise.
// =============================================================================

import type { EntityBase } from './catalog';

export interface Role extends EntityBase {
  tenantId: string;
  /** Uppercase code, unique per tenant among live roles */
  code: string;
  name: string;
  roleType: string;
  description: string | null;
  /** Precedence when grants on a chain disagree; higher wins */
  level: number;
  parentId: string | null;
  isEnabled: boolean;
  isSystem: boolean;
  /** Handed to new tenant members by onboarding flows */
  isDefault: boolean;
}

export interface CreateRoleInput {
  tenantId: string;
  code: string;
  name: string;
  roleType?: string;
  description?: string | null;
  level?: number;
  parentId?: string | null;
  isSystem?: boolean;
  isDefault?: boolean;
  metadata?: Record<string, unknown>;
}

export interface UpdateRoleInput {
  code?: string;
  name?: string;
  roleType?: string;
  description?: string | null;
  level?: number;
  isDefault?: boolean;
  metadata?: Record<string, unknown>;
}

/** A role with its live children, as returned by getRoleTree */
export interface RoleNode {
  role: Role;
  children: RoleNode[];
}
