// =============================================================================
// RAMPART — Row mappers
//
// snake_case rows from pg into typed entities. Column readers check the
// runtime type so a schema drift fails loudly instead of leaking undefined.
// =============================================================================

import type { Permission, Tenant, User, UserStatus } from '../types/catalog';
import { USER_STATUSES } from '../types/catalog';
import type { Role } from '../types/roles';
import type { RolePermission, TenantUser, UserRole } from '../types/grants';
import type { AuditRecord, JsonObject, JsonValue } from '../types/audit';
import { isOperationType } from '../types/audit';

export type Row = Record<string, unknown>;

function columnError(column: string, expected: string): Error {
  return new Error(`Column ${column} is not ${expected}`);
}

export function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw columnError(column, 'text');
  return value;
}

export function optText(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') throw columnError(column, 'text');
  return value;
}

export function bool(row: Row, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'boolean') throw columnError(column, 'boolean');
  return value;
}

export function int(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return parseInt(value, 10);
  throw columnError(column, 'an integer');
}

export function timestamp(row: Row, column: string): Date {
  const value = row[column];
  if (!(value instanceof Date)) throw columnError(column, 'a timestamp');
  return value;
}

export function optTimestamp(row: Row, column: string): Date | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (!(value instanceof Date)) throw columnError(column, 'a timestamp');
  return value;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

export function optJson(row: Row, column: string): JsonObject | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (!isJsonObject(value)) throw columnError(column, 'a JSON object');
  return value;
}

function metadata(row: Row): Record<string, unknown> {
  return optJson(row, 'metadata') ?? {};
}

function status(row: Row): UserStatus {
  const value = text(row, 'status');
  const match = USER_STATUSES.find((s) => s === value);
  if (!match) throw columnError('status', 'a user status');
  return match;
}

function base(row: Row) {
  return {
    id: text(row, 'id'),
    createdAt: timestamp(row, 'created_at'),
    updatedAt: timestamp(row, 'updated_at'),
    isDeleted: bool(row, 'is_deleted'),
    deletedAt: optTimestamp(row, 'deleted_at'),
    metadata: metadata(row),
  };
}

export function toTenant(row: Row): Tenant {
  return {
    ...base(row),
    code: text(row, 'code'),
    name: text(row, 'name'),
    tenantType: text(row, 'tenant_type'),
    isEnabled: bool(row, 'is_enabled'),
    isSystem: bool(row, 'is_system'),
    expiresAt: optTimestamp(row, 'expires_at'),
  };
}

export function toUser(row: Row): User {
  return {
    ...base(row),
    username: text(row, 'username'),
    email: optText(row, 'email'),
    mobile: optText(row, 'mobile'),
    displayName: optText(row, 'display_name'),
    status: status(row),
    isSystem: bool(row, 'is_system'),
  };
}

export function toRole(row: Row): Role {
  return {
    ...base(row),
    tenantId: text(row, 'tenant_id'),
    code: text(row, 'code'),
    name: text(row, 'name'),
    roleType: text(row, 'role_type'),
    description: optText(row, 'description'),
    level: int(row, 'level'),
    parentId: optText(row, 'parent_id'),
    isEnabled: bool(row, 'is_enabled'),
    isSystem: bool(row, 'is_system'),
    isDefault: bool(row, 'is_default'),
  };
}

export function toPermission(row: Row): Permission {
  return {
    ...base(row),
    code: text(row, 'code'),
    tenantId: optText(row, 'tenant_id'),
    name: text(row, 'name'),
    category: optText(row, 'category'),
    module: optText(row, 'module'),
    action: text(row, 'action'),
    resourceType: text(row, 'resource_type'),
    resourceId: optText(row, 'resource_id'),
    isEnabled: bool(row, 'is_enabled'),
    isSystem: bool(row, 'is_system'),
  };
}

function grantStamps(row: Row) {
  return {
    tenantId: text(row, 'tenant_id'),
    effectiveFrom: optTimestamp(row, 'effective_from'),
    effectiveTo: optTimestamp(row, 'effective_to'),
    grantedBy: optText(row, 'granted_by'),
    grantedAt: optTimestamp(row, 'granted_at'),
    revokedBy: optText(row, 'revoked_by'),
    revokedAt: optTimestamp(row, 'revoked_at'),
    reason: optText(row, 'reason'),
  };
}

export function toRolePermission(row: Row): RolePermission {
  return {
    ...base(row),
    ...grantStamps(row),
    kind: 'role_permission',
    roleId: text(row, 'role_id'),
    permissionId: text(row, 'permission_id'),
    isGranted: bool(row, 'is_granted'),
  };
}

export function toUserRole(row: Row): UserRole {
  return {
    ...base(row),
    ...grantStamps(row),
    kind: 'user_role',
    userId: text(row, 'user_id'),
    roleId: text(row, 'role_id'),
    isAssigned: bool(row, 'is_assigned'),
  };
}

export function toTenantUser(row: Row): TenantUser {
  return {
    ...base(row),
    tenantId: text(row, 'tenant_id'),
    userId: text(row, 'user_id'),
    isPrimary: bool(row, 'is_primary'),
    isAssigned: bool(row, 'is_assigned'),
    expiresAt: optTimestamp(row, 'expires_at'),
  };
}

export function toAuditRecord(row: Row): AuditRecord {
  const operationType = text(row, 'operation_type');
  if (!isOperationType(operationType)) throw columnError('operation_type', 'an operation type');
  return {
    id: text(row, 'id'),
    businessType: text(row, 'business_type'),
    operationType,
    targetType: text(row, 'target_type'),
    targetId: text(row, 'target_id'),
    actorId: optText(row, 'actor_id'),
    actorName: optText(row, 'actor_name'),
    reason: optText(row, 'reason'),
    requestId: optText(row, 'request_id'),
    ip: optText(row, 'ip'),
    before: optJson(row, 'before_state'),
    after: optJson(row, 'after_state'),
    metadata: metadata(row),
    tenantId: optText(row, 'tenant_id'),
    operatedAt: timestamp(row, 'operated_at'),
    eventHash: text(row, 'event_hash').trim(),
  };
}
