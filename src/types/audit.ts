// =============================================================================
// RAMPART — Audit Types
//
// One fixed audit table for every business type. The business type is a
// discriminator column; targetType/targetId point at the mutated row.
// =============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const OPERATION_TYPES = [
  'CREATE',
  'UPDATE',
  'DELETE',
  'ENABLE',
  'DISABLE',
  'SET_PARENT',
  'GRANT',
  'REVOKE',
  'ACTIVATE',
  'RENEW',
  'UPDATE_EFFECTIVE',
  'CLEANUP_EXPIRED',
  'SET_PRIMARY',
] as const;

export type OperationType = (typeof OPERATION_TYPES)[number];

export function isOperationType(value: unknown): value is OperationType {
  return OPERATION_TYPES.some((t) => t === value);
}

/** Persistence event that can trigger an audit write */
export type AuditEvent = 'insert' | 'update' | 'delete';

export interface AuditRegistration {
  targetType: string;
  events: readonly AuditEvent[];
}

/**
 * Who is doing what, and why. Set on a unit of work before a mutation;
 * consumed by the first matching audit write.
 */
export interface OperationContext {
  businessType: string;
  /** When set, only a mutation of this operation type consumes the context */
  operationType?: OperationType;
  actorId?: string | null;
  actorName?: string | null;
  reason?: string | null;
  requestId?: string | null;
  ip?: string | null;
  /** Overrides the mutation's own before/after snapshots */
  before?: JsonObject | null;
  after?: JsonObject | null;
  metadata?: Record<string, unknown>;
  tenantId?: string | null;
}

/** What a mutation method reports to the recorder after persisting */
export interface AuditMutation {
  businessType: string;
  event: AuditEvent;
  operationType: OperationType;
  targetId: string;
  tenantId: string | null;
  before: JsonObject | null;
  after: JsonObject | null;
}

export interface AuditRecord {
  id: string;
  businessType: string;
  operationType: OperationType;
  targetType: string;
  targetId: string;
  actorId: string | null;
  actorName: string | null;
  reason: string | null;
  requestId: string | null;
  ip: string | null;
  before: JsonObject | null;
  after: JsonObject | null;
  metadata: Record<string, unknown>;
  tenantId: string | null;
  operatedAt: Date;
  /** SHA-512 over the canonical record content */
  eventHash: string;
}

export const AUDIT_DEFAULT_LIMIT = 50;
export const AUDIT_MAX_LIMIT = 200;

export interface AuditQuery {
  tenantId?: string;
  businessType?: string;
  operationType?: OperationType;
  targetId?: string;
  actorId?: string;
  from?: Date;
  to?: Date;
  limit?: number;
  offset?: number;
}
