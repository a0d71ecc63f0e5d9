// =============================================================================
// RAMPART — Error taxonomy
//
// Every failure the engine surfaces to callers is one of these. Store-specific
// errors are translated at the adapter boundary (src/db/errors.ts) and never
// leak past it.
// =============================================================================

export type AuthzErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CYCLE_DETECTED'
  | 'CONFLICT'
  | 'TENANT_MISMATCH'
  | 'IMMUTABLE_RECORD'
  | 'CONFIGURATION_ERROR';

export abstract class AuthzError extends Error {
  abstract readonly code: AuthzErrorCode;
  /** HTTP status the service layer answers with */
  abstract readonly status: number;

  constructor(message: string, readonly details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad code format, invalid time window, missing required field. */
export class ValidationError extends AuthzError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly status = 400;
}

/** Referenced entity is missing or soft-deleted. */
export class NotFoundError extends AuthzError {
  readonly code = 'NOT_FOUND' as const;
  readonly status = 404;

  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, { entity, id });
  }
}

/** A parent assignment would close a loop in the role graph. */
export class CycleError extends AuthzError {
  readonly code = 'CYCLE_DETECTED' as const;
  readonly status = 409;
}

/** Duplicate active grant or duplicate code. */
export class ConflictError extends AuthzError {
  readonly code = 'CONFLICT' as const;
  readonly status = 409;
}

/** Cross-tenant reference. */
export class TenantMismatchError extends AuthzError {
  readonly code = 'TENANT_MISMATCH' as const;
  readonly status = 409;
}

/** Attempted update or delete of an audit record. */
export class ImmutableRecordError extends AuthzError {
  readonly code = 'IMMUTABLE_RECORD' as const;
  readonly status = 409;
}

/** Registry misuse: unknown, duplicate or late registration of a business type. */
export class ConfigurationError extends AuthzError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly status = 500;
}
