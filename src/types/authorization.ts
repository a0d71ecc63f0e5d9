// =============================================================================
// RAMPART — Authorization Provider Interface
//
// The boundary the HTTP guards call. A request names an actor, a tenant and
// a permission code; the result says yes or no, and why. The RBAC provider
// answers from the resolution engine; other backends can sit behind the
// same interface.
// =============================================================================

/**
 * Request to check a single permission.
 */
export interface AuthorizationRequest {
  /** ID of the user requesting access */
  userId: string;

  /** Tenant the check is scoped to */
  tenantId: string;

  /** Permission code, e.g. "grant:manage" */
  permission: string;

  /** Instant to evaluate at; defaults to now */
  at?: Date;
}

/**
 * Result of an authorization decision.
 */
export interface AuthorizationResult {
  /** Whether access is granted */
  granted: boolean;

  /** Which authorization provider made the decision */
  provider: 'rbac';

  /** Reason for denial (if denied). Machine-readable code. */
  denialReason?: 'no_grant';

  auditMetadata: {
    /** How the decision was made */
    method: string;
    /** Timestamp of the decision */
    decidedAt: Date;
    /** Additional provider-specific audit data */
    providerData?: Record<string, unknown>;
  };
}

export interface IAuthorizationProvider {
  /** Human-readable name of this provider (for logging/audit) */
  readonly name: string;

  authorize(request: AuthorizationRequest): Promise<AuthorizationResult>;

  /** Check if this provider's backing store is reachable */
  isAvailable(): Promise<boolean>;

  /**
   * Revoke one role from a user in a tenant.
   * Resolves false when there was nothing to revoke.
   */
  revokeAccess(userId: string, roleId: string, tenantId: string): Promise<boolean>;
}
