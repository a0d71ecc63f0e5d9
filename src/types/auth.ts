// =============================================================================
// RAMPART — Authentication Types
// =============================================================================

import { Request } from 'express';

/** Claims carried by the bearer token. Tokens are issued elsewhere. */
export interface JwtClaims {
  /** User ID */
  sub: string;
  /** Tenant ID the token is scoped to */
  tenant: string;
  /** Display name stamped on audit records */
  name?: string;
}

export interface AuthenticatedUser {
  id: string;
  tenantId: string;
  displayName: string | null;
}

/** Express request extended with authenticated user data */
export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
  requestId?: string;
}
