// =============================================================================
// RAMPART — RBAC Authorization Provider
//
// Answers authorization requests from the resolution engine: the user holds
// the permission when some effective role assignment in the tenant, through
// its inherited chain, resolves it to granted.
// =============================================================================

import type { AuthzEngine } from '../engine';
import {
  IAuthorizationProvider,
  AuthorizationRequest,
  AuthorizationResult,
} from '../types/authorization';

export class RbacAuthorizationProvider implements IAuthorizationProvider {
  readonly name = 'Role-based access control';

  constructor(private readonly engine: AuthzEngine) {}

  async authorize(request: AuthorizationRequest): Promise<AuthorizationResult> {
    const now = this.engine.now();
    const at = request.at ?? now;

    const granted = await this.engine.hasPermission(
      request.userId,
      request.tenantId,
      request.permission,
      at
    );

    if (!granted) {
      return this.denied('no_grant', now, at);
    }

    return {
      granted: true,
      provider: 'rbac',
      auditMetadata: {
        method: 'role_chain_resolution',
        decidedAt: now,
        providerData: { permission: request.permission, evaluatedAt: at.toISOString() },
      },
    };
  }

  isAvailable(): Promise<boolean> {
    return this.engine.ping();
  }

  revokeAccess(userId: string, roleId: string, tenantId: string): Promise<boolean> {
    return this.engine.revokeUserRole(userId, roleId, tenantId);
  }

  private denied(
    reason: AuthorizationResult['denialReason'],
    now: Date,
    at: Date
  ): AuthorizationResult {
    return {
      granted: false,
      provider: 'rbac',
      denialReason: reason,
      auditMetadata: {
        method: 'role_chain_resolution',
        decidedAt: now,
        providerData: { evaluatedAt: at.toISOString() },
      },
    };
  }
}
