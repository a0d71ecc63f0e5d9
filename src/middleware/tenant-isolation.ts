// =============================================================================
// RAMPART — Tenant Isolation Middleware
//
// Every /api/tenants/:tenantId route is scoped to the token's tenant. A
// caller may not read or change another tenant's roles or grants.
// =============================================================================

import { Response, NextFunction } from 'express';
import { AuthenticatedRequest } from '../types/auth';

export function enforceTenantIsolation(
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
): void {
  if (!req.user) {
    res.status(401).json({ error: 'Authentication required' });
    return;
  }

  const targetTenant = req.params.tenantId;

  if (targetTenant && targetTenant !== req.user.tenantId) {
    res.status(403).json({
      error: 'Access denied: cross-tenant operation not permitted',
    });
    return;
  }

  next();
}
