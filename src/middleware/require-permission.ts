// =============================================================================
// RAMPART — Permission Guard Middleware
//
// Verifies the authenticated caller holds a permission in the route's
// tenant. Used on individual routes: requirePermission(provider, 'grant:manage')
// =============================================================================

import { Response, NextFunction, RequestHandler } from 'express';
import { AuthenticatedRequest } from '../types/auth';
import { IAuthorizationProvider } from '../types/authorization';

/**
 * Returns middleware that asks the provider whether the caller holds
 * `permission` in their tenant. Must be used AFTER authenticate.
 */
export function requirePermission(provider: IAuthorizationProvider, permission: string): RequestHandler {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const user = req.user;
    if (!user) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    provider
      .authorize({ userId: user.id, tenantId: user.tenantId, permission })
      .then((result) => {
        if (!result.granted) {
          res.status(403).json({
            error: 'Insufficient permissions',
            required: permission,
            reason: result.denialReason,
          });
          return;
        }
        next();
      })
      .catch(next);
  };
}
