// =============================================================================
// RAMPART — Grant Routes
//
// Mounted under /api/tenants/:tenantId (tenant isolation applied upstream).
//
//   POST   /roles/:roleId/permissions                 — Grant    (grant:manage)
//   DELETE /roles/:roleId/permissions/:permissionId   — Revoke   (grant:manage)
//   POST   /users/:userId/roles                       — Assign   (grant:manage)
//   DELETE /users/:userId/roles/:roleId               — Unassign (grant:manage)
//   GET    /users/:userId/permissions                 — Effective set  (grant:read)
//   GET    /users/:userId/permissions/:code           — Single check   (grant:read)
//
// Both GETs accept ?at=<ISO datetime> to evaluate at another instant.
// =============================================================================

import { Router, Response, NextFunction } from 'express';
import { requirePermission } from '../middleware/require-permission';
import { AuthenticatedRequest } from '../types/auth';
import { bodyOf, contextFor, optionalDate, optionalString, param, queryDate, requiredString } from './params';
import { RouteDeps, roleInTenant } from './roles';

export function createGrantRoutes({ engine, provider }: RouteDeps): Router {
  const router = Router({ mergeParams: true });

  /**
   * POST /roles/:roleId/permissions
   * Body: { permissionId, effectiveFrom?, effectiveTo?, reason? }
   */
  router.post(
    '/roles/:roleId/permissions',
    requirePermission(provider, 'grant:manage'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const body = bodyOf(req);
        const roleId = param(req, 'roleId');
        await roleInTenant(engine, roleId, param(req, 'tenantId'));

        const reason = optionalString(body, 'reason');
        const grant = await engine.grantRolePermission(
          {
            roleId,
            permissionId: requiredString(body, 'permissionId'),
            effectiveFrom: optionalDate(body, 'effectiveFrom'),
            effectiveTo: optionalDate(body, 'effectiveTo'),
            reason,
          },
          { context: contextFor(req, 'role_permission', reason) }
        );
        res.status(201).json({ grant });
      } catch (err) {
        next(err);
      }
    }
  );

  router.delete(
    '/roles/:roleId/permissions/:permissionId',
    requirePermission(provider, 'grant:manage'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const roleId = param(req, 'roleId');
        await roleInTenant(engine, roleId, param(req, 'tenantId'));

        const reason = optionalString(bodyOf(req), 'reason');
        const revoked = await engine.revokeRolePermission(roleId, param(req, 'permissionId'), {
          context: contextFor(req, 'role_permission', reason),
          reason,
        });
        res.json({ revoked });
      } catch (err) {
        next(err);
      }
    }
  );

  /**
   * POST /users/:userId/roles
   * Body: { roleId, effectiveFrom?, effectiveTo?, reason? }
   */
  router.post(
    '/users/:userId/roles',
    requirePermission(provider, 'grant:manage'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const body = bodyOf(req);
        const reason = optionalString(body, 'reason');
        const assignment = await engine.assignUserRole(
          {
            userId: param(req, 'userId'),
            roleId: requiredString(body, 'roleId'),
            tenantId: param(req, 'tenantId'),
            effectiveFrom: optionalDate(body, 'effectiveFrom'),
            effectiveTo: optionalDate(body, 'effectiveTo'),
            reason,
          },
          { context: contextFor(req, 'user_role', reason) }
        );
        res.status(201).json({ assignment });
      } catch (err) {
        next(err);
      }
    }
  );

  router.delete(
    '/users/:userId/roles/:roleId',
    requirePermission(provider, 'grant:manage'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const reason = optionalString(bodyOf(req), 'reason');
        const revoked = await engine.revokeUserRole(
          param(req, 'userId'),
          param(req, 'roleId'),
          param(req, 'tenantId'),
          { context: contextFor(req, 'user_role', reason), reason }
        );
        res.json({ revoked });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get(
    '/users/:userId/permissions',
    requirePermission(provider, 'grant:read'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const permissions = await engine.effectivePermissions(
          param(req, 'userId'),
          param(req, 'tenantId'),
          queryDate(req, 'at')
        );
        res.json({ permissions: [...permissions].sort() });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get(
    '/users/:userId/permissions/:code',
    requirePermission(provider, 'grant:read'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const code = param(req, 'code');
        const granted = await engine.hasPermission(
          param(req, 'userId'),
          param(req, 'tenantId'),
          code,
          queryDate(req, 'at')
        );
        res.json({ permission: code, granted });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
