// =============================================================================
// RAMPART — Role Routes
//
// Mounted under /api/tenants/:tenantId (tenant isolation applied upstream).
//
//   GET    /roles                     — List roles            (grant:read)
//   POST   /roles                     — Create role           (role:manage)
//   PATCH  /roles/:roleId/parent      — Set or clear parent   (role:manage)
//   DELETE /roles/:roleId             — Soft-delete role      (role:manage)
// =============================================================================

import { Router, Response, NextFunction } from 'express';
import type { AuthzEngine } from '../engine';
import { NotFoundError } from '../errors';
import { requirePermission } from '../middleware/require-permission';
import { AuthenticatedRequest } from '../types/auth';
import { IAuthorizationProvider } from '../types/authorization';
import type { Role } from '../types/roles';
import {
  bodyOf,
  contextFor,
  optionalBoolean,
  optionalInt,
  optionalString,
  param,
  requiredString,
} from './params';

export interface RouteDeps {
  engine: AuthzEngine;
  provider: IAuthorizationProvider;
}

/** The role, provided it lives in the route's tenant */
export async function roleInTenant(engine: AuthzEngine, roleId: string, tenantId: string): Promise<Role> {
  const role = await engine.getRole(roleId);
  if (!role || role.tenantId !== tenantId) throw new NotFoundError('Role', roleId);
  return role;
}

export function createRoleRoutes({ engine, provider }: RouteDeps): Router {
  const router = Router({ mergeParams: true });

  router.get(
    '/roles',
    requirePermission(provider, 'grant:read'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const roles = await engine.listRoles(param(req, 'tenantId'));
        res.json({ roles });
      } catch (err) {
        next(err);
      }
    }
  );

  /**
   * POST /roles
   * Body: { code, name, level?, parentId?, roleType?, description?, isDefault?, reason? }
   */
  router.post(
    '/roles',
    requirePermission(provider, 'role:manage'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const body = bodyOf(req);
        const role = await engine.createRole(
          {
            tenantId: param(req, 'tenantId'),
            code: requiredString(body, 'code'),
            name: requiredString(body, 'name'),
            level: optionalInt(body, 'level'),
            parentId: optionalString(body, 'parentId') ?? null,
            roleType: optionalString(body, 'roleType'),
            description: optionalString(body, 'description') ?? null,
            isDefault: optionalBoolean(body, 'isDefault'),
          },
          { context: contextFor(req, 'role', optionalString(body, 'reason')) }
        );
        res.status(201).json({ role });
      } catch (err) {
        next(err);
      }
    }
  );

  /**
   * PATCH /roles/:roleId/parent
   * Body: { parentId: string | null, reason? }
   */
  router.patch(
    '/roles/:roleId/parent',
    requirePermission(provider, 'role:manage'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const body = bodyOf(req);
        const tenantId = param(req, 'tenantId');
        const roleId = param(req, 'roleId');
        await roleInTenant(engine, roleId, tenantId);

        const role = await engine.setRoleParent(roleId, optionalString(body, 'parentId') ?? null, {
          context: contextFor(req, 'role', optionalString(body, 'reason')),
        });
        res.json({ role });
      } catch (err) {
        next(err);
      }
    }
  );

  router.delete(
    '/roles/:roleId',
    requirePermission(provider, 'role:manage'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const tenantId = param(req, 'tenantId');
        const roleId = param(req, 'roleId');
        await roleInTenant(engine, roleId, tenantId);

        await engine.deleteRole(roleId, { context: contextFor(req, 'role') });
        res.status(204).end();
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
