// =============================================================================
// RAMPART — Audit Routes
//
// Read-only access to the tenant's audit trail.
//
//   GET /audit  — Query records (audit:read)
//
// Query params:
//   businessType   — e.g. role_permission, user_role
//   operationType  — e.g. GRANT, REVOKE, CLEANUP_EXPIRED
//   targetId       — filter by mutated row
//   actorId        — filter by actor
//   from / to      — ISO datetime (inclusive)
//   limit          — max results (default 50, max 200)
//   offset         — pagination offset
//
// Each record comes back with `verified`: whether its stored hash still
// matches its content.
// =============================================================================

import { Router, Response, NextFunction } from 'express';
import { ValidationError } from '../errors';
import { requirePermission } from '../middleware/require-permission';
import { verifyAuditRecord } from '../services/audit/hash';
import { AUDIT_DEFAULT_LIMIT, AUDIT_MAX_LIMIT, isOperationType } from '../types/audit';
import { AuthenticatedRequest } from '../types/auth';
import { param, queryDate, queryInt, queryString } from './params';
import { RouteDeps } from './roles';

export function createAuditRoutes({ engine, provider }: RouteDeps): Router {
  const router = Router({ mergeParams: true });

  router.get(
    '/audit',
    requirePermission(provider, 'audit:read'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const operationType = queryString(req, 'operationType');
        if (operationType !== undefined && !isOperationType(operationType)) {
          throw new ValidationError(`Unknown operationType "${operationType}"`, { field: 'operationType' });
        }
        const limit = Math.min(queryInt(req, 'limit') || AUDIT_DEFAULT_LIMIT, AUDIT_MAX_LIMIT);
        const offset = queryInt(req, 'offset') || 0;

        const records = await engine.queryAuditRecords({
          tenantId: param(req, 'tenantId'),
          businessType: queryString(req, 'businessType'),
          operationType,
          targetId: queryString(req, 'targetId'),
          actorId: queryString(req, 'actorId'),
          from: queryDate(req, 'from'),
          to: queryDate(req, 'to'),
          limit,
          offset,
        });

        res.json({
          records: records.map((record) => ({ ...record, verified: verifyAuditRecord(record) })),
          limit,
          offset,
        });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
