// =============================================================================
// RAMPART — Resolution Engine
//
// Answers "which permissions does this user hold in this tenant at T?" from
// store state on every call; nothing is cached.
//
// Candidate roles are the chains of the user's effective assignments. Every
// candidate keeps its level and its smallest distance from an assigned role.
// In-force RolePermission rows over the candidates are merged per
// permission:
//   1. higher role level wins
//   2. on equal level, the smaller distance (the descendant) wins
//   3. on a remaining tie, an explicit denial wins
// =============================================================================

import { CycleError } from '../../errors';
import type { RolePermission } from '../../types/grants';
import type { Role } from '../../types/roles';
import { errorMessage, log } from '../../utils/log';
import { isTenantActive } from '../catalog/tenants';
import { isPermissionVisible } from '../catalog/permissions';
import { roleChain } from '../roles/chain';
import type { UnitOfWork } from '../unit-of-work';

export interface CandidateRole {
  roleId: string;
  level: number;
  /** Hops from the nearest assigned role; 0 for the assigned role itself */
  distance: number;
}

interface Decision {
  level: number;
  distance: number;
  granted: boolean;
}

/**
 * Roles whose grants count for the user at `at`, or an empty map when the
 * tenant is missing, deleted, disabled or expired.
 */
export async function candidateRoles(
  uow: UnitOfWork,
  userId: string,
  tenantId: string,
  at: Date
): Promise<Map<string, CandidateRole>> {
  const candidates = new Map<string, CandidateRole>();

  const tenant = await uow.session.tenants.findById(tenantId);
  if (!isTenantActive(tenant, at)) return candidates;

  const assignments = await uow.session.userRoles.listEffective(userId, tenantId, at);
  for (const assignment of assignments) {
    let chain: Role[];
    try {
      chain = await roleChain(uow, assignment.roleId);
    } catch (err) {
      if (!(err instanceof CycleError)) throw err;
      log.warn('Resolution', `Dropping role ${assignment.roleId} for user ${userId}: ${errorMessage(err)}`);
      continue;
    }

    chain.forEach((role, distance) => {
      if (role.tenantId !== tenantId) return;
      const known = candidates.get(role.id);
      if (!known || distance < known.distance) {
        candidates.set(role.id, { roleId: role.id, level: role.level, distance });
      }
    });
  }

  return candidates;
}

function outranks(next: Decision, current: Decision): boolean {
  if (next.level !== current.level) return next.level > current.level;
  if (next.distance !== current.distance) return next.distance < current.distance;
  return !next.granted && current.granted;
}

/** Resolved grant state per permission id */
export function mergeGrants(
  rows: RolePermission[],
  candidates: Map<string, CandidateRole>
): Map<string, boolean> {
  const decisions = new Map<string, Decision>();
  for (const row of rows) {
    const candidate = candidates.get(row.roleId);
    if (!candidate) continue;
    const next: Decision = {
      level: candidate.level,
      distance: candidate.distance,
      granted: row.isGranted,
    };
    const current = decisions.get(row.permissionId);
    if (!current || outranks(next, current)) decisions.set(row.permissionId, next);
  }

  const resolved = new Map<string, boolean>();
  for (const [permissionId, decision] of decisions) resolved.set(permissionId, decision.granted);
  return resolved;
}

export async function effectivePermissions(
  uow: UnitOfWork,
  userId: string,
  tenantId: string,
  at: Date = uow.now()
): Promise<Set<string>> {
  const candidates = await candidateRoles(uow, userId, tenantId, at);
  if (candidates.size === 0) return new Set();

  const rows = await uow.session.rolePermissions.listInForce([...candidates.keys()], at);
  const granted = [...mergeGrants(rows, candidates)]
    .filter(([, isGranted]) => isGranted)
    .map(([permissionId]) => permissionId);

  const permissions = await uow.session.permissions.findByIds(granted);
  return new Set(
    permissions.filter((p) => isPermissionVisible(p, tenantId)).map((p) => p.code)
  );
}

export async function hasPermission(
  uow: UnitOfWork,
  userId: string,
  tenantId: string,
  code: string,
  at: Date = uow.now()
): Promise<boolean> {
  const candidates = await candidateRoles(uow, userId, tenantId, at);
  if (candidates.size === 0) return false;

  const permissions = (await uow.session.permissions.findVisibleByCode(tenantId, code)).filter((p) =>
    isPermissionVisible(p, tenantId)
  );
  if (permissions.length === 0) return false;

  const rows = await uow.session.rolePermissions.listInForce(
    [...candidates.keys()],
    at,
    permissions.map((p) => p.id)
  );
  for (const isGranted of mergeGrants(rows, candidates).values()) {
    if (isGranted) return true;
  }
  return false;
}
