// =============================================================================
// RAMPART — Role chain walking
//
// Both walks are bounded by limits.maxChainDepth parent hops.
//
// roleChain:      [role, parent, grandparent, ...] for inheritance. Stops
//                 before the first ancestor that is missing, deleted or
//                 disabled; that ancestor and everything above it are out.
// assertParentOk: refuses a parent link that would close a loop, or push
//                 the chain of the moved role or any of its descendants
//                 past the depth cap.
// =============================================================================

import { CycleError } from '../../errors';
import type { Role } from '../../types/roles';
import type { UnitOfWork } from '../unit-of-work';

export function isRoleUsable(role: Role | null): role is Role {
  return role !== null && !role.isDeleted && role.isEnabled;
}

export async function roleChain(uow: UnitOfWork, roleId: string): Promise<Role[]> {
  const start = await uow.session.roles.findById(roleId);
  if (!isRoleUsable(start)) return [];

  const chain: Role[] = [start];
  const seen = new Set<string>([start.id]);
  let current = start;

  while (current.parentId !== null && chain.length - 1 < uow.limits.maxChainDepth) {
    if (seen.has(current.parentId)) {
      throw new CycleError(`Role chain of ${roleId} revisits role ${current.parentId}`, {
        roleId,
        revisited: current.parentId,
      });
    }
    const parent = await uow.session.roles.findById(current.parentId);
    if (!isRoleUsable(parent)) break;
    chain.push(parent);
    seen.add(parent.id);
    current = parent;
  }

  return chain;
}

/** Levels of live descendants below roleId, counting stops once past `budget` */
async function subtreeHeight(uow: UnitOfWork, roleId: string, budget: number): Promise<number> {
  const seen = new Set<string>([roleId]);
  let level = [roleId];
  let height = 0;

  while (height <= budget) {
    const children = (await uow.session.roles.listChildren(level)).filter((r) => !seen.has(r.id));
    if (children.length === 0) break;
    children.forEach((r) => seen.add(r.id));
    level = children.map((r) => r.id);
    height += 1;
  }
  return height;
}

/**
 * Walks upward from the proposed parent, then downward from the role being
 * moved. Ancestors are followed whatever their enabled state: a disabled role
 * still closes a loop. The deepest descendant's chain after the move must fit
 * within limits.maxChainDepth hops.
 */
export async function assertParentOk(uow: UnitOfWork, roleId: string, parent: Role): Promise<void> {
  const max = uow.limits.maxChainDepth;
  const seen = new Set<string>();
  let current: Role | null = parent;
  let above = 0;

  while (current) {
    if (current.id === roleId || seen.has(current.id)) {
      throw new CycleError(`Setting parent ${parent.id} on role ${roleId} would create a cycle`, {
        roleId,
        parentId: parent.id,
      });
    }
    seen.add(current.id);
    if (current.parentId === null) break;

    above += 1;
    if (above >= max) {
      throw new CycleError(`Role chain above ${parent.id} exceeds ${max} levels`, {
        roleId,
        parentId: parent.id,
        maxChainDepth: max,
      });
    }
    current = await uow.session.roles.findById(current.parentId);
  }

  const budget = max - above - 1;
  const below = await subtreeHeight(uow, roleId, budget);
  if (below > budget) {
    throw new CycleError(
      `Moving role ${roleId} under ${parent.id} would put its descendants more than ${max} levels deep`,
      { roleId, parentId: parent.id, maxChainDepth: max }
    );
  }
}
