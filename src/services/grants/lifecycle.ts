// =============================================================================
// RAMPART — Grant lifecycle rules
//
// Windows are half-open: a grant covers T when effectiveFrom <= T and
// T < effectiveTo, with a null bound read as unbounded on that side.
//
//   effective at T: flag on, not deleted, window covers T
//   in force at T:  not deleted, window covers T (flag off = explicit denial)
// =============================================================================

import { ValidationError } from '../../errors';
import type { Grant, GrantWindow } from '../../types/grants';

export interface ResolvedWindow {
  effectiveFrom: Date | null;
  effectiveTo: Date | null;
}

export function isActive(grant: Grant): boolean {
  return grant.kind === 'role_permission' ? grant.isGranted : grant.isAssigned;
}

export function windowCovers(window: ResolvedWindow, at: Date): boolean {
  return (
    (window.effectiveFrom === null || window.effectiveFrom <= at) &&
    (window.effectiveTo === null || at < window.effectiveTo)
  );
}

export function isEffectiveAt(grant: Grant, at: Date): boolean {
  return isActive(grant) && !grant.isDeleted && windowCovers(grant, at);
}

export function isInForce(grant: Grant, at: Date): boolean {
  return !grant.isDeleted && windowCovers(grant, at);
}

export function isExpired(grant: Grant, at: Date): boolean {
  return grant.effectiveTo !== null && grant.effectiveTo <= at;
}

/** Active and not yet past its end; a second grant for the triple would conflict */
export function isCurrentOrFuture(grant: Grant, at: Date): boolean {
  return isActive(grant) && !grant.isDeleted && !isExpired(grant, at);
}

export function validateWindow(window: ResolvedWindow): ResolvedWindow {
  const { effectiveFrom, effectiveTo } = window;
  if (effectiveFrom && Number.isNaN(effectiveFrom.getTime())) {
    throw new ValidationError('effectiveFrom is not a valid date', { field: 'effectiveFrom' });
  }
  if (effectiveTo && Number.isNaN(effectiveTo.getTime())) {
    throw new ValidationError('effectiveTo is not a valid date', { field: 'effectiveTo' });
  }
  if (effectiveFrom && effectiveTo && effectiveFrom >= effectiveTo) {
    throw new ValidationError('effectiveFrom must be before effectiveTo', {
      effectiveFrom: effectiveFrom.toISOString(),
      effectiveTo: effectiveTo.toISOString(),
    });
  }
  return window;
}

/** Window for a fresh grant: unspecified bounds are open */
export function newWindow(window: GrantWindow): ResolvedWindow {
  return validateWindow({
    effectiveFrom: window.effectiveFrom ?? null,
    effectiveTo: window.effectiveTo ?? null,
  });
}

/** Window for an update: undefined keeps the stored bound, null clears it */
export function mergeWindow(current: ResolvedWindow, patch: GrantWindow): ResolvedWindow {
  return validateWindow({
    effectiveFrom: patch.effectiveFrom === undefined ? current.effectiveFrom : patch.effectiveFrom,
    effectiveTo: patch.effectiveTo === undefined ? current.effectiveTo : patch.effectiveTo,
  });
}
