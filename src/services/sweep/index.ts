// =============================================================================
// RAMPART — Expiry sweep
//
// Flips active grants whose window ended at or before `before` to inactive,
// reason 'expired'. Rows with no end and rows already inactive are never
// touched, so running the sweep twice changes nothing the second time.
//
// Each batch is its own transaction and locks its rows with SKIP LOCKED, so
// concurrent sweeps split the work and a crash leaves only whole batches.
// =============================================================================

import type { OperationContext } from '../../types/audit';
import type { Grant, GrantKind } from '../../types/grants';
import type { ExpiringGrantRepository, StoreSession } from '../../types/store';
import { snapshot } from '../../utils/json';
import { errorMessage, log } from '../../utils/log';
import type { UnitOfWork } from '../unit-of-work';

export interface SweepOptions {
  /** When set, one CLEANUP_EXPIRED record is written per flipped row */
  context?: Omit<OperationContext, 'businessType' | 'operationType'>;
}

export interface UnitOfWorkRunner {
  unitOfWork<T>(fn: (uow: UnitOfWork) => Promise<T>): Promise<T>;
}

export interface SweepResult {
  rolePermissions: number;
  userRoles: number;
  total: number;
}

const SWEPT_KINDS: readonly GrantKind[] = ['role_permission', 'user_role'];

function repositoryFor(session: StoreSession, kind: GrantKind): ExpiringGrantRepository<Grant> {
  return kind === 'role_permission' ? session.rolePermissions : session.userRoles;
}

function expiredCopy(grant: Grant, at: Date): Grant {
  const stamps = { revokedAt: at, revokedBy: null, reason: 'expired', updatedAt: at };
  return grant.kind === 'role_permission'
    ? { ...grant, ...stamps, isGranted: false }
    : { ...grant, ...stamps, isAssigned: false };
}

async function sweepBatch(
  uow: UnitOfWork,
  kind: GrantKind,
  before: Date,
  options: SweepOptions
): Promise<{ locked: number; flipped: number }> {
  const repository = repositoryFor(uow.session, kind);
  const rows = await repository.lockExpired(before, uow.limits.sweepBatchSize);
  if (rows.length === 0) return { locked: 0, flipped: 0 };

  const now = uow.now();
  const flipped = await repository.markExpired(
    rows.map((r) => r.id),
    now
  );

  if (options.context) {
    let audited = 0;
    for (const row of rows) {
      uow.setOperationContext({
        ...options.context,
        businessType: kind,
        operationType: 'CLEANUP_EXPIRED',
      });
      const record = await uow.audit({
        businessType: kind,
        event: 'update',
        operationType: 'CLEANUP_EXPIRED',
        targetId: row.id,
        tenantId: row.tenantId,
        before: snapshot(row),
        after: snapshot(expiredCopy(row, now)),
      });
      if (record) audited += 1;
    }
    log.debug('Sweep', `Audited ${audited}/${rows.length} ${kind} rows`);
  }

  return { locked: rows.length, flipped };
}

/**
 * Sweeps both grant tables in batches. Resolves with the number of rows
 * flipped per table.
 */
export async function sweepExpired(
  runner: UnitOfWorkRunner,
  before: Date,
  options: SweepOptions = {}
): Promise<SweepResult> {
  const counts: Record<GrantKind, number> = { role_permission: 0, user_role: 0 };

  for (const kind of SWEPT_KINDS) {
    for (;;) {
      const batch = await runner.unitOfWork(async (uow) => ({
        limit: uow.limits.sweepBatchSize,
        ...(await sweepBatch(uow, kind, before, options)),
      }));
      counts[kind] += batch.flipped;
      if (batch.locked < batch.limit) break;
    }
  }

  const result: SweepResult = {
    rolePermissions: counts.role_permission,
    userRoles: counts.user_role,
    total: counts.role_permission + counts.user_role,
  };
  if (result.total > 0) {
    log.info('Sweep', `Expired ${result.rolePermissions} role permissions, ${result.userRoles} user roles`);
  }
  return result;
}

/**
 * Runs sweepExpired(now) every intervalMs. Overlapping runs are skipped.
 * Returns a function that stops the timer.
 */
export function startSweepScheduler(
  runner: UnitOfWorkRunner,
  intervalMs: number,
  options: SweepOptions & { clock?: () => Date } = {}
): () => void {
  const clock = options.clock ?? (() => new Date());
  let running = false;

  const tick = async (): Promise<void> => {
    if (running) return;
    running = true;
    try {
      await sweepExpired(runner, clock(), { context: options.context });
    } catch (err) {
      log.error('Sweep', `Sweep failed: ${errorMessage(err)}`);
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    tick().catch((err: unknown) => log.error('Sweep', `Sweep tick failed: ${errorMessage(err)}`));
  }, intervalMs);
  timer.unref();

  log.info('Sweep', `Scheduler started, every ${Math.round(intervalMs / 1000)}s`);
  return () => clearInterval(timer);
}
