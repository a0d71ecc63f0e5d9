import type { UnitOfWork } from '../unit-of-work';

/**
 * Runs fn per item, re-arming the operation context before each one so a
 * batch writes one audit record per item rather than one in total. The
 * operationType pin and snapshot overrides are dropped: a sync mixes grants
 * and revokes, and each item carries its own before/after.
 */
export async function forEachWithContext<T>(
  uow: UnitOfWork,
  items: readonly T[],
  fn: (item: T) => Promise<void>
): Promise<void> {
  const context = uow.operationContext;
  for (const item of items) {
    if (context) {
      uow.setOperationContext({ ...context, operationType: undefined, before: undefined, after: undefined });
    }
    await fn(item);
  }
  if (context) uow.clearOperationContext();
}
