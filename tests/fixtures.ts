// =============================================================================
// RAMPART — Engine fixtures
//
// A fresh engine per test over the in-memory store, with a settable clock
// and its own sealed audit registry.
// =============================================================================

import { AuthzEngine, EngineOptions } from '../src/engine';
import { AuditRegistry, registerDefaultAudits } from '../src/services/audit/registry';
import type { OperationContext } from '../src/types/audit';
import type { Permission, Tenant, User } from '../src/types/catalog';
import type { Role } from '../src/types/roles';
import { MemoryStore } from './memory-store';

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Midnight UTC of day n, day 1 being 2026-03-01 */
export function day(n: number): Date {
  return new Date(Date.UTC(2026, 2, 1) + (n - 1) * DAY_MS);
}

export const ADMIN_ID = '00000000-0000-4000-8000-000000000001';

export class TestClock {
  private current: Date;

  constructor(start: Date = day(1)) {
    this.current = start;
  }

  readonly now = (): Date => new Date(this.current.getTime());

  set(at: Date): void {
    this.current = at;
  }
}

export function sealedRegistry(): AuditRegistry {
  const registry = new AuditRegistry();
  registerDefaultAudits(registry);
  registry.seal();
  return registry;
}

export interface Harness {
  store: MemoryStore;
  engine: AuthzEngine;
  clock: TestClock;
}

export function createHarness(options: Omit<EngineOptions, 'clock'> = {}): Harness {
  const store = new MemoryStore();
  const clock = new TestClock();
  const engine = new AuthzEngine(store, {
    registry: options.registry ?? sealedRegistry(),
    auditStrict: options.auditStrict ?? false,
    maxChainDepth: options.maxChainDepth ?? 20,
    sweepBatchSize: options.sweepBatchSize ?? 500,
    clock: clock.now,
  });
  return { store, engine, clock };
}

/** Context for an admin-driven write */
export function asAdmin(businessType: string, extra: Partial<OperationContext> = {}): { context: OperationContext } {
  return { context: { businessType, actorId: ADMIN_ID, actorName: 'Admin', ...extra } };
}

export function seedTenant(engine: AuthzEngine, code = 'acme'): Promise<Tenant> {
  return engine.createTenant({ code, name: `${code} tenant` });
}

export function seedUser(engine: AuthzEngine, username: string): Promise<User> {
  return engine.createUser({ username, status: 'active' });
}

export function seedPermission(engine: AuthzEngine, code: string, tenantId: string | null = null): Promise<Permission> {
  return engine.createPermission({ code, name: code, tenantId });
}

export function seedRole(
  engine: AuthzEngine,
  tenantId: string,
  code: string,
  options: { level?: number; parentId?: string | null } = {}
): Promise<Role> {
  return engine.createRole({ tenantId, code, name: code, ...options });
}
