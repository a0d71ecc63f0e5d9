// =============================================================================
// RAMPART — Test Suite 08: Tenant Membership
// =============================================================================

import { NotFoundError, ValidationError } from '../src/errors';
import type { Tenant, User } from '../src/types/catalog';
import { asAdmin, createHarness, day, Harness, seedTenant, seedUser } from './fixtures';

describe('Tenant Membership', () => {
  let h: Harness;
  let acme: Tenant;
  let globex: Tenant;
  let alice: User;

  beforeEach(async () => {
    h = createHarness();
    acme = await seedTenant(h.engine, 'acme');
    globex = await seedTenant(h.engine, 'globex');
    alice = await seedUser(h.engine, 'alice');
  });

  async function primaries(userId: string): Promise<string[]> {
    const tenants = await h.engine.listUserTenants(userId);
    const primary = await h.engine.getPrimaryTenant(userId);
    return tenants.filter((t) => t.id === primary?.id).map((t) => t.code);
  }

  test('assignUser adds a membership, not primary by default', async () => {
    const row = await h.engine.assignUser(acme.id, alice.id);
    expect(row).toMatchObject({ tenantId: acme.id, userId: alice.id, isAssigned: true, isPrimary: false, expiresAt: null });
    expect((await h.engine.listUserTenants(alice.id)).map((t) => t.code)).toEqual(['acme']);
    expect(await h.engine.getPrimaryTenant(alice.id)).toBeNull();
  });

  test('assigning a new primary leaves exactly one primary', async () => {
    await h.engine.assignUser(acme.id, alice.id, { isPrimary: true });
    await h.engine.assignUser(globex.id, alice.id, { isPrimary: true });

    expect((await h.engine.getPrimaryTenant(alice.id))?.code).toBe('globex');
    expect(await primaries(alice.id)).toEqual(['globex']);
    const flags = h.store.tenantUsers.filter((m) => m.userId === alice.id && m.isPrimary);
    expect(flags).toHaveLength(1);
  });

  test('setPrimaryTenant moves the primary', async () => {
    await h.engine.assignUser(acme.id, alice.id, { isPrimary: true });
    await h.engine.assignUser(globex.id, alice.id);

    const row = await h.engine.setPrimaryTenant(alice.id, globex.id, asAdmin('tenant_user'));
    expect(row.isPrimary).toBe(true);
    expect((await h.engine.getPrimaryTenant(alice.id))?.id).toBe(globex.id);
    expect(h.store.auditRecords.map((r) => r.operationType)).toEqual(['SET_PRIMARY']);
  });

  test('setPrimaryTenant on the current primary is a no-op', async () => {
    await h.engine.assignUser(acme.id, alice.id, { isPrimary: true });
    await h.engine.setPrimaryTenant(alice.id, acme.id, asAdmin('tenant_user'));
    expect(h.store.auditRecords).toHaveLength(0);
  });

  test('setPrimaryTenant without a membership is NotFound', async () => {
    await expect(h.engine.setPrimaryTenant(alice.id, acme.id)).rejects.toThrow(NotFoundError);
  });

  test('an expired membership cannot become primary', async () => {
    await h.engine.assignUser(acme.id, alice.id, { expiresAt: day(5) });
    h.clock.set(day(6));

    await expect(h.engine.setPrimaryTenant(alice.id, acme.id)).rejects.toThrow(ValidationError);
    await expect(h.engine.assignUser(acme.id, alice.id, { isPrimary: true })).rejects.toThrow(
      'An expired membership cannot be primary'
    );
  });

  test('expiresAt must lie in the future', async () => {
    h.clock.set(day(5));
    await expect(h.engine.assignUser(acme.id, alice.id, { expiresAt: day(5) })).rejects.toThrow(
      'expiresAt must be in the future'
    );
  });

  test('expired memberships drop out of listUserTenants and getPrimaryTenant', async () => {
    await h.engine.assignUser(acme.id, alice.id, { isPrimary: true, expiresAt: day(5) });
    await h.engine.assignUser(globex.id, alice.id);

    h.clock.set(day(5));
    expect((await h.engine.listUserTenants(alice.id)).map((t) => t.code)).toEqual(['globex']);
    expect(await h.engine.getPrimaryTenant(alice.id)).toBeNull();
  });

  test('disabled tenants are skipped', async () => {
    await h.engine.assignUser(acme.id, alice.id, { isPrimary: true });
    await h.engine.assignUser(globex.id, alice.id);
    await h.engine.disableTenant(acme.id);

    expect((await h.engine.listUserTenants(alice.id)).map((t) => t.code)).toEqual(['globex']);
    expect(await h.engine.getPrimaryTenant(alice.id)).toBeNull();
  });

  test('revokeUser unassigns and clears primary, keeping the row', async () => {
    await h.engine.assignUser(acme.id, alice.id, { isPrimary: true });

    expect(await h.engine.revokeUser(acme.id, alice.id, asAdmin('tenant_user'))).toBe(true);
    expect(await h.engine.listUserTenants(alice.id)).toEqual([]);
    expect(await h.engine.getPrimaryTenant(alice.id)).toBeNull();

    const [row] = h.store.tenantUsers;
    expect(row).toMatchObject({ isAssigned: false, isPrimary: false, isDeleted: false });
    expect(await h.engine.revokeUser(acme.id, alice.id)).toBe(false);
  });

  test('reassigning a revoked membership reuses the row', async () => {
    const first = await h.engine.assignUser(acme.id, alice.id);
    await h.engine.revokeUser(acme.id, alice.id);
    const again = await h.engine.assignUser(acme.id, alice.id);

    expect(again.id).toBe(first.id);
    expect(again.isAssigned).toBe(true);
  });

  test('unknown tenant or user is NotFound', async () => {
    await expect(h.engine.assignUser('00000000-0000-4000-8000-00000000ffff', alice.id)).rejects.toThrow(NotFoundError);
    await expect(h.engine.assignUser(acme.id, '00000000-0000-4000-8000-00000000ffff')).rejects.toThrow(NotFoundError);
  });
});
