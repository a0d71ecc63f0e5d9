// =============================================================================
// RAMPART — Test Suite 02: Catalog (tenants, users, permissions)
// =============================================================================

import { ConflictError, NotFoundError, ValidationError } from '../src/errors';
import { parsePermissionCode } from '../src/services/catalog';
import { createHarness, day, Harness, seedPermission, seedTenant, seedUser } from './fixtures';

describe('Catalog', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('Tenants', () => {
    test('create assigns defaults', async () => {
      const tenant = await seedTenant(h.engine, 'acme');
      expect(tenant).toMatchObject({
        code: 'acme',
        name: 'acme tenant',
        tenantType: 'standard',
        isEnabled: true,
        isSystem: false,
        expiresAt: null,
        isDeleted: false,
      });
      expect(tenant.createdAt).toEqual(day(1));
    });

    test('rejects malformed codes', async () => {
      await expect(h.engine.createTenant({ code: 'Acme Corp', name: 'Acme' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    test('rejects a duplicate code among live tenants', async () => {
      await seedTenant(h.engine, 'acme');
      await expect(seedTenant(h.engine, 'acme')).rejects.toBeInstanceOf(ConflictError);
    });

    test('a deleted tenant frees its code', async () => {
      const first = await seedTenant(h.engine, 'acme');
      expect(await h.engine.deleteTenant(first.id)).toBe(true);
      const second = await seedTenant(h.engine, 'acme');
      expect(second.id).not.toBe(first.id);
    });

    test('expiry must lie in the future', async () => {
      await expect(
        h.engine.createTenant({ code: 'trial', name: 'Trial', expiresAt: day(1) })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    test('system tenant cannot expire, be disabled or be deleted', async () => {
      await expect(
        h.engine.createTenant({ code: 'platform', name: 'Platform', isSystem: true, expiresAt: day(30) })
      ).rejects.toBeInstanceOf(ValidationError);

      const platform = await h.engine.createTenant({ code: 'platform', name: 'Platform', isSystem: true });
      await expect(h.engine.disableTenant(platform.id)).rejects.toBeInstanceOf(ValidationError);
      await expect(h.engine.deleteTenant(platform.id)).rejects.toBeInstanceOf(ValidationError);
    });

    test('disable and enable toggle isEnabled', async () => {
      const tenant = await seedTenant(h.engine);
      expect((await h.engine.disableTenant(tenant.id)).isEnabled).toBe(false);
      expect((await h.engine.enableTenant(tenant.id)).isEnabled).toBe(true);
    });

    test('delete is soft and idempotent', async () => {
      const tenant = await seedTenant(h.engine);
      expect(await h.engine.deleteTenant(tenant.id)).toBe(true);
      expect(await h.engine.deleteTenant(tenant.id)).toBe(false);
      expect(await h.engine.getTenant(tenant.id)).toBeNull();
      await expect(h.engine.updateTenant(tenant.id, { name: 'Renamed' })).rejects.toBeInstanceOf(NotFoundError);
    });

    test('update trims the name and keeps unspecified fields', async () => {
      const tenant = await h.engine.createTenant({ code: 'acme', name: 'Acme', tenantType: 'enterprise' });
      const updated = await h.engine.updateTenant(tenant.id, { name: '  Acme Holdings ' });
      expect(updated.name).toBe('Acme Holdings');
      expect(updated.tenantType).toBe('enterprise');
    });
  });

  describe('Users', () => {
    test('create defaults to unverified', async () => {
      const user = await h.engine.createUser({ username: 'alice' });
      expect(user.status).toBe('unverified');
      expect(user.email).toBeNull();
    });

    test('rejects short usernames and bad contact details', async () => {
      await expect(h.engine.createUser({ username: 'al' })).rejects.toBeInstanceOf(ValidationError);
      await expect(h.engine.createUser({ username: 'alice', email: 'not-an-email' })).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(h.engine.createUser({ username: 'alice', mobile: '12' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    test('duplicate username surfaces as ConflictError', async () => {
      await seedUser(h.engine, 'alice');
      await expect(seedUser(h.engine, 'alice')).rejects.toBeInstanceOf(ConflictError);
    });

    test('status changes are validated', async () => {
      const user = await seedUser(h.engine, 'alice');
      expect((await h.engine.updateUserStatus(user.id, 'inactive')).status).toBe('inactive');
      await expect(h.engine.updateUserStatus(user.id, 'banned')).rejects.toBeInstanceOf(ValidationError);
    });

    test('delete closes the account', async () => {
      const user = await seedUser(h.engine, 'alice');
      expect(await h.engine.deleteUser(user.id)).toBe(true);
      expect(await h.engine.getUser(user.id)).toBeNull();
      expect(await h.engine.deleteUser(user.id)).toBe(false);
    });
  });

  describe('Permissions', () => {
    test('codes parse into resource, action and scope', () => {
      expect(parsePermissionCode('article:publish')).toEqual({
        resourceType: 'article',
        action: 'publish',
        scope: null,
      });
      expect(parsePermissionCode('article:edit:own')).toEqual({
        resourceType: 'article',
        action: 'edit',
        scope: 'own',
      });
      expect(() => parsePermissionCode('Article')).toThrow(ValidationError);
      expect(() => parsePermissionCode('article:')).toThrow(ValidationError);
    });

    test('create derives action and resource type from the code', async () => {
      const permission = await seedPermission(h.engine, 'invoice:approve');
      expect(permission).toMatchObject({
        code: 'invoice:approve',
        tenantId: null,
        resourceType: 'invoice',
        action: 'approve',
        isEnabled: true,
      });
    });

    test('tenants see their own and global permissions only', async () => {
      const acme = await seedTenant(h.engine, 'acme');
      const globex = await seedTenant(h.engine, 'globex');
      await seedPermission(h.engine, 'report:read');
      await seedPermission(h.engine, 'invoice:approve', acme.id);
      await seedPermission(h.engine, 'ledger:close', globex.id);

      const codes = (await h.engine.listPermissions(acme.id)).map((p) => p.code);
      expect(codes).toEqual(['invoice:approve', 'report:read']);
    });

    test('the same code may exist globally and per tenant, but not twice in one scope', async () => {
      const acme = await seedTenant(h.engine, 'acme');
      await seedPermission(h.engine, 'report:read');
      await seedPermission(h.engine, 'report:read', acme.id);
      await expect(seedPermission(h.engine, 'report:read')).rejects.toBeInstanceOf(ConflictError);
      await expect(seedPermission(h.engine, 'report:read', acme.id)).rejects.toBeInstanceOf(ConflictError);
    });

    test('system permissions are global and permanent', async () => {
      const acme = await seedTenant(h.engine, 'acme');
      await expect(
        h.engine.createPermission({ code: 'tenant:admin', name: 'Admin', tenantId: acme.id, isSystem: true })
      ).rejects.toBeInstanceOf(ValidationError);

      const system = await h.engine.createPermission({ code: 'tenant:admin', name: 'Admin', isSystem: true });
      await expect(h.engine.disablePermission(system.id)).rejects.toBeInstanceOf(ValidationError);
      await expect(h.engine.deletePermission(system.id)).rejects.toBeInstanceOf(ValidationError);
    });

    test('permissions toggle between disabled and enabled', async () => {
      const read = await seedPermission(h.engine, 'report:read');

      await h.engine.disablePermission(read.id);
      expect((await h.engine.getPermission(read.id))?.isEnabled).toBe(false);

      const enabled = await h.engine.enablePermission(read.id);
      expect(enabled.isEnabled).toBe(true);
      expect(await h.engine.enablePermission(read.id)).toEqual(enabled);
    });

    test('getPermission ignores deleted permissions', async () => {
      const read = await seedPermission(h.engine, 'report:read');
      expect((await h.engine.getPermission(read.id))?.code).toBe('report:read');
      expect(await h.engine.deletePermission(read.id)).toBe(true);
      expect(await h.engine.getPermission(read.id)).toBeNull();
    });

    test('a permission for an unknown tenant is refused', async () => {
      await expect(
        seedPermission(h.engine, 'report:read', '00000000-0000-4000-8000-00000000dead')
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
