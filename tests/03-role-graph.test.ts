// =============================================================================
// RAMPART — Test Suite 03: Role Graph
// =============================================================================

import { ConflictError, CycleError, NotFoundError, TenantMismatchError, ValidationError } from '../src/errors';
import type { Tenant } from '../src/types/catalog';
import {
  asAdmin,
  createHarness,
  Harness,
  seedPermission,
  seedRole,
  seedTenant,
  seedUser,
} from './fixtures';

describe('Role Graph', () => {
  let h: Harness;
  let acme: Tenant;

  beforeEach(async () => {
    h = createHarness();
    acme = await seedTenant(h.engine, 'acme');
  });

  describe('Create', () => {
    test('codes are uppercase identifiers', async () => {
      await expect(seedRole(h.engine, acme.id, 'editor')).rejects.toBeInstanceOf(ValidationError);
      const role = await seedRole(h.engine, acme.id, 'EDITOR', { level: 10 });
      expect(role).toMatchObject({ code: 'EDITOR', level: 10, roleType: 'custom', parentId: null, isEnabled: true });
    });

    test('codes are unique per tenant only', async () => {
      const globex = await seedTenant(h.engine, 'globex');
      await seedRole(h.engine, acme.id, 'EDITOR');
      await expect(seedRole(h.engine, acme.id, 'EDITOR')).rejects.toBeInstanceOf(ConflictError);
      await expect(seedRole(h.engine, globex.id, 'EDITOR')).resolves.toMatchObject({ tenantId: globex.id });
    });

    test('level must be a non-negative integer', async () => {
      await expect(seedRole(h.engine, acme.id, 'EDITOR', { level: -1 })).rejects.toBeInstanceOf(ValidationError);
      await expect(seedRole(h.engine, acme.id, 'EDITOR', { level: 1.5 })).rejects.toBeInstanceOf(ValidationError);
    });

    test('system roles are roots and never default', async () => {
      const admin = await h.engine.createRole({ tenantId: acme.id, code: 'ADMIN', name: 'Admin', isSystem: true });
      expect(admin.roleType).toBe('system');
      await expect(
        h.engine.createRole({ tenantId: acme.id, code: 'OWNER', name: 'Owner', isSystem: true, isDefault: true })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        h.engine.createRole({ tenantId: acme.id, code: 'ROOT', name: 'Root', isSystem: true, parentId: admin.id })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(h.engine.disableRole(admin.id)).rejects.toBeInstanceOf(ValidationError);
      await expect(h.engine.deleteRole(admin.id)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('Parent links', () => {
    test('a role cannot be its own parent', async () => {
      const role = await seedRole(h.engine, acme.id, 'EDITOR');
      await expect(h.engine.setRoleParent(role.id, role.id)).rejects.toBeInstanceOf(CycleError);
    });

    test('closing a loop is refused and leaves the graph untouched', async () => {
      const a = await seedRole(h.engine, acme.id, 'A');
      const b = await seedRole(h.engine, acme.id, 'B', { parentId: a.id });
      const c = await seedRole(h.engine, acme.id, 'C', { parentId: b.id });

      await expect(h.engine.setRoleParent(a.id, c.id)).rejects.toBeInstanceOf(CycleError);
      expect((await h.engine.getRole(a.id))?.parentId).toBeNull();
      expect((await h.engine.roleChain(c.id)).map((r) => r.code)).toEqual(['C', 'B', 'A']);
    });

    test('a disabled ancestor still closes a loop', async () => {
      const a = await seedRole(h.engine, acme.id, 'A');
      const b = await seedRole(h.engine, acme.id, 'B', { parentId: a.id });
      await h.engine.disableRole(a.id);
      await expect(h.engine.setRoleParent(a.id, b.id)).rejects.toBeInstanceOf(CycleError);
    });

    test('parent must exist and live in the same tenant', async () => {
      const globex = await seedTenant(h.engine, 'globex');
      const role = await seedRole(h.engine, acme.id, 'EDITOR');
      const foreign = await seedRole(h.engine, globex.id, 'CHIEF');

      await expect(h.engine.setRoleParent(role.id, foreign.id)).rejects.toBeInstanceOf(TenantMismatchError);
      await expect(
        h.engine.setRoleParent(role.id, '00000000-0000-4000-8000-00000000beef')
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    test('chains deeper than maxChainDepth are refused', async () => {
      h = createHarness({ maxChainDepth: 3 });
      acme = await seedTenant(h.engine, 'acme');
      const r0 = await seedRole(h.engine, acme.id, 'R0');
      const r1 = await seedRole(h.engine, acme.id, 'R1', { parentId: r0.id });
      const r2 = await seedRole(h.engine, acme.id, 'R2', { parentId: r1.id });
      const r3 = await seedRole(h.engine, acme.id, 'R3', { parentId: r2.id });

      await expect(seedRole(h.engine, acme.id, 'R4', { parentId: r3.id })).rejects.toBeInstanceOf(CycleError);
      expect(await h.engine.roleChain(r3.id)).toHaveLength(4);
    });

    test('moving a role counts the depth of its descendants', async () => {
      h = createHarness({ maxChainDepth: 3 });
      acme = await seedTenant(h.engine, 'acme');
      const a = await seedRole(h.engine, acme.id, 'A');
      const b = await seedRole(h.engine, acme.id, 'B', { parentId: a.id });
      const c = await seedRole(h.engine, acme.id, 'C');
      const d = await seedRole(h.engine, acme.id, 'D', { parentId: c.id });
      const e = await seedRole(h.engine, acme.id, 'E', { parentId: d.id });

      await expect(h.engine.setRoleParent(c.id, b.id)).rejects.toBeInstanceOf(CycleError);
      expect((await h.engine.roleChain(e.id)).map((r) => r.code)).toEqual(['E', 'D', 'C']);

      await h.engine.setRoleParent(e.id, null);
      await h.engine.setRoleParent(c.id, b.id);
      expect((await h.engine.roleChain(d.id)).map((r) => r.code)).toEqual(['D', 'C', 'B', 'A']);
    });

    test('clearing the parent makes the role a root', async () => {
      const a = await seedRole(h.engine, acme.id, 'A');
      const b = await seedRole(h.engine, acme.id, 'B', { parentId: a.id });
      const updated = await h.engine.setRoleParent(b.id, null);
      expect(updated.parentId).toBeNull();
    });
  });

  describe('Chains', () => {
    test('stop below a disabled ancestor', async () => {
      const a = await seedRole(h.engine, acme.id, 'A');
      const b = await seedRole(h.engine, acme.id, 'B', { parentId: a.id });
      const c = await seedRole(h.engine, acme.id, 'C', { parentId: b.id });

      await h.engine.disableRole(b.id);
      expect((await h.engine.roleChain(c.id)).map((r) => r.code)).toEqual(['C']);
    });

    test('are empty for a disabled or unknown role', async () => {
      const a = await seedRole(h.engine, acme.id, 'A');
      await h.engine.disableRole(a.id);
      expect(await h.engine.roleChain(a.id)).toEqual([]);
      expect(await h.engine.roleChain('00000000-0000-4000-8000-00000000beef')).toEqual([]);
    });
  });

  describe('Delete', () => {
    test('retires grants and assignments and detaches children', async () => {
      const parent = await seedRole(h.engine, acme.id, 'PARENT');
      const child = await seedRole(h.engine, acme.id, 'CHILD', { parentId: parent.id });
      const permission = await seedPermission(h.engine, 'report:read');
      const user = await seedUser(h.engine, 'alice');

      await h.engine.grantRolePermission({ roleId: parent.id, permissionId: permission.id });
      await h.engine.assignUserRole({ userId: user.id, roleId: parent.id, tenantId: acme.id });

      expect(await h.engine.deleteRole(parent.id, asAdmin('role'))).toBe(true);

      expect(await h.engine.getRole(parent.id)).toBeNull();
      expect(await h.engine.listRolePermissions(parent.id)).toEqual([]);
      expect(await h.engine.listUserRoles(user.id, acme.id)).toEqual([]);
      expect((await h.engine.getRole(child.id))?.parentId).toBeNull();
      expect(await h.engine.deleteRole(parent.id)).toBe(false);

      const [record] = h.store.auditRecords.filter((r) => r.operationType === 'DELETE');
      expect(record.after).toMatchObject({ cascade: { rolePermissions: 1, userRoles: 1, children: 1 } });
    });

    test('frees the code for reuse', async () => {
      const role = await seedRole(h.engine, acme.id, 'EDITOR');
      await h.engine.deleteRole(role.id);
      await expect(seedRole(h.engine, acme.id, 'EDITOR')).resolves.toMatchObject({ code: 'EDITOR' });
    });
  });

  describe('Listing', () => {
    test('tree nests children under their parents', async () => {
      const a = await seedRole(h.engine, acme.id, 'A', { level: 10 });
      await seedRole(h.engine, acme.id, 'B', { parentId: a.id, level: 5 });
      await seedRole(h.engine, acme.id, 'C', { level: 1 });

      const tree = await h.engine.getRoleTree(acme.id);
      expect(tree.map((n) => n.role.code)).toEqual(['A', 'C']);
      expect(tree[0].children.map((n) => n.role.code)).toEqual(['B']);
    });

    test('default roles are enabled defaults, highest level first', async () => {
      await h.engine.createRole({ tenantId: acme.id, code: 'MEMBER', name: 'Member', level: 1, isDefault: true });
      await h.engine.createRole({ tenantId: acme.id, code: 'VIEWER', name: 'Viewer', level: 2, isDefault: true });
      const off = await h.engine.createRole({ tenantId: acme.id, code: 'GUEST', name: 'Guest', isDefault: true });
      await h.engine.disableRole(off.id);
      await seedRole(h.engine, acme.id, 'EDITOR', { level: 10 });

      expect((await h.engine.getDefaultRoles(acme.id)).map((r) => r.code)).toEqual(['VIEWER', 'MEMBER']);
    });

    test('enable and disable are audited as their own operations', async () => {
      const role = await seedRole(h.engine, acme.id, 'EDITOR');
      await h.engine.disableRole(role.id, asAdmin('role'));
      const enabled = await h.engine.enableRole(role.id, asAdmin('role'));

      expect(enabled.isEnabled).toBe(true);
      expect(h.store.auditRecords.map((r) => r.operationType)).toEqual(['DISABLE', 'ENABLE']);
      await h.engine.enableRole(role.id, asAdmin('role'));
      expect(h.store.auditRecords).toHaveLength(2);
    });

    test('listRoles filters on enabled', async () => {
      await seedRole(h.engine, acme.id, 'A');
      const b = await seedRole(h.engine, acme.id, 'B');
      await h.engine.disableRole(b.id);
      expect((await h.engine.listRoles(acme.id, { enabled: true })).map((r) => r.code)).toEqual(['A']);
      expect(await h.engine.listRoles(acme.id)).toHaveLength(2);
    });
  });
});
