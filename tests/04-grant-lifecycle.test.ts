// =============================================================================
// RAMPART — Test Suite 04: Grant Lifecycle
// =============================================================================

import { ConflictError, NotFoundError, TenantMismatchError, ValidationError } from '../src/errors';
import { isEffectiveAt, isExpired, isInForce, windowCovers } from '../src/services/grants';
import type { Permission, Tenant, User } from '../src/types/catalog';
import type { Role } from '../src/types/roles';
import {
  ADMIN_ID,
  asAdmin,
  createHarness,
  day,
  Harness,
  seedPermission,
  seedRole,
  seedTenant,
  seedUser,
} from './fixtures';

describe('Grant Lifecycle', () => {
  let h: Harness;
  let acme: Tenant;
  let editor: Role;
  let publish: Permission;
  let alice: User;

  beforeEach(async () => {
    h = createHarness();
    acme = await seedTenant(h.engine, 'acme');
    editor = await seedRole(h.engine, acme.id, 'EDITOR', { level: 10 });
    publish = await seedPermission(h.engine, 'article:publish');
    alice = await seedUser(h.engine, 'alice');
  });

  describe('Windows', () => {
    test('are half-open with open null bounds', () => {
      const window = { effectiveFrom: day(1), effectiveTo: day(10) };
      expect(windowCovers(window, day(1))).toBe(true);
      expect(windowCovers(window, day(9))).toBe(true);
      expect(windowCovers(window, day(10))).toBe(false);
      expect(windowCovers({ effectiveFrom: null, effectiveTo: null }, day(100))).toBe(true);
    });

    test('must start before they end', async () => {
      await expect(
        h.engine.grantRolePermission({
          roleId: editor.id,
          permissionId: publish.id,
          effectiveFrom: day(5),
          effectiveTo: day(5),
        })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('RolePermission', () => {
    test('grant stamps the actor and time', async () => {
      const grant = await h.engine.grantRolePermission(
        { roleId: editor.id, permissionId: publish.id, reason: 'launch' },
        asAdmin('role_permission')
      );
      expect(grant).toMatchObject({
        kind: 'role_permission',
        tenantId: acme.id,
        isGranted: true,
        grantedBy: ADMIN_ID,
        grantedAt: day(1),
        reason: 'launch',
      });
      expect(isEffectiveAt(grant, day(1))).toBe(true);
    });

    test('a second grant over a live one conflicts', async () => {
      await h.engine.grantRolePermission({
        roleId: editor.id,
        permissionId: publish.id,
        effectiveFrom: day(1),
        effectiveTo: day(10),
      });
      await expect(
        h.engine.grantRolePermission({
          roleId: editor.id,
          permissionId: publish.id,
          effectiveFrom: day(5),
          effectiveTo: day(20),
        })
      ).rejects.toBeInstanceOf(ConflictError);
    });

    test('a future-dated grant also blocks a second one', async () => {
      await h.engine.grantRolePermission({ roleId: editor.id, permissionId: publish.id, effectiveFrom: day(30) });
      await expect(
        h.engine.grantRolePermission({ roleId: editor.id, permissionId: publish.id })
      ).rejects.toBeInstanceOf(ConflictError);
    });

    test('revoke flips the flag once', async () => {
      await h.engine.grantRolePermission({ roleId: editor.id, permissionId: publish.id });
      expect(
        await h.engine.revokeRolePermission(editor.id, publish.id, { ...asAdmin('role_permission'), reason: 'rotation' })
      ).toBe(true);
      expect(await h.engine.revokeRolePermission(editor.id, publish.id)).toBe(false);

      const [row] = await h.engine.listRolePermissions(editor.id);
      expect(row).toMatchObject({ isGranted: false, revokedBy: ADMIN_ID, revokedAt: day(1), reason: 'rotation' });
      expect(isInForce(row, day(1))).toBe(true);
      expect(isEffectiveAt(row, day(1))).toBe(false);
    });

    test('revoking something never granted is a no-op', async () => {
      expect(await h.engine.revokeRolePermission(editor.id, publish.id)).toBe(false);
      expect(await h.engine.revokeRolePermission('00000000-0000-4000-8000-00000000beef', publish.id)).toBe(false);
    });

    test('granting again reinstates the same row', async () => {
      const first = await h.engine.grantRolePermission({ roleId: editor.id, permissionId: publish.id });
      await h.engine.revokeRolePermission(editor.id, publish.id);
      h.clock.set(day(2));
      const second = await h.engine.grantRolePermission({ roleId: editor.id, permissionId: publish.id });

      expect(second.id).toBe(first.id);
      expect(second).toMatchObject({ isGranted: true, revokedAt: null, revokedBy: null, grantedAt: day(2) });
      expect(await h.engine.listRolePermissions(editor.id)).toHaveLength(1);
    });

    test('an expired grant can be renewed', async () => {
      await h.engine.grantRolePermission({
        roleId: editor.id,
        permissionId: publish.id,
        effectiveFrom: day(1),
        effectiveTo: day(3),
      });
      h.clock.set(day(5));
      const renewed = await h.engine.grantRolePermission(
        { roleId: editor.id, permissionId: publish.id, effectiveTo: day(30) },
        asAdmin('role_permission')
      );
      expect(renewed).toMatchObject({ effectiveFrom: null, effectiveTo: day(30), isGranted: true });
      expect(h.store.auditRecords.map((r) => r.operationType)).toEqual(['RENEW']);
    });

    test('activate needs an existing row and reports whether it changed', async () => {
      await expect(h.engine.activateRolePermission(editor.id, publish.id)).rejects.toBeInstanceOf(NotFoundError);

      await h.engine.grantRolePermission({ roleId: editor.id, permissionId: publish.id });
      expect(await h.engine.activateRolePermission(editor.id, publish.id)).toBe(false);
      await h.engine.revokeRolePermission(editor.id, publish.id);
      expect(await h.engine.activateRolePermission(editor.id, publish.id)).toBe(true);
    });

    test('window updates keep undefined bounds and clear null ones', async () => {
      await h.engine.grantRolePermission({
        roleId: editor.id,
        permissionId: publish.id,
        effectiveFrom: day(1),
        effectiveTo: day(10),
      });
      const extended = await h.engine.updateRolePermissionWindow(editor.id, publish.id, { effectiveTo: day(20) });
      expect(extended).toMatchObject({ effectiveFrom: day(1), effectiveTo: day(20) });

      const open = await h.engine.updateRolePermissionWindow(editor.id, publish.id, { effectiveTo: null });
      expect(open.effectiveTo).toBeNull();
      expect(isExpired(open, day(100))).toBe(false);

      await expect(
        h.engine.updateRolePermissionWindow(editor.id, publish.id, { effectiveFrom: day(50), effectiveTo: day(40) })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    test("a tenant's permission cannot be granted to another tenant's role", async () => {
      const globex = await seedTenant(h.engine, 'globex');
      const ledger = await seedPermission(h.engine, 'ledger:close', globex.id);
      await expect(
        h.engine.grantRolePermission({ roleId: editor.id, permissionId: ledger.id })
      ).rejects.toBeInstanceOf(TenantMismatchError);
    });

    test('bulk grant skips permissions already held', async () => {
      const edit = await seedPermission(h.engine, 'article:edit');
      const read = await seedPermission(h.engine, 'article:read');
      await h.engine.grantRolePermission({ roleId: editor.id, permissionId: publish.id });

      const created = await h.engine.bulkGrantRolePermissions(editor.id, [publish.id, edit.id, read.id, edit.id]);
      expect(created.map((g) => g.permissionId)).toEqual([edit.id, read.id]);
    });

    test('bulk grant writes one audit record per row under one context', async () => {
      const edit = await seedPermission(h.engine, 'article:edit');
      await h.engine.bulkGrantRolePermissions(editor.id, [publish.id, edit.id], {}, asAdmin('role_permission'));
      expect(h.store.auditRecords.map((r) => [r.operationType, r.actorId])).toEqual([
        ['GRANT', ADMIN_ID],
        ['GRANT', ADMIN_ID],
      ]);
    });

    test('bulk grant undoes the partial writes of a conflicting item', async () => {
      h = createHarness({ auditStrict: true });
      acme = await seedTenant(h.engine, 'acme');
      editor = await seedRole(h.engine, acme.id, 'EDITOR');
      publish = await seedPermission(h.engine, 'article:publish');
      const edit = await seedPermission(h.engine, 'article:edit');
      h.store.auditInsertError = (record) =>
        record.after?.permissionId === publish.id ? new ConflictError('concurrent grant') : null;

      const created = await h.engine.bulkGrantRolePermissions(
        editor.id,
        [publish.id, edit.id],
        {},
        asAdmin('role_permission')
      );
      expect(created.map((g) => g.permissionId)).toEqual([edit.id]);
      expect((await h.engine.listRolePermissions(editor.id)).map((g) => g.permissionId)).toEqual([edit.id]);
      expect(h.store.auditRecords.map((r) => r.operationType)).toEqual(['GRANT']);
    });

    test('sync grants the missing, revokes the extra and keeps the rest', async () => {
      const edit = await seedPermission(h.engine, 'article:edit');
      const read = await seedPermission(h.engine, 'article:read');
      await h.engine.bulkGrantRolePermissions(editor.id, [publish.id, edit.id]);

      const result = await h.engine.syncRolePermissions(editor.id, [edit.id, read.id]);
      expect(result).toEqual({ added: [read.id], removed: [publish.id], kept: [edit.id] });

      const active = (await h.engine.listRolePermissions(editor.id)).filter((g) => g.isGranted);
      expect(active.map((g) => g.permissionId).sort()).toEqual([edit.id, read.id].sort());
    });
  });

  describe('UserRole', () => {
    test('assign, revoke and activate', async () => {
      const assignment = await h.engine.assignUserRole({ userId: alice.id, roleId: editor.id, tenantId: acme.id });
      expect(assignment).toMatchObject({ kind: 'user_role', isAssigned: true, tenantId: acme.id });

      await expect(
        h.engine.assignUserRole({ userId: alice.id, roleId: editor.id, tenantId: acme.id })
      ).rejects.toBeInstanceOf(ConflictError);

      expect(await h.engine.revokeUserRole(alice.id, editor.id, acme.id)).toBe(true);
      expect(await h.engine.revokeUserRole(alice.id, editor.id, acme.id)).toBe(false);
      expect(await h.engine.activateUserRole(alice.id, editor.id, acme.id)).toBe(true);
      expect(await h.engine.activateUserRole(alice.id, editor.id, acme.id)).toBe(false);
    });

    test('the role must belong to the tenant named', async () => {
      const globex = await seedTenant(h.engine, 'globex');
      await expect(
        h.engine.assignUserRole({ userId: alice.id, roleId: editor.id, tenantId: globex.id })
      ).rejects.toBeInstanceOf(TenantMismatchError);
    });

    test('a disabled role cannot be assigned', async () => {
      await h.engine.disableRole(editor.id);
      await expect(
        h.engine.assignUserRole({ userId: alice.id, roleId: editor.id, tenantId: acme.id })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    test('unknown users and assignments are NotFound', async () => {
      await expect(
        h.engine.assignUserRole({ userId: '00000000-0000-4000-8000-00000000beef', roleId: editor.id, tenantId: acme.id })
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(h.engine.activateUserRole(alice.id, editor.id, acme.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    test('window updates apply to the assignment', async () => {
      await h.engine.assignUserRole({ userId: alice.id, roleId: editor.id, tenantId: acme.id, effectiveTo: day(10) });
      const updated = await h.engine.updateUserRoleWindow(alice.id, editor.id, acme.id, {
        effectiveFrom: day(2),
        effectiveTo: null,
      });
      expect(updated).toMatchObject({ effectiveFrom: day(2), effectiveTo: null });
    });
  });
});
