// =============================================================================
// RAMPART — User catalog
//
// Identity records only. Credentials live with whatever issues the tokens.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, ValidationError } from '../../errors';
import type { CreateUserInput, User, UserStatus } from '../../types/catalog';
import { USER_STATUSES } from '../../types/catalog';
import { snapshot } from '../../utils/json';
import type { UnitOfWork } from '../unit-of-work';

export const USERNAME = /^[A-Za-z0-9.@]{4,30}$/;
const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const MOBILE = /^\+?[0-9]{6,20}$/;

export async function requireUser(uow: UnitOfWork, userId: string): Promise<User> {
  const user = await uow.session.users.findById(userId);
  if (!user || user.isDeleted) throw new NotFoundError('User', userId);
  return user;
}

function assertStatus(status: string): asserts status is UserStatus {
  if (!USER_STATUSES.some((s) => s === status)) {
    throw new ValidationError(`Invalid user status "${status}"`, { field: 'status' });
  }
}

export async function createUser(uow: UnitOfWork, input: CreateUserInput): Promise<User> {
  if (!USERNAME.test(input.username)) {
    throw new ValidationError(`Invalid username "${input.username}"`, { field: 'username' });
  }
  if (input.email && !EMAIL.test(input.email)) {
    throw new ValidationError('Invalid email address', { field: 'email' });
  }
  if (input.mobile && !MOBILE.test(input.mobile)) {
    throw new ValidationError('Invalid mobile number', { field: 'mobile' });
  }
  const status = input.status ?? 'unverified';
  assertStatus(status);

  const now = uow.now();
  // username/email/mobile uniqueness is left to the store's unique indexes
  const user = await uow.session.users.insert({
    id: uuidv4(),
    username: input.username,
    email: input.email ?? null,
    mobile: input.mobile ?? null,
    displayName: input.displayName ?? null,
    status,
    isSystem: input.isSystem ?? false,
    metadata: input.metadata ?? {},
    createdAt: now,
    updatedAt: now,
    isDeleted: false,
    deletedAt: null,
  });

  await uow.audit({
    businessType: 'user',
    event: 'insert',
    operationType: 'CREATE',
    targetId: user.id,
    tenantId: null,
    before: null,
    after: snapshot(user),
  });
  return user;
}

export async function updateUserStatus(uow: UnitOfWork, userId: string, status: string): Promise<User> {
  assertStatus(status);
  const user = await requireUser(uow, userId);
  if (user.status === status) return user;

  const updated = await uow.session.users.update(userId, { status, updatedAt: uow.now() });
  await uow.audit({
    businessType: 'user',
    event: 'update',
    operationType: 'UPDATE',
    targetId: userId,
    tenantId: null,
    before: snapshot(user),
    after: snapshot(updated),
  });
  return updated;
}

export async function deleteUser(uow: UnitOfWork, userId: string): Promise<boolean> {
  const user = await uow.session.users.findById(userId);
  if (!user || user.isDeleted) return false;
  if (user.isSystem) throw new ValidationError('System user cannot be deleted');

  const now = uow.now();
  const updated = await uow.session.users.update(userId, {
    isDeleted: true,
    deletedAt: now,
    status: 'closed',
    updatedAt: now,
  });
  await uow.audit({
    businessType: 'user',
    event: 'delete',
    operationType: 'DELETE',
    targetId: userId,
    tenantId: null,
    before: snapshot(user),
    after: snapshot(updated),
  });
  return true;
}

export async function getUser(uow: UnitOfWork, userId: string): Promise<User | null> {
  const user = await uow.session.users.findById(userId);
  return user && !user.isDeleted ? user : null;
}
