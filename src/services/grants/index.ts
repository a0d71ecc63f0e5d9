export * from './lifecycle';
export * from './role-permissions';
export * from './user-roles';
