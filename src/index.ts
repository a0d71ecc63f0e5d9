// =============================================================================
// RAMPART — Public entry point
//
// Embed the engine over any AuthzStore, or mount the HTTP app with createApp.
// =============================================================================

export { AuthzEngine } from './engine';
export type { EngineOptions, WriteOptions } from './engine';
export { createApp, VERSION } from './app';
export type { AppOptions } from './app';
export { RbacAuthorizationProvider } from './authorization/rbac';

export * from './errors';

export { PgStore } from './db/pg-store';
export { createPool } from './db/pool';
export { migrate } from './db/migrate';
export { translatePgError } from './db/errors';

export {
  AuditRecorder,
  AuditRegistry,
  auditRegistry,
  registerAudit,
  registerDefaultAudits,
  DEFAULT_AUDITS,
  computeEventHash,
  verifyAuditRecord,
} from './services/audit';
export type { AuditRecorderOptions } from './services/audit';
export { sweepExpired, startSweepScheduler } from './services/sweep';
export type { SweepOptions, SweepResult } from './services/sweep';
export { parsePermissionCode } from './services/catalog/permissions';
export type { UnitOfWork } from './services/unit-of-work';

export * from './types/audit';
export * from './types/catalog';
export * from './types/grants';
export * from './types/roles';
export * from './types/store';
export * from './types/authorization';
