export { AuditRecorder } from './recorder';
export type { AuditRecorderOptions } from './recorder';
export {
  AuditRegistry,
  auditRegistry,
  registerAudit,
  registerDefaultAudits,
  DEFAULT_AUDITS,
} from './registry';
export { computeEventHash, verifyAuditRecord } from './hash';
export { queryAuditRecords } from './query';
