// =============================================================================
// RAMPART — Audit event hashing
//
// SHA-512 over the canonical JSON of every record field except the hash
// itself. Recomputing it detects edits made behind the trigger's back.
// =============================================================================

import { createHash } from 'crypto';
import type { AuditRecord } from '../../types/audit';
import { canonicalJson, snapshot } from '../../utils/json';

export function computeEventHash(record: Omit<AuditRecord, 'eventHash'>): string {
  return createHash('sha512').update(canonicalJson(snapshot(record))).digest('hex');
}

export function verifyAuditRecord(record: AuditRecord): boolean {
  const { eventHash, ...content } = record;
  return computeEventHash(content) === eventHash;
}
