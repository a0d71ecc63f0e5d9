// =============================================================================
// RAMPART — Audit Recorder
//
// Turns a persisted mutation plus the unit of work's operation context into
// exactly one audit record, written in a savepoint of the same transaction.
//
// Outcomes for a mutation whose business type and event are registered:
//   no context            -> warning, nothing persisted
//   context for another   -> context left for a later mutation
//   matching context      -> one record, context cleared
// A failed insert is logged and the business write still commits, unless
// the recorder is strict, in which case the error rolls everything back.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { ConfigurationError } from '../../errors';
import type { AuditMutation, AuditRecord } from '../../types/audit';
import { errorMessage, log } from '../../utils/log';
import type { UnitOfWork } from '../unit-of-work';
import { computeEventHash } from './hash';
import type { AuditRegistry } from './registry';

export interface AuditRecorderOptions {
  strict: boolean;
}

export class AuditRecorder {
  constructor(
    private readonly registry: AuditRegistry,
    private readonly options: AuditRecorderOptions
  ) {}

  async record(uow: UnitOfWork, mutation: AuditMutation): Promise<AuditRecord | null> {
    const registration = this.registry.get(mutation.businessType);
    if (!registration || !registration.events.includes(mutation.event)) return null;

    const context = uow.operationContext;
    if (!context) {
      log.warn(
        'Audit',
        `No operation context for ${mutation.businessType} ${mutation.operationType} on ${mutation.targetId}; nothing recorded`
      );
      return null;
    }

    if (!this.registry.has(context.businessType)) {
      throw new ConfigurationError(
        `Operation context names unregistered business type "${context.businessType}"`
      );
    }

    if (
      context.businessType !== mutation.businessType ||
      (context.operationType !== undefined && context.operationType !== mutation.operationType)
    ) {
      log.debug(
        'Audit',
        `Context ${context.businessType}/${context.operationType ?? '*'} does not match ${mutation.businessType}/${mutation.operationType}`
      );
      return null;
    }

    const content: Omit<AuditRecord, 'eventHash'> = {
      id: uuidv4(),
      businessType: mutation.businessType,
      operationType: context.operationType ?? mutation.operationType,
      targetType: registration.targetType,
      targetId: mutation.targetId,
      actorId: context.actorId ?? null,
      actorName: context.actorName ?? null,
      reason: context.reason ?? null,
      requestId: context.requestId ?? null,
      ip: context.ip ?? null,
      before: context.before !== undefined ? context.before : mutation.before,
      after: context.after !== undefined ? context.after : mutation.after,
      metadata: context.metadata ?? {},
      tenantId: context.tenantId ?? mutation.tenantId,
      operatedAt: uow.now(),
    };
    const record: AuditRecord = { ...content, eventHash: computeEventHash(content) };

    uow.clearOperationContext();
    try {
      return await uow.session.savepoint('audit_record', () => uow.session.audit.insert(record));
    } catch (err) {
      if (this.options.strict) throw err;
      log.error(
        'Audit',
        `Failed to record ${mutation.businessType} ${mutation.operationType} on ${mutation.targetId}: ${errorMessage(err)}`
      );
      return null;
    }
  }
}
