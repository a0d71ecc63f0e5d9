// =============================================================================
// RAMPART — Unit of Work
//
// One store session plus the operation context for the writes made through
// it. Services receive the unit of work explicitly; nothing is ambient. The
// engine clears the context when the unit of work ends, on every path.
// =============================================================================

import type { AuditMutation, AuditRecord, OperationContext } from '../types/audit';
import type { StoreSession } from '../types/store';
import type { AuditRecorder } from './audit/recorder';

export interface EngineLimits {
  /** Maximum parent hops walked from any role */
  maxChainDepth: number;
  /** Rows flipped per sweep transaction */
  sweepBatchSize: number;
}

export class UnitOfWork {
  private context: OperationContext | null = null;

  constructor(
    readonly session: StoreSession,
    private readonly recorder: AuditRecorder,
    private readonly clock: () => Date,
    readonly limits: EngineLimits
  ) {}

  get operationContext(): Readonly<OperationContext> | null {
    return this.context;
  }

  setOperationContext(context: OperationContext): void {
    this.context = { ...context };
  }

  clearOperationContext(): void {
    this.context = null;
  }

  now(): Date {
    return this.clock();
  }

  /** Actor stamped on grantedBy/revokedBy */
  get actorId(): string | null {
    return this.context?.actorId ?? null;
  }

  /** Called by every mutation right after its persist */
  audit(mutation: AuditMutation): Promise<AuditRecord | null> {
    return this.recorder.record(this, mutation);
  }
}
