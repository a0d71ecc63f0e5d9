// =============================================================================
// RAMPART — Audit Registry
//
// Maps a business type to its audit target and the persistence events that
// trigger a record. Populated once during bootstrap, then sealed; lookups
// are read-only from then on.
// =============================================================================

import { ConfigurationError } from '../../errors';
import type { AuditRegistration } from '../../types/audit';

export class AuditRegistry {
  private readonly entries = new Map<string, Readonly<AuditRegistration>>();
  private sealed = false;

  register(businessType: string, registration: AuditRegistration): void {
    if (this.sealed) {
      throw new ConfigurationError(
        `Audit registry is sealed; cannot register "${businessType}" after bootstrap`
      );
    }
    if (this.entries.has(businessType)) {
      throw new ConfigurationError(`Business type "${businessType}" is already registered`);
    }
    if (registration.events.length === 0) {
      throw new ConfigurationError(`Business type "${businessType}" must name at least one event`);
    }
    this.entries.set(
      businessType,
      Object.freeze({
        targetType: registration.targetType,
        events: Object.freeze([...registration.events]),
      })
    );
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(businessType: string): boolean {
    return this.entries.has(businessType);
  }

  get(businessType: string): Readonly<AuditRegistration> | undefined {
    return this.entries.get(businessType);
  }

  require(businessType: string): Readonly<AuditRegistration> {
    const registration = this.entries.get(businessType);
    if (!registration) {
      throw new ConfigurationError(`Business type "${businessType}" is not registered for audit`);
    }
    return registration;
  }

  businessTypes(): string[] {
    return [...this.entries.keys()];
  }
}

/** Process-wide registry used by the server bootstrap */
export const auditRegistry = new AuditRegistry();

export function registerAudit(businessType: string, registration: AuditRegistration): void {
  auditRegistry.register(businessType, registration);
}

export const DEFAULT_AUDITS: Readonly<Record<string, AuditRegistration>> = {
  role_permission: { targetType: 'role_permission', events: ['insert', 'update'] },
  user_role: { targetType: 'user_role', events: ['insert', 'update'] },
  role: { targetType: 'role', events: ['insert', 'update', 'delete'] },
  permission: { targetType: 'permission', events: ['insert', 'update', 'delete'] },
  tenant_user: { targetType: 'tenant_user', events: ['insert', 'update'] },
};

export function registerDefaultAudits(registry: AuditRegistry = auditRegistry): void {
  for (const [businessType, registration] of Object.entries(DEFAULT_AUDITS)) {
    registry.register(businessType, registration);
  }
}
