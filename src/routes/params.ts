// =============================================================================
// RAMPART — Request parsing helpers
//
// Narrow untyped JSON bodies and query strings into engine inputs. Bad
// input raises ValidationError, which the error handler turns into a 400.
// =============================================================================

import { ValidationError } from '../errors';
import type { OperationContext } from '../types/audit';
import type { AuthenticatedRequest, AuthenticatedUser } from '../types/auth';

export type Body = Record<string, unknown>;

export function bodyOf(req: AuthenticatedRequest): Body {
  const body: unknown = req.body;
  if (body === undefined || body === null) return {};
  if (typeof body !== 'object' || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

export function requiredString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} is required`, { field });
  }
  return value;
}

export function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`, { field });
  return value;
}

export function optionalInt(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, { field });
  }
  return value;
}

export function optionalBoolean(body: Body, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new ValidationError(`${field} must be a boolean`, { field });
  return value;
}

/** undefined when absent, null when explicitly null, else a parsed Date */
export function optionalDate(body: Body, field: string): Date | null | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value !== 'string') throw new ValidationError(`${field} must be an ISO date string`, { field });
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`${field} must be an ISO date string`, { field });
  }
  return date;
}

export function queryString(req: AuthenticatedRequest, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function queryInt(req: AuthenticatedRequest, name: string): number | undefined {
  const raw = queryString(req, name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) throw new ValidationError(`${name} must be a non-negative integer`, { field: name });
  return parseInt(raw, 10);
}

export function queryDate(req: AuthenticatedRequest, name: string): Date | undefined {
  const raw = queryString(req, name);
  if (raw === undefined) return undefined;
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`${name} must be an ISO date string`, { field: name });
  }
  return date;
}

/** Route params are always present on a matched route; empty means a bad mount */
export function param(req: AuthenticatedRequest, name: string): string {
  const value = req.params[name];
  if (!value) throw new ValidationError(`Missing route parameter ${name}`);
  return value;
}

export function callerOf(req: AuthenticatedRequest): AuthenticatedUser {
  if (!req.user) throw new Error('callerOf used on an unauthenticated route');
  return req.user;
}

/** Operation context for a write made by the caller */
export function contextFor(
  req: AuthenticatedRequest,
  businessType: string,
  reason?: string
): OperationContext {
  const caller = callerOf(req);
  return {
    businessType,
    actorId: caller.id,
    actorName: caller.displayName,
    tenantId: caller.tenantId,
    requestId: req.requestId ?? null,
    ip: req.ip ?? null,
    reason: reason ?? null,
  };
}
