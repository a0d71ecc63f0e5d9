// =============================================================================
// RAMPART — pg error translation
//
// SQLSTATE 23505 becomes ConflictError, 22P02 (malformed input such as a bad
// uuid) ValidationError, and the audit trigger's rejection
// ImmutableRecordError. Everything else passes through untouched.
// =============================================================================

import { ConflictError, ImmutableRecordError, ValidationError } from '../errors';

const UNIQUE_VIOLATION = '23505';
const INVALID_TEXT_REPRESENTATION = '22P02';
const RAISE_EXCEPTION = 'P0001';

interface PgErrorLike extends Error {
  code: string;
  constraint?: string;
}

function isPgError(err: unknown): err is PgErrorLike {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function translatePgError(err: unknown): unknown {
  if (!isPgError(err)) return err;

  if (err.code === UNIQUE_VIOLATION) {
    const constraint = typeof err.constraint === 'string' ? err.constraint : undefined;
    return new ConflictError(
      `Duplicate value violates ${constraint ?? 'a unique constraint'}`,
      constraint ? { constraint } : undefined
    );
  }

  if (err.code === INVALID_TEXT_REPRESENTATION) {
    return new ValidationError('Malformed identifier', { reason: err.message });
  }

  if (err.code === RAISE_EXCEPTION && err.message.includes('append-only')) {
    return new ImmutableRecordError(err.message);
  }

  return err;
}
