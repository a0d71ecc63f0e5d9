// =============================================================================
// RAMPART — Request hygiene and error mapping
//
// Covers:
//   - Request IDs (propagated into audit records)
//   - Null-byte stripping on JSON bodies
//   - Error handling: AuthzError -> its status, anything else -> 500
//     (no stack traces in production)
// =============================================================================

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { AuthzError } from '../errors';
import { AuthenticatedRequest } from '../types/auth';
import { log } from '../utils/log';

// ── Request ID ─────────────────────────────────────────────────────────

const REQUEST_ID = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Assign a unique request ID for tracing. A well-formed X-Request-ID from
 * the caller is kept.
 */
export function requestId(): RequestHandler {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const incoming = req.get('X-Request-ID');
    const id = incoming && REQUEST_ID.test(incoming) ? incoming : `rmp-${uuidv4()}`;
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Input Validation ───────────────────────────────────────────────────

function stripNullBytes(value: unknown): unknown {
  if (typeof value === 'string') return value.replace(/\0/g, '');
  if (Array.isArray(value)) return value.map(stripNullBytes);
  if (value && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, stripNullBytes(v)]));
  }
  return value;
}

/**
 * Strip null bytes from string values in the body.
 */
export function requestSanitization(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (req.body && typeof req.body === 'object') {
      req.body = stripNullBytes(req.body);
    }
    next();
  };
}

// ── Error Handler ──────────────────────────────────────────────────────

/**
 * Global error handler. Never leaks stack traces in production.
 */
export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: AuthenticatedRequest, res: Response, _next: NextFunction) => {
    if (err instanceof AuthzError) {
      if (err.status >= 500) log.error('Server', `${err.code}: ${err.message}`, { requestId: req.requestId });
      res.status(err.status).json({
        error: err.message,
        code: err.code,
        ...(err.details ? { details: err.details } : {}),
      });
      return;
    }

    // express.json() parse failures carry a 400 status
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
      return;
    }

    const isProd = config.nodeEnv === 'production';
    const error = err instanceof Error ? err : new Error(String(err));
    log.error('Server', `Unhandled error: ${error.message}`, {
      requestId: req.requestId,
      ...(isProd ? {} : { stack: error.stack }),
    });

    res.status(500).json({
      error: isProd ? 'Internal server error' : error.message,
    });
  };
}
