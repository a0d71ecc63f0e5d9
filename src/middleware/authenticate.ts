// =============================================================================
// RAMPART — Authentication Middleware
//
// Verifies the JWT bearer token and attaches the caller to the request.
// Tokens are issued by the identity service; this side only verifies.
// =============================================================================

import { Response, NextFunction, RequestHandler } from 'express';
import jwt, { JsonWebTokenError, JwtPayload, TokenExpiredError } from 'jsonwebtoken';
import { validate as isUuid } from 'uuid';
import { config } from '../config';
import { AuthenticatedRequest, JwtClaims } from '../types/auth';

/** sub and tenant must both be uuids; name, when present, a string */
function hasClaims(payload: string | JwtPayload): payload is JwtPayload & JwtClaims {
  if (typeof payload === 'string') return false;
  if (typeof payload.sub !== 'string' || !isUuid(payload.sub)) return false;
  if (typeof payload.tenant !== 'string' || !isUuid(payload.tenant)) return false;
  return payload.name === undefined || typeof payload.name === 'string';
}

/**
 * Authenticate incoming requests via JWT Bearer token. The token must carry
 * `sub` (user id) and `tenant` (tenant id); `name` is optional.
 */
export function authenticate(secret: string = config.jwt.secret): RequestHandler {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const token = authHeader.slice(7);

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, secret);
    } catch (err) {
      if (err instanceof TokenExpiredError) {
        res.status(401).json({ error: 'Token expired' });
      } else if (err instanceof JsonWebTokenError) {
        res.status(401).json({ error: 'Invalid token' });
      } else {
        next(err);
      }
      return;
    }

    if (!hasClaims(payload)) {
      res.status(401).json({ error: 'Invalid token claims' });
      return;
    }

    req.user = {
      id: payload.sub,
      tenantId: payload.tenant,
      displayName: payload.name ?? null,
    };

    next();
  };
}
