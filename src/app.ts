// =============================================================================
// RAMPART — HTTP application
//
//   /api/health                  — Health check (unauthenticated)
//   /api/tenants/:tenantId/*     — Roles, grants, audit (JWT, own tenant only)
//
// Built by createApp so tests can mount it over an in-memory store.
// =============================================================================

import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config } from './config';
import type { AuthzEngine } from './engine';
import { RbacAuthorizationProvider } from './authorization/rbac';
import { authenticate } from './middleware/authenticate';
import { errorHandler, requestId, requestSanitization } from './middleware/security';
import { enforceTenantIsolation } from './middleware/tenant-isolation';
import { createAuditRoutes } from './routes/audit';
import { createGrantRoutes } from './routes/grants';
import { createRoleRoutes } from './routes/roles';
import { IAuthorizationProvider } from './types/authorization';

export const VERSION = '0.3.0';

export interface AppOptions {
  engine: AuthzEngine;
  jwtSecret?: string;
  provider?: IAuthorizationProvider;
  /** Requests per minute per IP on /api/tenants */
  rateLimitPerMinute?: number;
}

export function createApp(options: AppOptions): Express {
  const { engine } = options;
  const provider = options.provider ?? new RbacAuthorizationProvider(engine);
  const app = express();
  const startTime = Date.now();

  // ── Security Middleware ──────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: config.nodeEnv === 'development' ? '*' : undefined,
    credentials: true,
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId());
  app.use(requestSanitization());

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: options.rateLimitPerMinute ?? 120,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Routes ───────────────────────────────────────────────────────────

  app.get('/api/health', async (_req: Request, res: Response) => {
    const dbStart = Date.now();
    const healthy = await engine.ping();
    const checks = {
      database: { status: healthy ? 'healthy' : 'unhealthy', latencyMs: Date.now() - dbStart },
    };

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      service: 'rampart',
      version: VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  const deps = { engine, provider };
  app.use(
    '/api/tenants/:tenantId',
    apiLimiter,
    authenticate(options.jwtSecret ?? config.jwt.secret),
    enforceTenantIsolation,
    createRoleRoutes(deps),
    createGrantRoutes(deps),
    createAuditRoutes(deps)
  );

  // ── 404 Handler ──────────────────────────────────────────────────────

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler());

  return app;
}
