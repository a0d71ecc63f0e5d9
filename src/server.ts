// =============================================================================
// RAMPART — Main Server
//
// Bootstrap: pool -> store -> audit registry (sealed) -> engine -> HTTP.
// The expiry sweep runs on a timer alongside the API.
// =============================================================================

import { createApp } from './app';
import { config } from './config';
import { createPool } from './db/pool';
import { PgStore } from './db/pg-store';
import { AuthzEngine } from './engine';
import { auditRegistry, registerDefaultAudits } from './services/audit/registry';
import { startSweepScheduler } from './services/sweep';
import { errorMessage, log } from './utils/log';

const pool = createPool();
const store = new PgStore(pool);

registerDefaultAudits(auditRegistry);
auditRegistry.seal();

const engine = new AuthzEngine(store, { registry: auditRegistry });
const app = createApp({ engine });

const stopSweep = startSweepScheduler(engine, config.sweep.intervalSeconds * 1000, {
  context: { actorName: 'system', reason: 'expired' },
});

const server = app.listen(config.port, () => {
  log.info('Server', `RAMPART listening on :${config.port} (${config.nodeEnv})`, {
    auditStrict: config.audit.strict,
    businessTypes: auditRegistry.businessTypes(),
  });
});

function shutdown(signal: string): void {
  log.info('Server', `${signal} received, shutting down`);
  stopSweep();
  server.close(() => {
    store
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error('Server', `Pool shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
