// =============================================================================
// RAMPART — Database Connection Pool
// =============================================================================

import { Pool } from 'pg';
import { config } from '../config';
import { log } from '../utils/log';

export function createPool(connectionString: string = config.db.connectionString): Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    log.error('DB', `Unexpected pool error: ${err.message}`);
  });

  return pool;
}
