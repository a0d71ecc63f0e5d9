// =============================================================================
// RAMPART — Schema migration
//
// Applies src/db/schema.sql. The DDL is idempotent, so running this on
// every deploy is safe.
//   npm run db:migrate
// =============================================================================

import { readFileSync } from 'fs';
import { join } from 'path';
import type { Pool } from 'pg';
import { createPool } from './pool';
import { log, errorMessage } from '../utils/log';

export const SCHEMA_PATH = join(__dirname, 'schema.sql');

export async function migrate(pool: Pool): Promise<void> {
  const ddl = readFileSync(SCHEMA_PATH, 'utf8');
  await pool.query(ddl);
  log.info('DB', 'Schema applied');
}

if (require.main === module) {
  const pool = createPool();
  migrate(pool)
    .then(() => pool.end())
    .catch(async (err: unknown) => {
      log.error('DB', `Migration failed: ${errorMessage(err)}`);
      await pool.end();
      process.exit(1);
    });
}
