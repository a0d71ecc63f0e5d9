// =============================================================================
// RAMPART — PostgreSQL store
//
// transaction() checks out one client and wraps fn in BEGIN/COMMIT, rolling
// back on any throw. read() runs straight on the pool. Every statement goes
// through translatePgError on its way out.
// =============================================================================

import type { Pool, QueryResult } from 'pg';
import type { AuthzStore, StoreSession } from '../types/store';
import { log, errorMessage } from '../utils/log';
import { translatePgError } from './errors';
import type { Row } from './rows';
import type { Query } from './repositories/query';
import { PgAuditRepository } from './repositories/audit';
import {
  PgPermissionRepository,
  PgTenantRepository,
  PgUserRepository,
} from './repositories/catalog';
import { PgRolePermissionRepository, PgUserRoleRepository } from './repositories/grants';
import { PgTenantUserRepository } from './repositories/membership';
import { PgRoleRepository } from './repositories/roles';

const SAVEPOINT_NAME = /^[a-z_][a-z0-9_]{0,62}$/;

type RawQuery = (text: string, values?: unknown[]) => Promise<QueryResult<Row>>;

function bind(run: RawQuery): Query {
  return async (text, values) => {
    try {
      const result = await run(text, values);
      return result.rows;
    } catch (err) {
      throw translatePgError(err);
    }
  };
}

function createSession(query: Query, inTransaction: boolean): StoreSession {
  return {
    tenants: new PgTenantRepository(query),
    users: new PgUserRepository(query),
    roles: new PgRoleRepository(query),
    permissions: new PgPermissionRepository(query),
    rolePermissions: new PgRolePermissionRepository(query),
    userRoles: new PgUserRoleRepository(query),
    tenantUsers: new PgTenantUserRepository(query),
    audit: new PgAuditRepository(query),

    async savepoint<T>(name: string, fn: () => Promise<T>): Promise<T> {
      if (!inTransaction) return fn();
      if (!SAVEPOINT_NAME.test(name)) throw new Error(`Invalid savepoint name: ${name}`);
      await query(`SAVEPOINT ${name}`);
      try {
        const result = await fn();
        await query(`RELEASE SAVEPOINT ${name}`);
        return result;
      } catch (err) {
        await query(`ROLLBACK TO SAVEPOINT ${name}`);
        throw err;
      }
    },
  };
}

export class PgStore implements AuthzStore {
  constructor(private readonly pool: Pool) {}

  async transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const query = bind((text, values) => client.query<Row>(text, values));
    try {
      await query('BEGIN');
      const result = await fn(createSession(query, true));
      await query('COMMIT');
      return result;
    } catch (err) {
      try {
        await query('ROLLBACK');
      } catch (rollbackErr) {
        log.error('DB', `Rollback failed: ${errorMessage(rollbackErr)}`);
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async read<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    return fn(createSession(bind((text, values) => this.pool.query<Row>(text, values)), false));
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (err) {
      log.warn('DB', `Ping failed: ${errorMessage(err)}`);
      return false;
    }
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}
