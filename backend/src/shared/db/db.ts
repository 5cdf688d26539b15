/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection (one pg Pool per process).
 * - Table types come from ./schema (declared next to the migrations).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL classes should accept.
 * - Works for both main DB and transactions (`trx`).
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
