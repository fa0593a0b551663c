import { Pool } from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import { instrumentPool } from './lib/dbMonitor.js';
import type { Database } from './db/types.js';
import { DATABASE_URL, DB_POOL_MAX, DB_STATEMENT_TIMEOUT_MS, IS_PRODUCTION } from './config.js';

const dbSslRejectUnauthorized =
  String(process.env.DB_SSL_REJECT_UNAUTHORIZED || (IS_PRODUCTION ? 'true' : 'false')).toLowerCase() !== 'false';

export interface WarehouseConnection {
  pool: Pool;
  db: Kysely<Database>;
  /** Ends the pool (Kysely destroys the pool it wraps). */
  close(): Promise<void>;
}

/**
 * Opens the warehouse pool. The CLI creates one per invocation and closes it
 * before exiting so no handles keep the process alive.
 */
export function createWarehouseConnection(connectionString: string = DATABASE_URL): WarehouseConnection {
  if (!connectionString) {
    throw new Error('DATABASE_URL is not configured');
  }
  const pool = new Pool({
    connectionString,
    ssl: IS_PRODUCTION || process.env.DB_SSL_REJECT_UNAUTHORIZED ? { rejectUnauthorized: dbSslRejectUnauthorized } : false,
    max: DB_POOL_MAX,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: DB_STATEMENT_TIMEOUT_MS,
  });

  pool.on('error', (err) => {
    console.error('Unexpected idle warehouse pool client error:', err instanceof Error ? err.message : String(err));
  });
  instrumentPool(pool, 'warehouse');

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });

  return {
    pool,
    db,
    close: () => db.destroy(),
  };
}

