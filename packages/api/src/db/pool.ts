import pg from 'pg';
import { logger } from '../lib/logger.js';

// NUMERIC and TIMESTAMPTZ keep pg's defaults (string and Date); repositories convert.
export function createPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    statement_timeout: 10_000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected pool error');
  });

  return pool;
}
