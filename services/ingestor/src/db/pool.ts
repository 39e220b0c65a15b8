import { Pool } from 'pg';
import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';

export function poolConfig() {
  return {
    connectionString: cfg.databaseUrl,
    application_name: 'pricebase-ingestor',
    max: cfg.pg.poolMax,
    statement_timeout: cfg.pg.statementTimeoutMs,
  };
}

export const pool = new Pool(poolConfig());

pool.on('error', (err) => logger.error({ err }, 'idle pg client error'));

export async function dbHealth(): Promise<boolean> {
  const c = await pool.connect();
  try { await c.query('SELECT 1'); return true; }
  finally { c.release(); }
}
