import { Pool } from 'pg';
import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';

let pool: Pool | null = null;

/** Shared pool for the PostgreSQL mirror; only created when DATABASE_URL is set. */
export function getPool(): Pool {
  if (!pool) {
    if (!cfg.databaseUrl) throw new Error('DATABASE_URL is not configured');
    pool = new Pool({ connectionString: cfg.databaseUrl });
    pool.on('error', (err) => logger.error({ err }, 'pg pool error'));
  }
  return pool;
}

export async function dbHealth(): Promise<boolean> {
  const c = await getPool().connect();
  try { await c.query('SELECT 1'); return true; }
  finally { c.release(); }
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}
