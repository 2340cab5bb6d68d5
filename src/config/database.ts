import { Pool } from 'pg';
import { logger } from '../lib/logger';

// One pool per process; connections are reused across units of work.
let pool: Pool | null = null;

export function getDbPool(connectionString: string): Pool {
  if (!pool) {
    const requiresSSL =
      connectionString.includes('sslmode=require') || process.env.NODE_ENV === 'production';

    pool = new Pool({
      connectionString,
      connectionTimeoutMillis: parseInt(process.env.DB_POOL_CONNECTION_TIMEOUT || '5000', 10),
      min: parseInt(process.env.DB_POOL_MIN || '2', 10),
      max: parseInt(process.env.DB_POOL_MAX || '20', 10),
      idleTimeoutMillis: parseInt(process.env.DB_POOL_IDLE_TIMEOUT || '60000', 10),
      ssl: requiresSSL ? { rejectUnauthorized: false } : false,
    });

    pool.on('error', (err) => {
      logger.error({ err }, 'Idle database client error');
    });
  }

  return pool;
}

export async function closeDbPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
