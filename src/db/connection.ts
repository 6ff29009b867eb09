import { Pool } from 'pg';
import type { Logger } from '../observability';

/**
 * Minimal query surface used by repositories. `pg.Pool` satisfies it, and
 * tests substitute an in-process fake.
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export function createPool(connectionString: string, logger: Logger): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error on idle client');
  });

  return pool;
}
