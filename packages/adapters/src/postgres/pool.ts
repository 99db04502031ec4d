import pg from 'pg';
import type { Logger } from '@location-bridge/domain';

const { Pool } = pg;

export type DbPool = pg.Pool;

/**
 * The slice of `pg.Pool` the repositories use. Tests hand in a mocked `query`.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface PoolOptions {
  connectionString: string;
  applicationName?: string;
  max?: number;
}

export function createPool(opts: PoolOptions, logger: Logger): DbPool {
  const pool = new Pool({
    connectionString: opts.connectionString,
    max: opts.max ?? 4,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: opts.applicationName ?? 'location-bridge',
  });
  pool.on('error', (err) => {
    logger.error('unexpected error on idle client', { error: err.message });
  });
  return pool;
}

export async function closePool(pool: DbPool): Promise<void> {
  await pool.end();
}
