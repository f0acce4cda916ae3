import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import crypto from 'crypto';
import { config } from '../config/env';
import { logger } from './logger';

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({ connectionString: config.DATABASE_URL });
    pool.on('error', (err) => {
      logger.error({ event: 'db.pool.error', err }, 'Idle Postgres client error');
    });
  }
  return pool;
}

// Slow queries are logged by hash only so SQL literals never reach the logs.
export async function query<R extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<R>> {
  const start = Date.now();
  const result = await getPool().query<R>(text, params);
  const duration = Date.now() - start;

  if (config.NODE_ENV === 'development') {
    logger.debug({ event: 'db.query', durationMs: duration }, text.slice(0, 200));
  } else if (duration > config.DB_SLOW_QUERY_MS) {
    const qhash = crypto.createHash('sha256').update(text).digest('hex').slice(0, 12);
    logger.warn({ event: 'db.query.slow', durationMs: duration, qhash }, 'Slow query');
  }

  return result;
}

export async function closePool() {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
