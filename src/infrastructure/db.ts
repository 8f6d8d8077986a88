import { Pool, PoolClient, QueryResultRow } from 'pg';
import crypto from 'crypto';
import { config } from '../config/env';
import { logger } from './logger';

export type Queryable = {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
};

// The pool connects lazily, so importing this module never opens a socket.
const pool = new Pool({
  connectionString: config.DATABASE_URL,
  max: config.PG_POOL_MAX,
});

pool.on('error', (err) => {
  logger.error({ err: { message: err.message } }, 'pg.pool.error');
});

// Query logging:
// - Dev: log query text (truncated) + timing (never log params)
// - Elsewhere: only log slow queries, without SQL text (hash only) to avoid leaking literals
function logQuery(text: string, durationMs: number) {
  if (config.NODE_ENV === 'development') {
    logger.debug(`[PG] ${durationMs}ms | ${text.replace(/\s+/g, ' ').trim().slice(0, 200)}`);
    return;
  }

  if (config.PG_SLOW_QUERY_LOGGING !== 'true') return;

  if (durationMs > config.PG_SLOW_MS) {
    const qhash = crypto.createHash('sha256').update(text).digest('hex').slice(0, 12);
    logger.warn(`[PG SLOW] ${durationMs}ms | qhash=${qhash}`);
  }
}

async function timed<T extends QueryResultRow>(
  run: (text: string, params: unknown[]) => Promise<{ rows: T[] }>,
  text: string,
  params: unknown[]
): Promise<T[]> {
  const startedAt = Date.now();
  const res = await run(text, params);
  logQuery(text, Date.now() - startedAt);
  return res.rows;
}

function wrapClient(client: PoolClient): Queryable {
  return {
    query: <T extends QueryResultRow>(text: string, params: unknown[] = []) =>
      timed<T>((t, p) => client.query<T>(t, p), text, params),
  };
}

const db = {
  query<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
    return timed<T>((t, p) => pool.query<T>(t, p), text, params);
  },

  async withTransaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(wrapClient(client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  },

  async close(): Promise<void> {
    await pool.end();
  },
};

export default db;
