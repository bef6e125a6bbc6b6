import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger } from '@tenantgate/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

/**
 * Runs `fn` on one pooled client between BEGIN and COMMIT. Any throw rolls back;
 * the original error is rethrown even if the ROLLBACK itself fails.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      logger.error(
        { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
        'Rollback failed',
      );
    }
    throw err;
  } finally {
    client.release();
  }
}

/** Postgres SQLSTATE for unique_violation. */
export const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if (!('code' in err) || err.code !== UNIQUE_VIOLATION) return false;
  return constraint === undefined || ('constraint' in err && err.constraint === constraint);
}

/** First row of an INSERT ... RETURNING. */
export function firstRow<T>(rows: T[]): T {
  const row = rows[0];
  if (!row) throw new Error('Expected a row to be returned');
  return row;
}
