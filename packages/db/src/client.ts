import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger } from '@botm/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Idle database client failed');
  });
  logger.info({ max: config.max ?? null }, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
    logger.info({}, 'Database pool closed');
  }
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client. Row locks taken with
 * `FOR UPDATE` inside `fn` are held until the commit or rollback.
 */
export async function withTransaction<T>(
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      logger.warn({ err: rollbackErr }, 'Rollback failed');
    });
    throw err;
  } finally {
    client.release();
  }
}
