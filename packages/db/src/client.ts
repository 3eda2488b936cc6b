import { Pool } from 'pg';
import { createLogger } from '@contacts/shared';

const logger = createLogger({ name: 'db' });

export interface QueryResultLike {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/** The part of a pg `Pool` or `PoolClient` the repositories rely on. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface TransactionalClient extends Queryable {
  release(): void;
}

export interface ConnectionSource {
  connect(): Promise<TransactionalClient>;
}

export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString });
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');
  return pool;
}

export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
  logger.info({}, 'Database pool closed');
}

export async function ping(db: Queryable): Promise<boolean> {
  const result = await db.query('SELECT 1 AS ok');
  return result.rows.length === 1;
}
