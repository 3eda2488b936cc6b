import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, errorMeta } from '@contacts/shared';
import { createPool, closePool, type ConnectionSource } from './client';

const logger = createLogger({ name: 'db:migrate' });

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

/**
 * Applies pending `.sql` files in name order, each in its own transaction,
 * and records them in `_migrations`. Returns the names applied.
 */
export async function applyMigrations(
  source: ConnectionSource,
  dir: string = MIGRATIONS_DIR,
): Promise<string[]> {
  const client = await source.connect();
  const appliedNow: string[] = [];

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const applied = await client.query('SELECT name FROM _migrations ORDER BY name');
    const appliedSet = new Set(applied.rows.map((r) => String(r.name)));

    const files = (await readdir(dir))
      .filter((f) => f.endsWith('.sql'))
      .sort();

    for (const file of files) {
      if (appliedSet.has(file)) continue;

      const sql = await readFile(join(dir, file), 'utf-8');

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
        appliedNow.push(file);
        logger.info({ file }, 'Migration applied');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }
  } finally {
    client.release();
  }

  return appliedNow;
}

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = createPool(databaseUrl);
  try {
    const applied = await applyMigrations(pool);
    logger.info({ count: applied.length }, 'All migrations applied');
  } finally {
    await closePool(pool);
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.fatal(errorMeta(err), 'Migration failed');
    process.exit(1);
  });
}
