/**
 * Apply migrations/*.sql in file name order.
 *
 * Applied files are recorded in schema_migrations; each file runs in its own
 * transaction and is skipped on later runs.
 *
 * Usage:
 *   DATABASE_URL=postgresql://... npm run db:migrate
 */

import { readdirSync, readFileSync } from 'fs';
import path from 'path';
import { createPool } from '../src/shared/database/postgres';
import { logger } from '../src/shared/services/logger.service';

const MIGRATIONS_DIR = path.join(__dirname, '..', 'migrations');

async function run(): Promise<void> {
  const pool = createPool();
  const client = await pool.connect();

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name        VARCHAR(255) PRIMARY KEY,
        applied_at  TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);

    const { rows } = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
    const applied = new Set(rows.map(row => row.name));
    const files = readdirSync(MIGRATIONS_DIR).filter(file => file.endsWith('.sql')).sort();
    let count = 0;

    for (const file of files) {
      if (applied.has(file)) continue;

      const statements = readFileSync(path.join(MIGRATIONS_DIR, file), 'utf8');
      await client.query('BEGIN');
      try {
        await client.query(statements);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }

      logger.info('Migration applied', { file });
      count += 1;
    }

    logger.info(count > 0 ? `Applied ${count} migration(s)` : 'Database is up to date');
  } finally {
    client.release();
    await pool.end();
  }
}

run().catch((error: unknown) => {
  logger.error('Migration failed', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
