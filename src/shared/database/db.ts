/**
 * =============================================================================
 * DATABASE SERVICE
 * =============================================================================
 *
 * Builds the repositories for the configured driver:
 *   - postgres: drizzle-orm over a pg Pool (DATABASE_URL)
 *   - memory:   process-local tables, for development and tests
 *
 * Everything else imports `db` and talks to the repository interfaces only.
 * =============================================================================
 */

import { sql } from 'drizzle-orm';
import { Pool } from 'pg';
import { config } from '../../config/environment';
import { logger } from '../services/logger.service';
import { createMemoryRepositories } from './memory';
import { createDatabase, createPool, createPostgresRepositories, Database } from './postgres';
import { Repositories } from './repository.interface';

export interface DatabaseHealth {
  healthy: boolean;
  driver: string;
  latencyMs: number;
  error?: string;
}

let pool: Pool | null = null;
let database: Database | null = null;

function buildRepositories(): Repositories {
  if (config.database.driver === 'memory') {
    logger.info('Using in-memory storage');
    return createMemoryRepositories();
  }
  pool = createPool();
  database = createDatabase(pool);
  logger.info('Using PostgreSQL storage', { poolMax: config.database.poolMax });
  return createPostgresRepositories(database, config.timeZone);
}

export const db: Repositories = buildRepositories();

/**
 * Round-trip check used by /health/ready
 */
export async function checkDatabaseHealth(): Promise<DatabaseHealth> {
  const started = Date.now();
  if (!database) {
    return { healthy: true, driver: config.database.driver, latencyMs: 0 };
  }
  try {
    await database.execute(sql`select 1`);
    return { healthy: true, driver: config.database.driver, latencyMs: Date.now() - started };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Database health check failed', { error: message });
    return { healthy: false, driver: config.database.driver, latencyMs: Date.now() - started, error: message };
  }
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    database = null;
    logger.info('Database pool closed');
  }
}
