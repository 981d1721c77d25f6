/**
 * PostgreSQL pool and drizzle handle
 */

import { DatabaseError, Pool } from 'pg';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { config } from '../../../config/environment';
import { logger } from '../../services/logger.service';
import { uniqueViolation } from '../constraints';
import * as schema from '../schema';

export type Database = NodePgDatabase<typeof schema>;
export type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];
export type Executor = Database | Transaction;

export function createPool(connectionString: string = config.database.url): Pool {
  const pool = new Pool({ connectionString, max: config.database.poolMax });
  pool.on('error', (error) => {
    logger.error('Idle PostgreSQL client error', { error: error.message });
  });
  return pool;
}

export function createDatabase(pool: Pool): Database {
  return drizzle(pool, { schema });
}

const UNIQUE_VIOLATION = '23505';
const NUMERIC_OUT_OF_RANGE = '22003';

function databaseErrorOf(error: unknown): DatabaseError | null {
  if (error instanceof DatabaseError) return error;
  if (error instanceof Error && error.cause instanceof DatabaseError) return error.cause;
  return null;
}

/**
 * Run a write, turning unique violations into ConflictError
 */
export async function withUniqueGuard<T>(write: () => Promise<T>): Promise<T> {
  try {
    return await write();
  } catch (error) {
    const dbError = databaseErrorOf(error);
    if (dbError?.code === UNIQUE_VIOLATION) {
      throw uniqueViolation(dbError.constraint);
    }
    throw error;
  }
}

export function isNumericOverflow(error: unknown): boolean {
  return databaseErrorOf(error)?.code === NUMERIC_OUT_OF_RANGE;
}

/** drizzle rejects an UPDATE with nothing to set */
export function hasChanges(patch: object): boolean {
  return Object.values(patch).some(value => value !== undefined);
}
