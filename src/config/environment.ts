/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * The only reader of process.env. Everything else imports `config`.
 *
 * Production refuses to start without JWT_SECRET and DATABASE_URL.
 * Development generates a throwaway JWT secret when none is set, so tokens
 * do not survive a restart.
 * =============================================================================
 */

import dotenv from 'dotenv';
import { randomBytes } from 'crypto';

dotenv.config();

const nodeEnv = getOptional('NODE_ENV', 'development');

// =============================================================================
// HELPERS
// =============================================================================

function getRequired(key: string): string {
  const value = process.env[key];
  if (value && value.trim() !== '') {
    return value;
  }

  if (nodeEnv !== 'production') {
    console.warn(`⚠️  [CONFIG] ${key} not set, generated a development value`);
    return randomBytes(32).toString('hex');
  }

  throw new Error(`❌ FATAL: ${key} is required in production`);
}

function getOptional(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value && value.trim() !== '' ? value.trim() : defaultValue;
}

function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.trim().toLowerCase() === 'true';
}

function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

export const DATABASE_DRIVERS = ['postgres', 'memory'] as const;
export type DatabaseDriver = typeof DATABASE_DRIVERS[number];

function isDatabaseDriver(value: string): value is DatabaseDriver {
  return DATABASE_DRIVERS.some(driver => driver === value);
}

const rawDriver = getOptional('DB_DRIVER', 'postgres').toLowerCase();

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

export const config = {
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', 'localhost'),

  database: {
    driver: isDatabaseDriver(rawDriver) ? rawDriver : 'postgres',
    url: getOptional('DATABASE_URL', 'postgresql://localhost:5432/terminal_db'),
    poolMax: getNumber('DB_POOL_MAX', 10)
  },

  jwt: {
    secret: getRequired('JWT_SECRET'),
    /** Seconds; 12 hours, one terminal shift */
    expiresIn: getNumber('JWT_EXPIRES_IN', 12 * 60 * 60)
  },

  bcryptRounds: getNumber('BCRYPT_ROUNDS', 10),

  /** IANA zone of the terminal: "today", month buckets, CSV timestamps */
  timeZone: getOptional('TIME_ZONE', 'Asia/Manila'),
  currencySymbol: getOptional('CURRENCY_SYMBOL', '₱'),

  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 300),
    loginMax: getNumber('LOGIN_RATE_LIMIT_MAX', 10)
  },

  logLevel: getOptional('LOG_LEVEL', nodeEnv === 'production' ? 'info' : 'debug'),

  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*'))
  },

  isProduction: nodeEnv === 'production',
  isTest: nodeEnv === 'test',

  security: {
    enableHeaders: getBoolean('ENABLE_SECURITY_HEADERS', true),
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true)
  },

  build: {
    version: getOptional('npm_package_version', '1.0.0'),
    time: getOptional('BUILD_TIME', 'unknown'),
    commitHash: getOptional('COMMIT_HASH', 'unknown')
  },

  /** Password given to the accounts scripts/seed-mock-data.ts creates */
  seedPassword: getOptional('SEED_PASSWORD', 'change-me')
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (!isDatabaseDriver(rawDriver)) {
    errors.push(`DB_DRIVER "${rawDriver}" must be one of: ${DATABASE_DRIVERS.join(', ')}`);
  }

  if (!isValidTimeZone(config.timeZone)) {
    errors.push(`TIME_ZONE "${config.timeZone}" is not a valid IANA time zone`);
  }

  if (config.bcryptRounds < 4 || config.bcryptRounds > 15) {
    errors.push('BCRYPT_ROUNDS must be between 4 and 15');
  }

  if (config.jwt.expiresIn <= 0) {
    errors.push('JWT_EXPIRES_IN must be a positive number of seconds');
  }

  if (config.isProduction) {
    if (!process.env.DATABASE_URL) {
      errors.push('DATABASE_URL is required in production');
    }
    if (config.database.driver === 'memory') {
      warnings.push('DB_DRIVER is "memory", data is lost on restart');
    }
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is "*", restrict it to the back office origin');
    }
  }

  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

validateConfig();
