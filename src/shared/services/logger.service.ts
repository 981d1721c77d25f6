/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Winston logger shared by every module.
 * Production writes JSON lines (console + rotating files); development
 * writes colorized single lines. Tests run silent.
 *
 * Credentials and tokens are replaced with [REDACTED] at any depth.
 * =============================================================================
 */

import winston from 'winston';
import { config } from '../../config/environment';

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'authorization', 'cookie', 'jti'];

const LOG_FILE_MAX_BYTES = 5 * 1024 * 1024;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_FIELDS.some(field => lower.includes(field));
}

export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeLogData(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/** In place: winston keeps its own state on symbol keys of `info` */
const redact = winston.format(info => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    const value = info[key];
    if (isSensitiveKey(key)) {
      info[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      info[key] = sanitizeLogData(value);
    }
  }
  return info;
});

const devFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  redact(),
  winston.format.colorize(),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    let line = `${String(timestamp)} [${level}]: ${String(message)}`;
    if (Object.keys(meta).length > 0) line += ` ${JSON.stringify(meta)}`;
    if (typeof stack === 'string') line += `\n${stack}`;
    return line;
  })
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  redact(),
  winston.format.json()
);

export const logger = winston.createLogger({
  level: config.logLevel,
  format: config.isProduction ? jsonFormat : devFormat,
  defaultMeta: config.isProduction ? { service: 'terminal-backoffice-api' } : undefined,
  silent: config.isTest,
  transports: [
    new winston.transports.Console(),
    ...(config.isProduction ? [
      new winston.transports.File({ filename: 'logs/error.log', level: 'error', maxsize: LOG_FILE_MAX_BYTES, maxFiles: 5 }),
      new winston.transports.File({ filename: 'logs/combined.log', maxsize: LOG_FILE_MAX_BYTES, maxFiles: 5 })
    ] : [])
  ]
});
