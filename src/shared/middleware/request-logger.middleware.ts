/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One log line per finished request. Bodies and headers are never logged.
 * Health probes and the polled public queue log at debug.
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { config } from '../../config/environment';
import { currentUserId } from './auth.middleware';

const QUIET_PATH_PREFIXES = ['/health', '/api/v1/terminal/public'];

const SENSITIVE_PARAMS = ['token', 'secret', 'password'];

export function maskQueryParams(query: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(query).map(([key, value]) => [
      key,
      SENSITIVE_PARAMS.some(param => key.toLowerCase().includes(param)) ? '[MASKED]' : value
    ])
  );
}

function levelFor(status: number, path: string): 'error' | 'warn' | 'info' | 'debug' {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return QUIET_PATH_PREFIXES.some(prefix => path.startsWith(prefix)) ? 'debug' : 'info';
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  if (!config.security.enableRequestLogging) {
    next();
    return;
  }

  const startedAt = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    const path = req.originalUrl.split('?')[0];

    logger.log(levelFor(res.statusCode, path), `${req.method} ${path} ${res.statusCode}`, {
      requestId: req.headers['x-request-id'],
      durationMs: Math.round(durationMs),
      userId: currentUserId(req),
      ...(Object.keys(req.query).length > 0 && { query: maskQueryParams(req.query) })
    });
  });

  next();
}
