/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Prevents abuse by limiting request rates.
 * In-memory store: one counter set per process.
 *
 * - apiRateLimiter: every /api route
 * - loginRateLimiter: credential attempts, per IP + username
 * =============================================================================
 */

import { Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { config } from '../../config/environment';
import { ErrorCode } from '../../core/constants';
import { errorResponse } from '../types/api.types';
import { logger } from '../services/logger.service';

function rejectTooManyRequests(message: string) {
  return (req: Request, res: Response): void => {
    logger.warn('Rate limit exceeded', { path: req.path, ip: req.ip });
    res.status(429).json(errorResponse(ErrorCode.RATE_LIMIT_EXCEEDED, message));
  };
}

/**
 * General API limiter
 */
export const apiRateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.maxRequests,
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.security.enableRateLimiting,
  handler: rejectTooManyRequests('Too many requests, please try again later')
});

/**
 * Login limiter
 * Keyed by IP and submitted username so one account cannot be brute forced
 * from behind a shared address.
 */
export const loginRateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.loginMax,
  standardHeaders: true,
  legacyHeaders: false,
  skipSuccessfulRequests: true,
  skip: () => !config.security.enableRateLimiting,
  keyGenerator: (req: Request) => {
    const body: unknown = req.body;
    const username = typeof body === 'object' && body !== null && 'username' in body && typeof body.username === 'string'
      ? body.username.toLowerCase()
      : '';
    return `${req.ip ?? 'unknown'}:${username}`;
  },
  handler: rejectTooManyRequests('Too many login attempts, please try again later')
});
