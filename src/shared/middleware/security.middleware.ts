/**
 * =============================================================================
 * SECURITY MIDDLEWARE
 * =============================================================================
 *
 * - X-Request-ID on every request and response
 * - Helmet headers for a JSON-only API (the TV display and public queue are
 *   fetched cross-origin by the terminal screens)
 * - Markup stripped from free-text body fields (names, notes, addresses)
 * - Repeated query keys collapsed to their first value
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';

const ONE_YEAR_SECONDS = 31536000;

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = headerValue(req.headers['x-request-id']) ?? uuidv4();

  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

/**
 * Nothing here is rendered by a browser, so the CSP denies everything
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"]
    }
  },
  crossOriginResourcePolicy: { policy: 'cross-origin' },
  frameguard: { action: 'deny' },
  hsts: { maxAge: ONE_YEAR_SECONDS, includeSubDomains: true },
  referrerPolicy: { policy: 'no-referrer' }
});

/**
 * Drop HTML tags and javascript: URLs, then trim
 */
export function stripMarkup(value: string): string {
  return value
    .replace(/<[^>]*>/g, '')
    .replace(/javascript:/gi, '')
    .trim();
}

function stripValue(value: unknown): unknown {
  if (typeof value === 'string') return stripMarkup(value);
  if (Array.isArray(value)) return value.map(stripValue);
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, stripValue(inner)]));
  }
  return value;
}

/**
 * Password fields are left untouched; every other string is stripped
 */
export function sanitizeInput(req: Request, _res: Response, next: NextFunction): void {
  if (req.body && typeof req.body === 'object' && !Array.isArray(req.body)) {
    req.body = Object.fromEntries(
      Object.entries(req.body).map(([key, value]) => [key, key === 'password' ? value : stripValue(value)])
    );
  }
  next();
}

export function preventParamPollution(req: Request, _res: Response, next: NextFunction): void {
  for (const [key, value] of Object.entries(req.query)) {
    if (Array.isArray(value)) {
      req.query[key] = value[0];
    }
  }
  next();
}
