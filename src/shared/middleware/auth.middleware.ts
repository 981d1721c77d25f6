/**
 * =============================================================================
 * AUTH MIDDLEWARE
 * =============================================================================
 *
 * Authentication and authorization middleware.
 *
 * SECURITY:
 * - Token validation on every request
 * - Revoked tokens (logout) are refused until they expire
 * - Role-based access control
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config/environment';
import { ErrorCode, UserRole } from '../../core/constants';
import { ForbiddenError, UnauthorizedError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';
import { tokenBlocklist } from '../services/token-blocklist.service';

/**
 * Claims carried by an access token
 */
export const accessTokenClaimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  role: z.nativeEnum(UserRole),
  username: z.string(),
  jti: z.string(),
  exp: z.number()
});

export interface AuthUser {
  userId: number;
  role: UserRole;
  username: string;
  jti: string;
  exp: number;
}

/**
 * Extended Request type with user info
 */
declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

/**
 * Verify a bearer token and return the user it identifies
 */
export function verifyAccessToken(token: string): AuthUser {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, config.jwt.secret);
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new UnauthorizedError('Token has expired', ErrorCode.TOKEN_EXPIRED);
    }
    throw new UnauthorizedError('Invalid token', ErrorCode.INVALID_TOKEN);
  }

  const claims = accessTokenClaimsSchema.safeParse(decoded);
  if (!claims.success) {
    throw new UnauthorizedError('Invalid token', ErrorCode.INVALID_TOKEN);
  }

  if (tokenBlocklist.isRevoked(claims.data.jti)) {
    throw new UnauthorizedError('Token has been revoked', ErrorCode.INVALID_TOKEN);
  }

  return {
    userId: Number(claims.data.sub),
    role: claims.data.role,
    username: claims.data.username,
    jti: claims.data.jti,
    exp: claims.data.exp
  };
}

/**
 * Auth middleware - validates JWT token
 * Must be applied to all protected routes
 */
export function authMiddleware(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    next(new UnauthorizedError('Authentication required'));
    return;
  }

  try {
    req.user = verifyAccessToken(authHeader.substring(7));
    next();
  } catch (error) {
    next(error);
  }
}

/**
 * Role guard - restricts access to specific roles
 * Must be used after authMiddleware
 */
export function roleGuard(allowedRoles: readonly UserRole[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new UnauthorizedError('Authentication required'));
      return;
    }

    if (!allowedRoles.includes(req.user.role)) {
      logger.warn('Access denied - insufficient role', {
        userId: req.user.userId,
        role: req.user.role,
        requiredRoles: allowedRoles,
        path: req.path
      });
      next(new ForbiddenError('Insufficient permissions'));
      return;
    }

    next();
  };
}

/**
 * The authenticated user of a request that passed authMiddleware
 */
export function requireUser(req: Request): AuthUser {
  if (!req.user) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.user;
}

export function currentUserId(req: Request): number | 'anonymous' {
  return req.user?.userId ?? 'anonymous';
}
