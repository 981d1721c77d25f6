/**
 * =============================================================================
 * AUTH - Unit Tests
 * =============================================================================
 *
 * Login, token verification, logout revocation and the role guard.
 * =============================================================================
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    log: jest.fn()
  }
}));

import bcrypt from 'bcryptjs';
import express, { NextFunction, Request, Response } from 'express';
import { ErrorCode, UserRole } from '../core/constants';
import { ForbiddenError, UnauthorizedError } from '../core/errors/AppError';
import { createMemoryRepositories } from '../shared/database/memory';
import { Repositories } from '../shared/database/repository.interface';
import {
  authMiddleware,
  roleGuard,
  verifyAccessToken
} from '../shared/middleware/auth.middleware';
import { TokenBlocklist } from '../shared/services/token-blocklist.service';
import { AuthService } from '../modules/auth/auth.service';
import { FIXED_NOW, fixedClock } from './helpers/fleet';

function buildRequest(headers: Record<string, string> = {}): Request {
  const req: Request = Object.create(express.request);
  req.headers = headers;
  req.url = '/api/v1/test';
  return req;
}

const res: Response = Object.create(express.response);

function thrownBy(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('AuthService', () => {
  let repos: Repositories;
  let service: AuthService;

  beforeEach(async () => {
    repos = createMemoryRepositories();
    service = new AuthService(repos);
    await repos.users.create({
      username: 'treasurer',
      passwordHash: await bcrypt.hash('test-password', 4),
      firstName: 'Tina',
      lastName: 'Reyes',
      email: null,
      role: UserRole.TREASURER,
      isActive: true
    });
  });

  it('returns a token, the public user and the role dashboard', async () => {
    const result = await service.login('treasurer', 'test-password');

    expect(result.dashboard).toBe('/dashboard/treasurer');
    expect(result.expiresIn).toBe(12 * 60 * 60);
    expect(result.user).toMatchObject({
      username: 'treasurer',
      fullName: 'Tina Reyes',
      role: UserRole.TREASURER,
      roleLabel: 'Treasurer'
    });
    expect(result.user).not.toHaveProperty('passwordHash');
    expect(result.user.lastLoginAt).toBeInstanceOf(Date);

    const auth = verifyAccessToken(result.token);
    expect(auth).toMatchObject({ userId: result.user.id, role: UserRole.TREASURER, username: 'treasurer' });
  });

  it('gives unknown users and wrong passwords the same answer', async () => {
    await expect(service.login('nobody', 'test-password')).rejects.toMatchObject({
      message: 'Invalid username or password',
      code: ErrorCode.INVALID_CREDENTIALS
    });
    await expect(service.login('treasurer', 'wrong-password')).rejects.toMatchObject({
      message: 'Invalid username or password',
      code: ErrorCode.INVALID_CREDENTIALS
    });
  });

  it('refuses inactive accounts', async () => {
    const user = await repos.users.findByUsername('treasurer');
    if (!user) throw new Error('seed user missing');
    await repos.users.update(user.id, { isActive: false });

    await expect(service.login('treasurer', 'test-password')).rejects.toMatchObject({
      code: ErrorCode.INVALID_CREDENTIALS
    });
  });

  it('revokes the token on logout', async () => {
    const { token } = await service.login('treasurer', 'test-password');
    const auth = verifyAccessToken(token);

    service.logout(auth);

    expect(() => verifyAccessToken(token)).toThrow('Token has been revoked');
  });

  it('reports expired tokens', () => {
    const stale = new AuthService(repos, new TokenBlocklist(), fixedClock);
    const token = stale.signToken({ id: 1, role: UserRole.ADMIN, username: 'admin' }, FIXED_NOW);

    expect(thrownBy(() => verifyAccessToken(token))).toMatchObject({
      message: 'Token has expired',
      code: ErrorCode.TOKEN_EXPIRED
    });
  });

  it('rejects malformed tokens', () => {
    expect(thrownBy(() => verifyAccessToken('not.a.token'))).toMatchObject({
      message: 'Invalid token',
      code: ErrorCode.INVALID_TOKEN
    });
  });
});

describe('TokenBlocklist', () => {
  it('forgets revocations once the token has expired', () => {
    let now = 1000;
    const blocklist = new TokenBlocklist(() => now);

    blocklist.revoke('jti-1', 1060);
    expect(blocklist.isRevoked('jti-1')).toBe(true);
    expect(blocklist.isRevoked('jti-2')).toBe(false);

    now = 1060;
    expect(blocklist.isRevoked('jti-1')).toBe(false);
    expect(blocklist.size).toBe(0);
  });

  it('prunes expired entries on revoke', () => {
    let now = 1000;
    const blocklist = new TokenBlocklist(() => now);
    blocklist.revoke('jti-1', 1010);
    blocklist.revoke('jti-2', 2000);

    now = 1500;
    blocklist.revoke('jti-3', 2500);

    expect(blocklist.size).toBe(2);
  });
});

describe('authMiddleware', () => {
  const service = new AuthService(createMemoryRepositories());

  it('requires a bearer token', () => {
    const next: NextFunction = jest.fn();
    authMiddleware(buildRequest(), res, next);

    expect(next).toHaveBeenCalledWith(expect.any(UnauthorizedError));
  });

  it('attaches the user for a valid token', () => {
    const token = service.signToken({ id: 7, role: UserRole.STAFF_ADMIN, username: 'staff' });
    const req = buildRequest({ authorization: `Bearer ${token}` });
    const next: NextFunction = jest.fn();

    authMiddleware(req, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.user).toMatchObject({ userId: 7, role: UserRole.STAFF_ADMIN, username: 'staff' });
  });

  it('passes verification errors on', () => {
    const next: NextFunction = jest.fn();
    authMiddleware(buildRequest({ authorization: 'Bearer garbage' }), res, next);

    expect(next).toHaveBeenCalledWith(expect.objectContaining({ code: ErrorCode.INVALID_TOKEN }));
  });
});

describe('roleGuard', () => {
  const guard = roleGuard([UserRole.ADMIN, UserRole.STAFF_ADMIN]);

  function withRole(role: UserRole): Request {
    const req = buildRequest();
    req.user = { userId: 1, role, username: 'someone', jti: 'jti', exp: 0 };
    return req;
  }

  it('lets allowed roles through', () => {
    const next: NextFunction = jest.fn();
    guard(withRole(UserRole.STAFF_ADMIN), res, next);
    expect(next).toHaveBeenCalledWith();
  });

  it('forbids other roles', () => {
    const next: NextFunction = jest.fn();
    guard(withRole(UserRole.TREASURER), res, next);
    expect(next).toHaveBeenCalledWith(expect.any(ForbiddenError));
  });

  it('requires authentication first', () => {
    const next: NextFunction = jest.fn();
    guard(buildRequest(), res, next);
    expect(next).toHaveBeenCalledWith(expect.any(UnauthorizedError));
  });
});
