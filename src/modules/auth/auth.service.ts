/**
 * =============================================================================
 * AUTH MODULE - SERVICE
 * =============================================================================
 *
 * Username/password login for back office staff.
 *
 * SECURITY FEATURES:
 * - Passwords verified against bcryptjs hashes
 * - Unknown users and inactive users get the same INVALID_CREDENTIALS answer
 * - Access tokens carry a jti so logout can revoke them
 * - Login attempts are rate limited at route level
 * =============================================================================
 */

import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config/environment';
import { ROLE_DASHBOARDS, ROLE_DISPLAY_NAMES, UserRole } from '../../core/constants';
import { InvalidCredentialsError, NotFoundError } from '../../core/errors/AppError';
import { db } from '../../shared/database/db';
import { UserRecord, userFullName } from '../../shared/database/records';
import { Repositories } from '../../shared/database/repository.interface';
import { AuthUser } from '../../shared/middleware/auth.middleware';
import { logger } from '../../shared/services/logger.service';
import { TokenBlocklist, tokenBlocklist } from '../../shared/services/token-blocklist.service';
import { Clock, systemClock, toEpochSeconds } from '../../shared/utils/date.utils';

/**
 * User as exposed by the API (never includes the password hash)
 */
export interface PublicUser {
  id: number;
  username: string;
  firstName: string;
  lastName: string;
  fullName: string;
  email: string | null;
  role: UserRole;
  roleLabel: string;
  isActive: boolean;
  createdAt: Date;
  lastLoginAt: Date | null;
}

export interface LoginResult {
  token: string;
  /** Seconds */
  expiresIn: number;
  user: PublicUser;
  dashboard: string;
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    fullName: userFullName(user),
    email: user.email,
    role: user.role,
    roleLabel: ROLE_DISPLAY_NAMES[user.role],
    isActive: user.isActive,
    createdAt: user.createdAt,
    lastLoginAt: user.lastLoginAt
  };
}

export class AuthService {
  constructor(
    private readonly repos: Repositories = db,
    private readonly blocklist: TokenBlocklist = tokenBlocklist,
    private readonly clock: Clock = systemClock
  ) {}

  async login(username: string, password: string): Promise<LoginResult> {
    const user = await this.repos.users.findByUsername(username);
    const passwordMatches = user ? await bcrypt.compare(password, user.passwordHash) : false;

    if (!user || !passwordMatches || !user.isActive) {
      logger.warn('Failed login attempt', { username, reason: !user ? 'unknown_user' : !passwordMatches ? 'bad_password' : 'inactive' });
      throw new InvalidCredentialsError();
    }

    const now = this.clock();
    const updated = await this.repos.users.update(user.id, { lastLoginAt: now });
    const token = this.signToken(user, now);

    logger.info('User logged in', { userId: user.id, role: user.role });

    return {
      token,
      expiresIn: config.jwt.expiresIn,
      user: toPublicUser(updated ?? user),
      dashboard: ROLE_DASHBOARDS[user.role]
    };
  }

  /**
   * Revoke the presented token until it would have expired
   */
  logout(auth: AuthUser): void {
    this.blocklist.revoke(auth.jti, auth.exp);
    logger.info('User logged out', { userId: auth.userId });
  }

  async getCurrentUser(userId: number): Promise<PublicUser> {
    const user = await this.repos.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toPublicUser(user);
  }

  signToken(user: Pick<UserRecord, 'id' | 'role' | 'username'>, issuedAt: Date = this.clock()): string {
    return jwt.sign(
      { role: user.role, username: user.username, iat: toEpochSeconds(issuedAt) },
      config.jwt.secret,
      {
        subject: String(user.id),
        jwtid: uuidv4(),
        expiresIn: config.jwt.expiresIn
      }
    );
  }
}

export const authService = new AuthService();
