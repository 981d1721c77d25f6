/**
 * =============================================================================
 * USER MODULE - SERVICE
 * =============================================================================
 *
 * Back office account management.
 *
 * Role rules:
 * - admin sees and manages every account but their own
 * - staff_admin sees staff_admin and treasurer accounts, creates staff_admin
 *   accounts only and can never grant the admin role
 * - nobody edits or deletes their own account here
 * =============================================================================
 */

import bcrypt from 'bcryptjs';
import { config } from '../../config/environment';
import { ALL_ROLES, UserRole } from '../../core/constants';
import { ForbiddenError, NotFoundError } from '../../core/errors/AppError';
import { db } from '../../shared/database/db';
import { UserRecord } from '../../shared/database/records';
import { Repositories, UserPatch } from '../../shared/database/repository.interface';
import { AuthUser } from '../../shared/middleware/auth.middleware';
import { logger } from '../../shared/services/logger.service';
import { PublicUser, toPublicUser } from '../auth/auth.service';
import { CreateUserInput, ListUsersQuery, UpdateUserInput } from './user.schema';

export type RoleCounts = Record<UserRole, number> & { total: number };

export interface UserListResult {
  users: PublicUser[];
  counts: RoleCounts;
}

type Actor = Pick<AuthUser, 'userId' | 'role'>;

/**
 * Roles whose accounts the actor may see
 */
export function visibleRoles(actor: UserRole): readonly UserRole[] {
  switch (actor) {
    case UserRole.ADMIN:
      return ALL_ROLES;
    case UserRole.STAFF_ADMIN:
      return [UserRole.STAFF_ADMIN, UserRole.TREASURER];
    case UserRole.TREASURER:
      return [];
  }
}

/**
 * Roles the actor may hand out on create
 */
export function creatableRoles(actor: UserRole): readonly UserRole[] {
  switch (actor) {
    case UserRole.ADMIN:
      return ALL_ROLES;
    case UserRole.STAFF_ADMIN:
      return [UserRole.STAFF_ADMIN];
    case UserRole.TREASURER:
      return [];
  }
}

export class UserService {
  constructor(private readonly repos: Repositories = db) {}

  async listUsers(actor: Actor, query: ListUsersQuery): Promise<UserListResult> {
    const visible = await this.repos.users.list({
      roles: visibleRoles(actor.role),
      excludeId: actor.userId,
      search: query.search
    });

    const counts: RoleCounts = {
      [UserRole.ADMIN]: 0,
      [UserRole.STAFF_ADMIN]: 0,
      [UserRole.TREASURER]: 0,
      total: visible.length
    };
    for (const user of visible) {
      counts[user.role] += 1;
    }

    const users = query.role ? visible.filter(user => user.role === query.role) : visible;
    return { users: users.map(toPublicUser), counts };
  }

  async getUser(actor: Actor, id: number): Promise<PublicUser> {
    return toPublicUser(await this.findVisible(actor, id));
  }

  async createUser(actor: Actor, input: CreateUserInput): Promise<PublicUser> {
    if (!creatableRoles(actor.role).includes(input.role)) {
      throw new ForbiddenError(`You cannot create ${input.role} accounts`);
    }

    const user = await this.repos.users.create({
      username: input.username,
      passwordHash: await bcrypt.hash(input.password, config.bcryptRounds),
      firstName: input.firstName,
      lastName: input.lastName,
      email: input.email,
      role: input.role,
      isActive: input.isActive
    });

    logger.info('User created', { userId: user.id, role: user.role, createdBy: actor.userId });
    return toPublicUser(user);
  }

  async updateUser(actor: Actor, id: number, input: UpdateUserInput): Promise<PublicUser> {
    if (id === actor.userId) {
      throw new ForbiddenError('You cannot edit your own account here');
    }

    const target = await this.repos.users.findById(id);
    if (!target) {
      throw new NotFoundError('User not found');
    }
    if (actor.role !== UserRole.ADMIN) {
      if (target.role === UserRole.ADMIN) {
        throw new ForbiddenError('You cannot edit an administrator');
      }
      if (input.role === UserRole.ADMIN) {
        throw new ForbiddenError('You cannot grant the admin role');
      }
      if (!visibleRoles(actor.role).includes(target.role)) {
        throw new NotFoundError('User not found');
      }
    }

    const { password, ...fields } = input;
    const patch: UserPatch = { ...fields };
    if (password !== undefined) {
      patch.passwordHash = await bcrypt.hash(password, config.bcryptRounds);
    }

    const updated = await this.repos.users.update(id, patch);
    if (!updated) {
      throw new NotFoundError('User not found');
    }

    logger.info('User updated', { userId: id, updatedBy: actor.userId, passwordChanged: password !== undefined });
    return toPublicUser(updated);
  }

  async deleteUser(actor: Actor, id: number): Promise<void> {
    if (id === actor.userId) {
      throw new ForbiddenError('You cannot delete your own account');
    }
    const target = await this.findVisible(actor, id);
    await this.repos.users.delete(target.id);
    logger.info('User deleted', { userId: id, deletedBy: actor.userId });
  }

  private async findVisible(actor: Actor, id: number): Promise<UserRecord> {
    const user = await this.repos.users.findById(id);
    if (!user || !visibleRoles(actor.role).includes(user.role)) {
      throw new NotFoundError('User not found');
    }
    return user;
  }
}

export const userService = new UserService();
