/**
 * =============================================================================
 * USER SERVICE - Unit Tests
 * =============================================================================
 *
 * Who may see, create, edit and delete which back office accounts.
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
import { ErrorCode, UserRole } from '../core/constants';
import { ForbiddenError, NotFoundError } from '../core/errors/AppError';
import { createMemoryRepositories } from '../shared/database/memory';
import { Repositories } from '../shared/database/repository.interface';
import { AuthUser } from '../shared/middleware/auth.middleware';
import { UserService, creatableRoles, visibleRoles } from '../modules/user/user.service';
import { CreateUserInput } from '../modules/user/user.schema';
import { actorFor, createAccount } from './helpers/fleet';

function newAccount(username: string, role: UserRole): CreateUserInput {
  return {
    username,
    password: 'test-password',
    firstName: 'New',
    lastName: 'Account',
    email: null,
    role,
    isActive: true
  };
}

describe('role rules', () => {
  it('lets admins see and create every role', () => {
    expect(visibleRoles(UserRole.ADMIN)).toEqual([UserRole.ADMIN, UserRole.STAFF_ADMIN, UserRole.TREASURER]);
    expect(creatableRoles(UserRole.ADMIN)).toEqual([UserRole.ADMIN, UserRole.STAFF_ADMIN, UserRole.TREASURER]);
  });

  it('limits staff admins', () => {
    expect(visibleRoles(UserRole.STAFF_ADMIN)).toEqual([UserRole.STAFF_ADMIN, UserRole.TREASURER]);
    expect(creatableRoles(UserRole.STAFF_ADMIN)).toEqual([UserRole.STAFF_ADMIN]);
  });

  it('gives treasurers nothing', () => {
    expect(visibleRoles(UserRole.TREASURER)).toEqual([]);
    expect(creatableRoles(UserRole.TREASURER)).toEqual([]);
  });
});

describe('UserService', () => {
  let repos: Repositories;
  let service: UserService;
  let admin: AuthUser;
  let staff: AuthUser;

  beforeEach(async () => {
    repos = createMemoryRepositories();
    service = new UserService(repos);
    admin = actorFor(await createAccount(repos, 'admin', UserRole.ADMIN));
    staff = actorFor(await createAccount(repos, 'staff', UserRole.STAFF_ADMIN));
    await createAccount(repos, 'treasurer', UserRole.TREASURER);
    await createAccount(repos, 'backup-admin', UserRole.ADMIN);
  });

  describe('listUsers', () => {
    it('shows an admin everyone but themselves, with role counts', async () => {
      const result = await service.listUsers(admin, { search: undefined, role: undefined });

      expect(result.users.map(user => user.username)).toEqual(['backup-admin', 'staff', 'treasurer']);
      expect(result.counts).toEqual({
        [UserRole.ADMIN]: 1,
        [UserRole.STAFF_ADMIN]: 1,
        [UserRole.TREASURER]: 1,
        total: 3
      });
    });

    it('hides admins from staff admins', async () => {
      const result = await service.listUsers(staff, { search: undefined, role: undefined });
      expect(result.users.map(user => user.username)).toEqual(['treasurer']);
    });

    it('filters by role after counting', async () => {
      const result = await service.listUsers(admin, { search: undefined, role: UserRole.TREASURER });

      expect(result.users.map(user => user.username)).toEqual(['treasurer']);
      expect(result.counts.total).toBe(3);
    });
  });

  describe('createUser', () => {
    it('hashes the password and never returns it', async () => {
      const created = await service.createUser(admin, newAccount('cashier', UserRole.TREASURER));

      expect(created).toMatchObject({ username: 'cashier', role: UserRole.TREASURER, roleLabel: 'Treasurer' });
      expect(created).not.toHaveProperty('passwordHash');

      const stored = await repos.users.findByUsername('cashier');
      expect(stored?.passwordHash).not.toBe('test-password');
      expect(await bcrypt.compare('test-password', stored?.passwordHash ?? '')).toBe(true);
    });

    it('forbids staff admins from creating treasurers or admins', async () => {
      await expect(service.createUser(staff, newAccount('cashier', UserRole.TREASURER)))
        .rejects.toMatchObject({ message: 'You cannot create treasurer accounts' });
      await expect(service.createUser(staff, newAccount('boss', UserRole.ADMIN)))
        .rejects.toBeInstanceOf(ForbiddenError);

      const created = await service.createUser(staff, newAccount('helper', UserRole.STAFF_ADMIN));
      expect(created.role).toBe(UserRole.STAFF_ADMIN);
    });

    it('refuses a taken username regardless of case', async () => {
      await expect(service.createUser(admin, newAccount('STAFF', UserRole.STAFF_ADMIN))).rejects.toMatchObject({
        message: 'Username is already taken',
        code: ErrorCode.USERNAME_TAKEN,
        statusCode: 409
      });
    });
  });

  describe('updateUser and deleteUser', () => {
    it('refuses to edit or delete the caller\'s own account', async () => {
      await expect(service.updateUser(admin, admin.userId, { firstName: 'Me' })).rejects.toBeInstanceOf(ForbiddenError);
      await expect(service.deleteUser(admin, admin.userId)).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('keeps staff admins away from administrators', async () => {
      await expect(service.updateUser(staff, admin.userId, { firstName: 'X' }))
        .rejects.toMatchObject({ message: 'You cannot edit an administrator' });
      await expect(service.deleteUser(staff, admin.userId)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('forbids staff admins from granting the admin role', async () => {
      const treasurer = await repos.users.findByUsername('treasurer');
      if (!treasurer) throw new Error('seed user missing');

      await expect(service.updateUser(staff, treasurer.id, { role: UserRole.ADMIN }))
        .rejects.toMatchObject({ message: 'You cannot grant the admin role' });
    });

    it('rehashes a changed password', async () => {
      const treasurer = await repos.users.findByUsername('treasurer');
      if (!treasurer) throw new Error('seed user missing');

      await service.updateUser(admin, treasurer.id, { password: 'another-password', isActive: false });

      const stored = await repos.users.findById(treasurer.id);
      expect(stored?.isActive).toBe(false);
      expect(await bcrypt.compare('another-password', stored?.passwordHash ?? '')).toBe(true);
    });

    it('deletes a visible account', async () => {
      const treasurer = await repos.users.findByUsername('treasurer');
      if (!treasurer) throw new Error('seed user missing');

      await service.deleteUser(staff, treasurer.id);

      expect(await repos.users.findById(treasurer.id)).toBeNull();
    });
  });
});
