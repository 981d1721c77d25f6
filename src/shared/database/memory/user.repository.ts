import { NewUser, UserListFilter, UserPatch, UserRepository } from '../repository.interface';
import { UserRecord } from '../records';
import { MemoryStore, applyPatch, assertUnique, matchesAny } from './memory.store';

export class MemoryUserRepository implements UserRepository {
  constructor(private readonly store: MemoryStore) {}

  async findById(id: number): Promise<UserRecord | null> {
    const user = this.store.users.find(row => row.id === id);
    return user ? { ...user } : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const needle = username.toLowerCase();
    const user = this.store.users.find(row => row.username.toLowerCase() === needle);
    return user ? { ...user } : null;
  }

  async list(filter: UserListFilter): Promise<UserRecord[]> {
    return this.store.users
      .filter(user => !filter.roles || filter.roles.includes(user.role))
      .filter(user => user.id !== filter.excludeId)
      .filter(user => matchesAny(filter.search, [user.username, user.firstName, user.lastName, user.email]))
      .sort((a, b) => a.username.localeCompare(b.username))
      .map(user => ({ ...user }));
  }

  async create(input: NewUser): Promise<UserRecord> {
    assertUnique(this.store.users, input.username, row => row.username, 'users_username_lower_unique');
    const user: UserRecord = {
      ...input,
      id: this.store.nextId('users'),
      createdAt: new Date(),
      lastLoginAt: null
    };
    this.store.users.push(user);
    return { ...user };
  }

  async update(id: number, patch: UserPatch): Promise<UserRecord | null> {
    const user = this.store.users.find(row => row.id === id);
    if (!user) return null;
    if (patch.username !== undefined) {
      assertUnique(this.store.users, patch.username, row => row.username, 'users_username_lower_unique', id);
    }
    applyPatch(user, patch);
    return { ...user };
  }

  async delete(id: number): Promise<boolean> {
    const index = this.store.users.findIndex(row => row.id === id);
    if (index === -1) return false;
    this.store.users.splice(index, 1);
    for (const deposit of this.store.deposits) {
      if (deposit.createdById === id) deposit.createdById = null;
      if (deposit.approvedById === id) deposit.approvedById = null;
    }
    return true;
  }
}
