import { and, asc, eq, ilike, inArray, ne, or, sql, SQL } from 'drizzle-orm';
import { NewUser, UserListFilter, UserPatch, UserRepository } from '../repository.interface';
import { UserRecord } from '../records';
import { users } from '../schema';
import { toUserRecord } from './mappers';
import { Database, hasChanges, withUniqueGuard } from './pg.client';

export class PostgresUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async findById(id: number): Promise<UserRecord | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return row ? toUserRecord(row) : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const [row] = await this.db
      .select()
      .from(users)
      .where(sql`lower(${users.username}) = ${username.toLowerCase()}`)
      .limit(1);
    return row ? toUserRecord(row) : null;
  }

  async list(filter: UserListFilter): Promise<UserRecord[]> {
    const conds: SQL[] = [];
    if (filter.roles) conds.push(inArray(users.role, [...filter.roles]));
    if (filter.excludeId !== undefined) conds.push(ne(users.id, filter.excludeId));
    if (filter.search) {
      const s = `%${filter.search}%`;
      const match = or(ilike(users.username, s), ilike(users.firstName, s), ilike(users.lastName, s), ilike(users.email, s));
      if (match) conds.push(match);
    }

    const rows = await this.db
      .select()
      .from(users)
      .where(conds.length ? and(...conds) : undefined)
      .orderBy(asc(users.username));
    return rows.map(toUserRecord);
  }

  async create(input: NewUser): Promise<UserRecord> {
    const [row] = await withUniqueGuard(() => this.db.insert(users).values(input).returning());
    return toUserRecord(row);
  }

  async update(id: number, patch: UserPatch): Promise<UserRecord | null> {
    if (!hasChanges(patch)) return this.findById(id);
    const [row] = await withUniqueGuard(() =>
      this.db.update(users).set(patch).where(eq(users.id, id)).returning()
    );
    return row ? toUserRecord(row) : null;
  }

  async delete(id: number): Promise<boolean> {
    // deposits.created_by_id / approved_by_id are ON DELETE SET NULL
    const removed = await this.db.delete(users).where(eq(users.id, id)).returning({ id: users.id });
    return removed.length > 0;
  }
}
