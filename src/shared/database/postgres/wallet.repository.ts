import { and, asc, count, desc, eq, gte, ilike, inArray, lt, or, sql, SQL } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import { DepositStatus, isCreditedStatus } from '../../../core/constants';
import { BalanceLimitError, NotFoundError } from '../../../core/errors/AppError';
import { YearMonth, compareYearMonth } from '../../utils/date.utils';
import { parseMoney, toMoneyString } from '../../utils/money.utils';
import {
  AmountSummary,
  DepositDecision,
  DepositFilter,
  DepositMonthFilter,
  DepositSort,
  NewDeposit,
  WalletBoardEntry,
  WalletListFilter,
  WalletRepository,
  WalletSort,
  WalletStats
} from '../repository.interface';
import { DepositRecord, DepositView, WalletRecord, toUserSummary } from '../records';
import { deposits, drivers, transitRoutes, users, vehicles, wallets } from '../schema';
import {
  toDepositRecord,
  toDriverRecord,
  toRouteRecord,
  toUserRecord,
  toVehicleRecord,
  toWalletRecord
} from './mappers';
import { Database, Executor, isNumericOverflow, withUniqueGuard } from './pg.client';

const creator = alias(users, 'creator');
const approver = alias(users, 'approver');

const latestDeposit = (column: typeof deposits.createdAt | typeof deposits.amount) =>
  sql`(select ${column} from ${deposits} where ${deposits.walletId} = ${wallets.id} order by ${deposits.createdAt} desc, ${deposits.id} desc limit 1)`;

// drizzle skips the decoder for NULL, which wallets without deposits produce
const lastDepositAt = latestDeposit(deposits.createdAt)
  .mapWith((value: string): Date | null => deposits.createdAt.mapFromDriverValue(value));
const lastDepositAmount = sql<string | null>`${latestDeposit(deposits.amount)}`;
const depositCount = sql<number>`(select count(*) from ${deposits} where ${deposits.walletId} = ${wallets.id})`.mapWith(Number);
const byLastDeposit = sql`${lastDepositAt} desc nulls last`;

const WALLET_ORDER: Record<WalletSort, SQL[]> = {
  newest: [byLastDeposit, desc(wallets.updatedAt), desc(wallets.id)],
  largest: [desc(wallets.balance), byLastDeposit, asc(wallets.id)],
  smallest: [asc(wallets.balance), byLastDeposit, asc(wallets.id)],
  driver_asc: [asc(drivers.lastName), asc(drivers.firstName), byLastDeposit, asc(wallets.id)],
  driver_desc: [desc(drivers.lastName), desc(drivers.firstName), byLastDeposit, asc(wallets.id)]
};

const newestDeposit = [desc(deposits.createdAt), desc(deposits.id)];

const DEPOSIT_ORDER: Record<DepositSort, SQL[]> = {
  newest: newestDeposit,
  oldest: [asc(deposits.createdAt), asc(deposits.id)],
  largest: [desc(deposits.amount), ...newestDeposit],
  smallest: [asc(deposits.amount), ...newestDeposit],
  driver_asc: [asc(drivers.lastName), asc(drivers.firstName), ...newestDeposit],
  driver_desc: [desc(drivers.lastName), desc(drivers.firstName), ...newestDeposit]
};

function walletSearch(search: string | undefined): SQL | undefined {
  if (!search) return undefined;
  const s = `%${search}%`;
  return or(
    ilike(vehicles.licensePlate, s),
    ilike(drivers.firstName, s),
    ilike(drivers.lastName, s),
    ilike(drivers.licenseNumber, s),
    ilike(drivers.driverCode, s)
  );
}

function depositConditions(filter: DepositFilter): SQL | undefined {
  const conds: SQL[] = [];
  if (filter.range) {
    conds.push(gte(deposits.createdAt, filter.range.from), lt(deposits.createdAt, filter.range.to));
  }
  if (filter.statuses) conds.push(inArray(deposits.status, [...filter.statuses]));
  if (filter.createdById !== undefined) conds.push(eq(deposits.createdById, filter.createdById));
  if (filter.walletId !== undefined) conds.push(eq(deposits.walletId, filter.walletId));
  if (filter.search) {
    const s = `%${filter.search}%`;
    const match = or(
      ilike(deposits.referenceNumber, s),
      ilike(deposits.orCode, s),
      ilike(vehicles.licensePlate, s),
      ilike(drivers.firstName, s),
      ilike(drivers.lastName, s),
      ilike(drivers.licenseNumber, s),
      ilike(drivers.driverCode, s)
    );
    if (match) conds.push(match);
  }
  return conds.length ? and(...conds) : undefined;
}

async function credit(tx: Executor, walletId: number, amount: number, at: Date): Promise<void> {
  const updated = await tx
    .update(wallets)
    .set({ balance: sql`${wallets.balance} + ${toMoneyString(amount)}`, updatedAt: at })
    .where(eq(wallets.id, walletId))
    .returning({ id: wallets.id })
    .catch((error: unknown) => {
      throw isNumericOverflow(error) ? new BalanceLimitError(walletId) : error;
    });
  if (updated.length === 0) {
    throw new NotFoundError('Wallet not found');
  }
}

export class PostgresWalletRepository implements WalletRepository {
  constructor(
    private readonly db: Database,
    private readonly timeZone: string
  ) {}

  async findWalletById(id: number): Promise<WalletRecord | null> {
    const [row] = await this.db.select().from(wallets).where(eq(wallets.id, id)).limit(1);
    return row ? toWalletRecord(row) : null;
  }

  async findWalletByVehicleId(vehicleId: number): Promise<WalletRecord | null> {
    const [row] = await this.db.select().from(wallets).where(eq(wallets.vehicleId, vehicleId)).limit(1);
    return row ? toWalletRecord(row) : null;
  }

  async listWallets(filter: WalletListFilter): Promise<WalletBoardEntry[]> {
    const rows = await this.db
      .select({
        wallet: wallets,
        vehicle: vehicles,
        driver: drivers,
        route: transitRoutes,
        lastDepositAt,
        lastDepositAmount,
        depositCount
      })
      .from(wallets)
      .innerJoin(vehicles, eq(vehicles.id, wallets.vehicleId))
      .innerJoin(drivers, eq(drivers.id, vehicles.driverId))
      .leftJoin(transitRoutes, eq(transitRoutes.id, vehicles.routeId))
      .where(walletSearch(filter.search))
      .orderBy(...WALLET_ORDER[filter.sort])
      .limit(filter.limit);

    return rows.map(row => ({
      wallet: toWalletRecord(row.wallet),
      vehicle: toVehicleRecord(row.vehicle),
      driver: toDriverRecord(row.driver),
      route: row.route ? toRouteRecord(row.route) : null,
      lastDeposit: row.lastDepositAt
        ? { amount: parseMoney(row.lastDepositAmount), createdAt: row.lastDepositAt }
        : null,
      depositCount: row.depositCount
    }));
  }

  async walletStats(lowBalanceThreshold: number, search?: string): Promise<WalletStats> {
    const [row] = await this.db
      .select({
        walletCount: count(),
        totalBalance: sql<string>`coalesce(sum(${wallets.balance}), 0)`,
        lowBalanceCount: sql<number>`count(*) filter (where ${wallets.balance} < ${toMoneyString(lowBalanceThreshold)})`.mapWith(Number)
      })
      .from(wallets)
      .innerJoin(vehicles, eq(vehicles.id, wallets.vehicleId))
      .innerJoin(drivers, eq(drivers.id, vehicles.driverId))
      .where(walletSearch(search));
    return {
      walletCount: row?.walletCount ?? 0,
      totalBalance: parseMoney(row?.totalBalance ?? null),
      lowBalanceCount: row?.lowBalanceCount ?? 0
    };
  }

  // ---------------------------------------------------------------------------
  // Deposits
  // ---------------------------------------------------------------------------

  private depositViewQuery() {
    return this.db
      .select({
        deposit: deposits,
        wallet: wallets,
        vehicle: vehicles,
        driver: drivers,
        createdBy: creator,
        approvedBy: approver
      })
      .from(deposits)
      .innerJoin(wallets, eq(wallets.id, deposits.walletId))
      .innerJoin(vehicles, eq(vehicles.id, wallets.vehicleId))
      .innerJoin(drivers, eq(drivers.id, vehicles.driverId))
      .leftJoin(creator, eq(creator.id, deposits.createdById))
      .leftJoin(approver, eq(approver.id, deposits.approvedById));
  }

  async findDepositById(id: number): Promise<DepositView | null> {
    const [row] = await this.depositViewQuery().where(eq(deposits.id, id)).limit(1);
    return row ? toDepositView(row) : null;
  }

  async findDepositByOrCode(orCode: string): Promise<DepositRecord | null> {
    const [row] = await this.db
      .select()
      .from(deposits)
      .where(sql`lower(${deposits.orCode}) = ${orCode.toLowerCase()}`)
      .limit(1);
    return row ? toDepositRecord(row) : null;
  }

  async createDeposit(input: NewDeposit): Promise<DepositRecord> {
    return withUniqueGuard(() => this.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(deposits)
        .values({ ...input, amount: toMoneyString(input.amount) })
        .returning();
      const deposit = toDepositRecord(row);
      if (isCreditedStatus(deposit.status)) {
        await credit(tx, deposit.walletId, deposit.amount, deposit.approvedAt ?? deposit.createdAt);
      }
      return deposit;
    }));
  }

  async approveDeposit(id: number, decision: DepositDecision): Promise<DepositRecord | null> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .update(deposits)
        .set({
          status: DepositStatus.APPROVED,
          approvedById: decision.actorId,
          approvedAt: decision.at,
          ...(decision.notes !== null ? { notes: decision.notes } : {})
        })
        .where(and(eq(deposits.id, id), eq(deposits.status, DepositStatus.PENDING)))
        .returning();
      if (!row) return null;
      const deposit = toDepositRecord(row);
      await credit(tx, deposit.walletId, deposit.amount, decision.at);
      return deposit;
    });
  }

  async rejectDeposit(id: number, decision: DepositDecision): Promise<DepositRecord | null> {
    const [row] = await this.db
      .update(deposits)
      .set({
        status: DepositStatus.REJECTED,
        approvedById: decision.actorId,
        approvedAt: decision.at,
        ...(decision.notes !== null ? { notes: decision.notes } : {})
      })
      .where(and(eq(deposits.id, id), eq(deposits.status, DepositStatus.PENDING)))
      .returning();
    return row ? toDepositRecord(row) : null;
  }

  async listDeposits(filter: DepositFilter, sort: DepositSort, limit?: number): Promise<DepositView[]> {
    const query = this.depositViewQuery()
      .where(depositConditions(filter))
      .orderBy(...DEPOSIT_ORDER[sort]);
    const rows = limit === undefined ? await query : await query.limit(limit);
    return rows.map(toDepositView);
  }

  async summarizeDeposits(filter: DepositFilter): Promise<AmountSummary> {
    const [row] = await this.db
      .select({
        total: sql<string>`coalesce(sum(${deposits.amount}), 0)`,
        count: count()
      })
      .from(deposits)
      .innerJoin(wallets, eq(wallets.id, deposits.walletId))
      .innerJoin(vehicles, eq(vehicles.id, wallets.vehicleId))
      .innerJoin(drivers, eq(drivers.id, vehicles.driverId))
      .where(depositConditions(filter));
    return { total: parseMoney(row?.total ?? null), count: row?.count ?? 0 };
  }

  async depositMonths(filter: DepositMonthFilter): Promise<YearMonth[]> {
    const local = sql`(${deposits.createdAt} at time zone ${this.timeZone})`;
    const year = sql<number>`cast(extract(year from ${local}) as integer)`.mapWith(Number);
    const month = sql<number>`cast(extract(month from ${local}) as integer)`.mapWith(Number);

    const rows = await this.db
      .selectDistinct({ year, month })
      .from(deposits)
      .where(depositConditions(filter));
    return rows.sort((a, b) => compareYearMonth(b, a));
  }
}

type DepositViewRow = {
  deposit: typeof deposits.$inferSelect;
  wallet: typeof wallets.$inferSelect;
  vehicle: typeof vehicles.$inferSelect;
  driver: typeof drivers.$inferSelect;
  createdBy: typeof users.$inferSelect | null;
  approvedBy: typeof users.$inferSelect | null;
};

function toDepositView(row: DepositViewRow): DepositView {
  return {
    deposit: toDepositRecord(row.deposit),
    wallet: toWalletRecord(row.wallet),
    vehicle: toVehicleRecord(row.vehicle),
    driver: toDriverRecord(row.driver),
    createdBy: row.createdBy ? toUserSummary(toUserRecord(row.createdBy)) : null,
    approvedBy: row.approvedBy ? toUserSummary(toUserRecord(row.approvedBy)) : null
  };
}
