import { and, asc, count, desc, eq, gte, inArray, lt, lte, sql, SQL } from 'drizzle-orm';
import { DEFAULT_SYSTEM_SETTINGS, EntryStatus } from '../../../core/constants';
import { DateRange, YearMonth, compareYearMonth } from '../../utils/date.utils';
import { parseMoney, toMoneyString } from '../../utils/money.utils';
import {
  AmountSummary,
  DailyAmount,
  EntryAdmission,
  EntryFilter,
  EntryOutcome,
  EntryPatch,
  SettingsPatch,
  TerminalRepository,
  TransactionFilter
} from '../repository.interface';
import { EntryLogRecord, QueueEntry, SystemSettingsRecord, TransactionRecord } from '../records';
import { drivers, entryLogs, profits, systemSettings, transactions, transitRoutes, vehicles, wallets } from '../schema';
import {
  toDriverRecord,
  toEntryLogRecord,
  toRouteRecord,
  toSettingsRecord,
  toTransactionRecord,
  toVehicleRecord
} from './mappers';
import { Database, hasChanges, withUniqueGuard } from './pg.client';

const SETTINGS_ID = 1;

function transactionConditions(filter: TransactionFilter): SQL | undefined {
  const conds: SQL[] = [];
  if (filter.year !== undefined) conds.push(eq(transactions.transactionYear, filter.year));
  if (filter.month !== undefined) conds.push(eq(transactions.transactionMonth, filter.month));
  if (filter.revenueOnly) conds.push(eq(transactions.isRevenueCounted, true));
  return conds.length ? and(...conds) : undefined;
}

function rangeConditions(range: DateRange | undefined): SQL[] {
  return range ? [gte(entryLogs.createdAt, range.from), lt(entryLogs.createdAt, range.to)] : [];
}

function profitConditions(fromDate?: string, toDate?: string): SQL | undefined {
  const conds: SQL[] = [];
  if (fromDate !== undefined) conds.push(gte(profits.date, fromDate));
  if (toDate !== undefined) conds.push(lte(profits.date, toDate));
  return conds.length ? and(...conds) : undefined;
}

export class PostgresTerminalRepository implements TerminalRepository {
  constructor(
    private readonly db: Database,
    private readonly timeZone: string
  ) {}

  // ---------------------------------------------------------------------------
  // Settings (single row, created on first read)
  // ---------------------------------------------------------------------------

  async getSettings(): Promise<SystemSettingsRecord> {
    const [row] = await this.db.select().from(systemSettings).where(eq(systemSettings.id, SETTINGS_ID)).limit(1);
    if (row) return toSettingsRecord(row);

    const [created] = await this.db
      .insert(systemSettings)
      .values({
        id: SETTINGS_ID,
        minDepositAmount: toMoneyString(DEFAULT_SYSTEM_SETTINGS.minDepositAmount),
        terminalFee: toMoneyString(DEFAULT_SYSTEM_SETTINGS.terminalFee),
        departureCountdownMinutes: DEFAULT_SYSTEM_SETTINGS.departureCountdownMinutes
      })
      .onConflictDoNothing()
      .returning();
    return created ? toSettingsRecord(created) : this.getSettings();
  }

  async updateSettings(patch: SettingsPatch): Promise<SystemSettingsRecord> {
    await this.getSettings();
    const [row] = await this.db
      .update(systemSettings)
      .set({
        minDepositAmount: patch.minDepositAmount === undefined ? undefined : toMoneyString(patch.minDepositAmount),
        terminalFee: patch.terminalFee === undefined ? undefined : toMoneyString(patch.terminalFee),
        departureCountdownMinutes: patch.departureCountdownMinutes,
        updatedAt: new Date()
      })
      .where(eq(systemSettings.id, SETTINGS_ID))
      .returning();
    return toSettingsRecord(row);
  }

  // ---------------------------------------------------------------------------
  // Queue
  // ---------------------------------------------------------------------------

  async admitVehicle(admission: EntryAdmission): Promise<EntryOutcome> {
    return withUniqueGuard(() => this.db.transaction(async (tx): Promise<EntryOutcome> => {
      // Row lock serializes concurrent scans of the same vehicle
      const [wallet] = await tx
        .select()
        .from(wallets)
        .where(eq(wallets.vehicleId, admission.vehicleId))
        .for('update');

      const [queued] = await tx
        .select()
        .from(entryLogs)
        .where(and(eq(entryLogs.vehicleId, admission.vehicleId), eq(entryLogs.isActive, true)))
        .limit(1);
      if (queued) {
        return { status: 'already_queued', entry: toEntryLogRecord(queued) };
      }

      const balance = wallet ? parseMoney(wallet.balance) : 0;
      if (!wallet || balance < admission.fee) {
        const [entry] = await tx
          .insert(entryLogs)
          .values({
            vehicleId: admission.vehicleId,
            feeCharged: toMoneyString(0),
            walletBalanceSnapshot: toMoneyString(balance),
            status: EntryStatus.INSUFFICIENT,
            isActive: false,
            createdAt: admission.at
          })
          .returning();
        return { status: 'insufficient', entry: toEntryLogRecord(entry), balance };
      }

      const [debited] = await tx
        .update(wallets)
        .set({ balance: sql`${wallets.balance} - ${toMoneyString(admission.fee)}`, updatedAt: admission.at })
        .where(eq(wallets.id, wallet.id))
        .returning({ balance: wallets.balance });
      const remaining = parseMoney(debited.balance);

      const [entry] = await tx
        .insert(entryLogs)
        .values({
          vehicleId: admission.vehicleId,
          feeCharged: toMoneyString(admission.fee),
          walletBalanceSnapshot: toMoneyString(remaining),
          status: EntryStatus.SUCCESS,
          isActive: true,
          departureTime: admission.departureTime,
          createdAt: admission.at
        })
        .returning();

      const [transaction] = await tx
        .insert(transactions)
        .values({
          entryLogId: entry.id,
          vehicleId: admission.vehicleId,
          ...admission.archive,
          feeCharged: toMoneyString(admission.fee),
          walletBalanceSnapshot: toMoneyString(remaining),
          entryTimestamp: admission.at,
          isRevenueCounted: true
        })
        .returning();

      await tx.insert(profits).values({
        entryLogId: entry.id,
        amount: toMoneyString(admission.fee),
        date: admission.archive.transactionDate,
        createdAt: admission.at
      });

      return {
        status: 'admitted',
        entry: toEntryLogRecord(entry),
        transaction: toTransactionRecord(transaction),
        balance: remaining
      };
    }));
  }

  private queueQuery() {
    return this.db
      .select({ entry: entryLogs, vehicle: vehicles, driver: drivers, route: transitRoutes })
      .from(entryLogs)
      .innerJoin(vehicles, eq(vehicles.id, entryLogs.vehicleId))
      .innerJoin(drivers, eq(drivers.id, vehicles.driverId))
      .leftJoin(transitRoutes, eq(transitRoutes.id, vehicles.routeId));
  }

  async findEntryById(id: number): Promise<QueueEntry | null> {
    const [row] = await this.queueQuery().where(eq(entryLogs.id, id)).limit(1);
    return row ? toQueueEntry(row) : null;
  }

  async findActiveEntryForVehicle(vehicleId: number): Promise<EntryLogRecord | null> {
    const [row] = await this.db
      .select()
      .from(entryLogs)
      .where(and(eq(entryLogs.vehicleId, vehicleId), eq(entryLogs.isActive, true)))
      .limit(1);
    return row ? toEntryLogRecord(row) : null;
  }

  async departEntry(id: number, at: Date): Promise<EntryLogRecord | null> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .update(entryLogs)
        .set({ isActive: false, departedAt: at })
        .where(and(eq(entryLogs.id, id), eq(entryLogs.isActive, true)))
        .returning();
      if (!row) return null;
      await tx.update(transactions).set({ exitTimestamp: at }).where(eq(transactions.entryLogId, id));
      return toEntryLogRecord(row);
    });
  }

  async updateEntry(id: number, patch: EntryPatch): Promise<EntryLogRecord | null> {
    if (!hasChanges(patch)) {
      return this.findActiveEntryById(id);
    }
    const [row] = await this.db
      .update(entryLogs)
      .set(patch)
      .where(and(eq(entryLogs.id, id), eq(entryLogs.isActive, true)))
      .returning();
    return row ? toEntryLogRecord(row) : null;
  }

  private async findActiveEntryById(id: number): Promise<EntryLogRecord | null> {
    const [row] = await this.db
      .select()
      .from(entryLogs)
      .where(and(eq(entryLogs.id, id), eq(entryLogs.isActive, true)))
      .limit(1);
    return row ? toEntryLogRecord(row) : null;
  }

  async listEntries(filter: EntryFilter): Promise<QueueEntry[]> {
    const conds: SQL[] = rangeConditions(filter.range);
    if (filter.statuses) conds.push(inArray(entryLogs.status, [...filter.statuses]));
    if (filter.activeOnly) conds.push(eq(entryLogs.isActive, true));
    if (filter.routeId !== undefined) conds.push(eq(vehicles.routeId, filter.routeId));

    const direction = filter.order === 'desc' ? desc : asc;
    const query = this.queueQuery()
      .where(conds.length ? and(...conds) : undefined)
      .orderBy(direction(entryLogs.createdAt), direction(entryLogs.id));
    const rows = filter.limit === undefined ? await query : await query.limit(filter.limit);
    return rows.map(toQueueEntry);
  }

  async summarizeEntryFees(range?: DateRange): Promise<AmountSummary> {
    const [row] = await this.db
      .select({ total: sql<string>`coalesce(sum(${entryLogs.feeCharged}), 0)`, count: count() })
      .from(entryLogs)
      .where(and(eq(entryLogs.status, EntryStatus.SUCCESS), ...rangeConditions(range)));
    return { total: parseMoney(row?.total ?? null), count: row?.count ?? 0 };
  }

  async countQueue(): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(entryLogs)
      .where(and(eq(entryLogs.isActive, true), eq(entryLogs.status, EntryStatus.SUCCESS)));
    return row?.value ?? 0;
  }

  async entryMonths(): Promise<YearMonth[]> {
    const local = sql`(${entryLogs.createdAt} at time zone ${this.timeZone})`;
    const rows = await this.db
      .selectDistinct({
        year: sql<number>`cast(extract(year from ${local}) as integer)`.mapWith(Number),
        month: sql<number>`cast(extract(month from ${local}) as integer)`.mapWith(Number)
      })
      .from(entryLogs);
    return rows.sort((a, b) => compareYearMonth(b, a));
  }

  // ---------------------------------------------------------------------------
  // Archive
  // ---------------------------------------------------------------------------

  async listTransactions(filter: TransactionFilter, order: 'asc' | 'desc'): Promise<TransactionRecord[]> {
    const direction = order === 'desc' ? desc : asc;
    const rows = await this.db
      .select()
      .from(transactions)
      .where(transactionConditions(filter))
      .orderBy(direction(transactions.entryTimestamp), direction(transactions.id));
    return rows.map(toTransactionRecord);
  }

  async summarizeTransactions(filter: TransactionFilter): Promise<AmountSummary> {
    const [row] = await this.db
      .select({ total: sql<string>`coalesce(sum(${transactions.feeCharged}), 0)`, count: count() })
      .from(transactions)
      .where(transactionConditions(filter));
    return { total: parseMoney(row?.total ?? null), count: row?.count ?? 0 };
  }

  async transactionMonths(revenueOnly: boolean): Promise<YearMonth[]> {
    return this.db
      .selectDistinct({ year: transactions.transactionYear, month: transactions.transactionMonth })
      .from(transactions)
      .where(transactionConditions({ revenueOnly }))
      .orderBy(desc(transactions.transactionYear), desc(transactions.transactionMonth));
  }

  async sumProfit(fromDate?: string, toDate?: string): Promise<number> {
    const [row] = await this.db
      .select({ total: sql<string>`coalesce(sum(${profits.amount}), 0)` })
      .from(profits)
      .where(profitConditions(fromDate, toDate));
    return parseMoney(row?.total ?? null);
  }

  async dailyProfit(fromDate: string, toDate: string): Promise<DailyAmount[]> {
    const rows = await this.db
      .select({ date: profits.date, total: sql<string>`sum(${profits.amount})` })
      .from(profits)
      .where(profitConditions(fromDate, toDate))
      .groupBy(profits.date)
      .orderBy(asc(profits.date));
    return rows.map(row => ({ date: row.date, total: parseMoney(row.total) }));
  }
}

type QueueRow = {
  entry: typeof entryLogs.$inferSelect;
  vehicle: typeof vehicles.$inferSelect;
  driver: typeof drivers.$inferSelect;
  route: typeof transitRoutes.$inferSelect | null;
};

function toQueueEntry(row: QueueRow): QueueEntry {
  return {
    entry: toEntryLogRecord(row.entry),
    vehicle: toVehicleRecord(row.vehicle),
    driver: toDriverRecord(row.driver),
    route: row.route ? toRouteRecord(row.route) : null
  };
}
