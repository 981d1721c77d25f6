import { EntryStatus } from '../../../core/constants';
import {
  DateRange,
  YearMonth,
  compareYearMonth,
  sameYearMonth,
  toCalendarDate,
  toYearMonth
} from '../../utils/date.utils';
import { roundMoney, sumMoney } from '../../utils/money.utils';
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
import {
  EntryLogRecord,
  QueueEntry,
  SystemSettingsRecord,
  TransactionRecord
} from '../records';
import { MemoryStore, applyPatch, withinRange } from './memory.store';

function distinctMonths(months: Iterable<YearMonth>): YearMonth[] {
  const distinct: YearMonth[] = [];
  for (const month of months) {
    if (!distinct.some(existing => sameYearMonth(existing, month))) distinct.push(toYearMonth(month));
  }
  return distinct.sort((a, b) => compareYearMonth(b, a));
}

export class MemoryTerminalRepository implements TerminalRepository {
  constructor(private readonly store: MemoryStore) {}

  async getSettings(): Promise<SystemSettingsRecord> {
    return { ...this.store.settings };
  }

  async updateSettings(patch: SettingsPatch): Promise<SystemSettingsRecord> {
    applyPatch(this.store.settings, patch);
    this.store.settings.updatedAt = new Date();
    return { ...this.store.settings };
  }

  async admitVehicle(admission: EntryAdmission): Promise<EntryOutcome> {
    const { store } = this;
    const queued = store.entries.find(row => row.vehicleId === admission.vehicleId && row.isActive);
    if (queued) {
      return { status: 'already_queued', entry: { ...queued } };
    }

    const wallet = store.wallets.find(row => row.vehicleId === admission.vehicleId);
    const balance = wallet?.balance ?? 0;

    if (!wallet || balance < admission.fee) {
      const entry: EntryLogRecord = {
        id: store.nextId('entries'),
        vehicleId: admission.vehicleId,
        feeCharged: 0,
        walletBalanceSnapshot: balance,
        status: EntryStatus.INSUFFICIENT,
        isActive: false,
        boardingStartedAt: null,
        departureTime: null,
        departedAt: null,
        createdAt: admission.at
      };
      store.entries.push(entry);
      return { status: 'insufficient', entry: { ...entry }, balance };
    }

    wallet.balance = roundMoney(wallet.balance - admission.fee);
    wallet.updatedAt = admission.at;

    const entry: EntryLogRecord = {
      id: store.nextId('entries'),
      vehicleId: admission.vehicleId,
      feeCharged: admission.fee,
      walletBalanceSnapshot: wallet.balance,
      status: EntryStatus.SUCCESS,
      isActive: true,
      boardingStartedAt: null,
      departureTime: admission.departureTime,
      departedAt: null,
      createdAt: admission.at
    };
    const transaction: TransactionRecord = {
      id: store.nextId('transactions'),
      entryLogId: entry.id,
      vehicleId: admission.vehicleId,
      ...admission.archive,
      feeCharged: admission.fee,
      walletBalanceSnapshot: wallet.balance,
      entryTimestamp: admission.at,
      exitTimestamp: null,
      isRevenueCounted: true
    };
    store.entries.push(entry);
    store.transactions.push(transaction);
    store.profits.push({
      id: store.nextId('profits'),
      entryLogId: entry.id,
      amount: admission.fee,
      date: admission.archive.transactionDate,
      createdAt: admission.at
    });

    return { status: 'admitted', entry: { ...entry }, transaction: { ...transaction }, balance: wallet.balance };
  }

  async findEntryById(id: number): Promise<QueueEntry | null> {
    const entry = this.store.entries.find(row => row.id === id);
    return entry ? this.toQueueEntry(entry) : null;
  }

  async findActiveEntryForVehicle(vehicleId: number): Promise<EntryLogRecord | null> {
    const entry = this.store.entries.find(row => row.vehicleId === vehicleId && row.isActive);
    return entry ? { ...entry } : null;
  }

  async departEntry(id: number, at: Date): Promise<EntryLogRecord | null> {
    const entry = this.store.entries.find(row => row.id === id && row.isActive);
    if (!entry) return null;
    entry.isActive = false;
    entry.departedAt = at;
    for (const transaction of this.store.transactions) {
      if (transaction.entryLogId === id) transaction.exitTimestamp = at;
    }
    return { ...entry };
  }

  async updateEntry(id: number, patch: EntryPatch): Promise<EntryLogRecord | null> {
    const entry = this.store.entries.find(row => row.id === id && row.isActive);
    if (!entry) return null;
    applyPatch(entry, patch);
    return { ...entry };
  }

  async listEntries(filter: EntryFilter): Promise<QueueEntry[]> {
    const direction = filter.order === 'desc' ? -1 : 1;
    const entries = this.store.entries
      .filter(entry => withinRange(entry.createdAt, filter.range))
      .filter(entry => !filter.statuses || filter.statuses.includes(entry.status))
      .filter(entry => !filter.activeOnly || entry.isActive)
      .sort((a, b) => direction * (a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id))
      .map(entry => this.toQueueEntry(entry))
      .filter((entry): entry is QueueEntry => entry !== null)
      .filter(entry => filter.routeId === undefined || entry.vehicle.routeId === filter.routeId);
    return filter.limit === undefined ? entries : entries.slice(0, filter.limit);
  }

  async summarizeEntryFees(range?: DateRange): Promise<AmountSummary> {
    const entries = this.store.entries
      .filter(entry => entry.status === EntryStatus.SUCCESS)
      .filter(entry => withinRange(entry.createdAt, range));
    return { total: sumMoney(entries.map(entry => entry.feeCharged)), count: entries.length };
  }

  async countQueue(): Promise<number> {
    return this.store.entries.filter(entry => entry.isActive && entry.status === EntryStatus.SUCCESS).length;
  }

  async entryMonths(): Promise<YearMonth[]> {
    return distinctMonths(this.store.entries.map(entry => toCalendarDate(entry.createdAt, this.store.timeZone)));
  }

  async listTransactions(filter: TransactionFilter, order: 'asc' | 'desc'): Promise<TransactionRecord[]> {
    const direction = order === 'desc' ? -1 : 1;
    return this.filterTransactions(filter)
      .sort((a, b) => direction * (a.entryTimestamp.getTime() - b.entryTimestamp.getTime() || a.id - b.id))
      .map(transaction => ({ ...transaction }));
  }

  async summarizeTransactions(filter: TransactionFilter): Promise<AmountSummary> {
    const transactions = this.filterTransactions(filter);
    return { total: sumMoney(transactions.map(tx => tx.feeCharged)), count: transactions.length };
  }

  async transactionMonths(revenueOnly: boolean): Promise<YearMonth[]> {
    return distinctMonths(
      this.filterTransactions({ revenueOnly }).map(tx => ({ year: tx.transactionYear, month: tx.transactionMonth }))
    );
  }

  async sumProfit(fromDate?: string, toDate?: string): Promise<number> {
    return sumMoney(this.filterProfits(fromDate, toDate).map(profit => profit.amount));
  }

  async dailyProfit(fromDate: string, toDate: string): Promise<DailyAmount[]> {
    const totals = new Map<string, number>();
    for (const profit of this.filterProfits(fromDate, toDate)) {
      totals.set(profit.date, roundMoney((totals.get(profit.date) ?? 0) + profit.amount));
    }
    return [...totals.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, total]) => ({ date, total }));
  }

  // ---------------------------------------------------------------------------

  private filterTransactions(filter: TransactionFilter): TransactionRecord[] {
    return this.store.transactions.filter(tx =>
      (filter.year === undefined || tx.transactionYear === filter.year) &&
      (filter.month === undefined || tx.transactionMonth === filter.month) &&
      (!filter.revenueOnly || tx.isRevenueCounted)
    );
  }

  private filterProfits(fromDate?: string, toDate?: string) {
    return this.store.profits.filter(profit =>
      (fromDate === undefined || profit.date >= fromDate) &&
      (toDate === undefined || profit.date <= toDate)
    );
  }

  private toQueueEntry(entry: EntryLogRecord): QueueEntry | null {
    const vehicle = this.store.vehicles.find(row => row.id === entry.vehicleId);
    const driver = this.store.drivers.find(row => row.id === vehicle?.driverId);
    if (!vehicle || !driver) return null;
    const route = this.store.routes.find(row => row.id === vehicle.routeId);
    return {
      entry: { ...entry },
      vehicle: { ...vehicle },
      driver: { ...driver },
      route: route ? { ...route } : null
    };
  }
}
