import { DepositStatus, canTransitionDeposit, isCreditedStatus } from '../../../core/constants';
import { BalanceLimitError, NotFoundError } from '../../../core/errors/AppError';
import { YearMonth, toCalendarDate, toYearMonth, compareYearMonth, sameYearMonth } from '../../utils/date.utils';
import { MAX_MONEY_AMOUNT, roundMoney, sumMoney } from '../../utils/money.utils';
import {
  AmountSummary,
  DepositDecision,
  DepositFilter,
  DepositMonthFilter,
  DepositSort,
  NewDeposit,
  WalletActivity,
  WalletBoardEntry,
  WalletEntry,
  WalletListFilter,
  WalletRepository,
  WalletSort,
  WalletStats
} from '../repository.interface';
import {
  DepositRecord,
  DepositView,
  DriverRecord,
  UserSummary,
  WalletRecord,
  toUserSummary
} from '../records';
import { MemoryStore, assertUnique, matchesAny, withinRange } from './memory.store';

type Order<T> = (a: T, b: T) => number;

function byDriverName(a: { driver: DriverRecord }, b: { driver: DriverRecord }): number {
  return a.driver.lastName.localeCompare(b.driver.lastName) || a.driver.firstName.localeCompare(b.driver.firstName);
}

/** Latest deposit first; wallets that never had one go last */
const byLastDeposit: Order<WalletBoardEntry> = (a, b) => {
  const left = a.lastDeposit?.createdAt.getTime();
  const right = b.lastDeposit?.createdAt.getTime();
  if (left === right) return 0;
  if (left === undefined) return 1;
  if (right === undefined) return -1;
  return right - left;
};

const WALLET_SORTS: Record<WalletSort, Order<WalletBoardEntry>> = {
  newest: (a, b) =>
    byLastDeposit(a, b) || b.wallet.updatedAt.getTime() - a.wallet.updatedAt.getTime() || b.wallet.id - a.wallet.id,
  largest: (a, b) => b.wallet.balance - a.wallet.balance || byLastDeposit(a, b) || a.wallet.id - b.wallet.id,
  smallest: (a, b) => a.wallet.balance - b.wallet.balance || byLastDeposit(a, b) || a.wallet.id - b.wallet.id,
  driver_asc: (a, b) => byDriverName(a, b) || byLastDeposit(a, b) || a.wallet.id - b.wallet.id,
  driver_desc: (a, b) => byDriverName(b, a) || byLastDeposit(a, b) || a.wallet.id - b.wallet.id
};

const newestDeposit: Order<DepositRecord> = (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;

const DEPOSIT_SORTS: Record<DepositSort, Order<DepositView>> = {
  newest: (a, b) => newestDeposit(a.deposit, b.deposit),
  oldest: (a, b) => newestDeposit(b.deposit, a.deposit),
  largest: (a, b) => b.deposit.amount - a.deposit.amount || newestDeposit(a.deposit, b.deposit),
  smallest: (a, b) => a.deposit.amount - b.deposit.amount || newestDeposit(a.deposit, b.deposit),
  driver_asc: (a, b) => byDriverName(a, b) || newestDeposit(a.deposit, b.deposit),
  driver_desc: (a, b) => byDriverName(b, a) || newestDeposit(a.deposit, b.deposit)
};

export class MemoryWalletRepository implements WalletRepository {
  constructor(private readonly store: MemoryStore) {}

  async findWalletById(id: number): Promise<WalletRecord | null> {
    const wallet = this.store.wallets.find(row => row.id === id);
    return wallet ? { ...wallet } : null;
  }

  async findWalletByVehicleId(vehicleId: number): Promise<WalletRecord | null> {
    const wallet = this.store.wallets.find(row => row.vehicleId === vehicleId);
    return wallet ? { ...wallet } : null;
  }

  async listWallets(filter: WalletListFilter): Promise<WalletBoardEntry[]> {
    return this.searchWallets(filter.search)
      .map(entry => ({ ...entry, ...this.activityOf(entry.wallet.id) }))
      .sort(WALLET_SORTS[filter.sort])
      .slice(0, filter.limit);
  }

  async walletStats(lowBalanceThreshold: number, search?: string): Promise<WalletStats> {
    const wallets = this.searchWallets(search).map(entry => entry.wallet);
    return {
      walletCount: wallets.length,
      totalBalance: sumMoney(wallets.map(wallet => wallet.balance)),
      lowBalanceCount: wallets.filter(wallet => wallet.balance < lowBalanceThreshold).length
    };
  }

  async findDepositById(id: number): Promise<DepositView | null> {
    const deposit = this.store.deposits.find(row => row.id === id);
    return deposit ? this.toDepositView(deposit) : null;
  }

  async findDepositByOrCode(orCode: string): Promise<DepositRecord | null> {
    const needle = orCode.toLowerCase();
    const deposit = this.store.deposits.find(row => row.orCode?.toLowerCase() === needle);
    return deposit ? { ...deposit } : null;
  }

  async createDeposit(input: NewDeposit): Promise<DepositRecord> {
    const { deposits } = this.store;
    assertUnique(deposits, input.orCode, row => row.orCode, 'deposits_or_code_lower_unique');
    assertUnique(deposits, input.referenceNumber, row => row.referenceNumber, 'deposits_reference_unique');

    const wallet = this.requireWallet(input.walletId);
    const deposit: DepositRecord = {
      ...input,
      amount: roundMoney(input.amount),
      id: this.store.nextId('deposits'),
      createdAt: input.createdAt ?? new Date()
    };
    if (isCreditedStatus(deposit.status)) {
      this.credit(wallet, deposit.amount, deposit.approvedAt ?? deposit.createdAt);
    }
    deposits.push(deposit);
    return { ...deposit };
  }

  async approveDeposit(id: number, decision: DepositDecision): Promise<DepositRecord | null> {
    const deposit = this.store.deposits.find(row => row.id === id);
    if (!deposit || !canTransitionDeposit(deposit.status, DepositStatus.APPROVED)) return null;

    this.credit(this.requireWallet(deposit.walletId), deposit.amount, decision.at);
    deposit.status = DepositStatus.APPROVED;
    deposit.approvedById = decision.actorId;
    deposit.approvedAt = decision.at;
    deposit.notes = decision.notes ?? deposit.notes;
    return { ...deposit };
  }

  async rejectDeposit(id: number, decision: DepositDecision): Promise<DepositRecord | null> {
    const deposit = this.store.deposits.find(row => row.id === id);
    if (!deposit || !canTransitionDeposit(deposit.status, DepositStatus.REJECTED)) return null;

    deposit.status = DepositStatus.REJECTED;
    deposit.approvedById = decision.actorId;
    deposit.approvedAt = decision.at;
    deposit.notes = decision.notes ?? deposit.notes;
    return { ...deposit };
  }

  async listDeposits(filter: DepositFilter, sort: DepositSort, limit?: number): Promise<DepositView[]> {
    const views = this.filterDeposits(filter)
      .map(deposit => this.toDepositView(deposit))
      .filter((view): view is DepositView => view !== null)
      .sort(DEPOSIT_SORTS[sort]);
    return limit === undefined ? views : views.slice(0, limit);
  }

  async summarizeDeposits(filter: DepositFilter): Promise<AmountSummary> {
    const deposits = this.filterDeposits(filter);
    return { total: sumMoney(deposits.map(deposit => deposit.amount)), count: deposits.length };
  }

  async depositMonths(filter: DepositMonthFilter): Promise<YearMonth[]> {
    const months: YearMonth[] = [];
    for (const deposit of this.filterDeposits(filter)) {
      const month = toYearMonth(toCalendarDate(deposit.createdAt, this.store.timeZone));
      if (!months.some(existing => sameYearMonth(existing, month))) months.push(month);
    }
    return months.sort((a, b) => compareYearMonth(b, a));
  }

  // ---------------------------------------------------------------------------

  private filterDeposits(filter: DepositFilter): DepositRecord[] {
    return this.store.deposits.filter(deposit => {
      if (!withinRange(deposit.createdAt, filter.range)) return false;
      if (filter.statuses && !filter.statuses.includes(deposit.status)) return false;
      if (filter.createdById !== undefined && deposit.createdById !== filter.createdById) return false;
      if (filter.walletId !== undefined && deposit.walletId !== filter.walletId) return false;
      if (filter.search) {
        const wallet = this.store.wallets.find(row => row.id === deposit.walletId);
        const vehicle = this.store.vehicles.find(row => row.id === wallet?.vehicleId);
        const driver = this.store.drivers.find(row => row.id === vehicle?.driverId);
        return matchesAny(filter.search, [
          deposit.referenceNumber,
          deposit.orCode,
          vehicle?.licensePlate,
          driver?.firstName,
          driver?.lastName,
          driver?.licenseNumber,
          driver?.driverCode
        ]);
      }
      return true;
    });
  }

  private searchWallets(search: string | undefined): WalletEntry[] {
    return this.store.wallets
      .map(wallet => this.toWalletEntry(wallet))
      .filter((entry): entry is WalletEntry => entry !== null)
      .filter(entry => matchesAny(search, [
        entry.vehicle.licensePlate,
        entry.driver.firstName,
        entry.driver.lastName,
        entry.driver.licenseNumber,
        entry.driver.driverCode
      ]));
  }

  private activityOf(walletId: number): WalletActivity {
    const [latest, ...rest] = this.store.deposits
      .filter(deposit => deposit.walletId === walletId)
      .sort(newestDeposit);
    return {
      lastDeposit: latest ? { amount: latest.amount, createdAt: latest.createdAt } : null,
      depositCount: latest ? rest.length + 1 : 0
    };
  }

  private requireWallet(walletId: number): WalletRecord {
    const wallet = this.store.wallets.find(row => row.id === walletId);
    if (!wallet) {
      throw new NotFoundError('Wallet not found');
    }
    return wallet;
  }

  private credit(wallet: WalletRecord, amount: number, at: Date): void {
    const balance = roundMoney(wallet.balance + amount);
    if (balance > MAX_MONEY_AMOUNT) {
      throw new BalanceLimitError(wallet.id);
    }
    wallet.balance = balance;
    wallet.updatedAt = at;
  }

  private userSummary(id: number | null): UserSummary | null {
    const user = id === null ? undefined : this.store.users.find(row => row.id === id);
    return user ? toUserSummary(user) : null;
  }

  private toWalletEntry(wallet: WalletRecord): WalletEntry | null {
    const vehicle = this.store.vehicles.find(row => row.id === wallet.vehicleId);
    const driver = this.store.drivers.find(row => row.id === vehicle?.driverId);
    if (!vehicle || !driver) return null;
    const route = this.store.routes.find(row => row.id === vehicle.routeId);
    return {
      wallet: { ...wallet },
      vehicle: { ...vehicle },
      driver: { ...driver },
      route: route ? { ...route } : null
    };
  }

  private toDepositView(deposit: DepositRecord): DepositView | null {
    const wallet = this.store.wallets.find(row => row.id === deposit.walletId);
    const entry = wallet ? this.toWalletEntry(wallet) : null;
    if (!entry) return null;
    return {
      deposit: { ...deposit },
      wallet: entry.wallet,
      vehicle: entry.vehicle,
      driver: entry.driver,
      createdBy: this.userSummary(deposit.createdById),
      approvedBy: this.userSummary(deposit.approvedById)
    };
  }
}
