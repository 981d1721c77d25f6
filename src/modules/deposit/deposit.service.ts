/**
 * =============================================================================
 * DEPOSIT MODULE - SERVICE
 * =============================================================================
 *
 * Wallet top-ups.
 *
 * FLOWS:
 * - Direct deposit (admin, staff admin): created approved, credited at once
 * - Treasurer request: created pending, credited only when a manager approves
 *
 * APPROVAL GUARANTEE:
 * The repository flips pending → approved with a conditional update and
 * credits the wallet in the same transaction. A request approved twice
 * (double click, two managers) is credited once; the loser gets 409.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CREDITED_DEPOSIT_STATUSES,
  DepositStatus,
  ErrorCode,
  LIST_LIMITS,
  PaymentMethod,
  UserRole
} from '../../core/constants';
import {
  ConflictError,
  DepositNotPendingError,
  NotFoundError,
  ValidationError
} from '../../core/errors/AppError';
import { db } from '../../shared/database/db';
import { DepositView, FleetEntry, UserSummary, WalletRecord, driverFullName } from '../../shared/database/records';
import { DepositFilter, Repositories } from '../../shared/database/repository.interface';
import { AuthUser } from '../../shared/middleware/auth.middleware';
import { logger } from '../../shared/services/logger.service';
import { socketService } from '../../shared/services/socket.service';
import { CsvDocument, buildCsv } from '../../shared/utils/csv.utils';
import {
  Clock,
  formatInstant,
  monthRange,
  systemClock,
  toCalendarDate
} from '../../shared/utils/date.utils';
import { formatCurrency } from '../../shared/utils/money.utils';
import {
  MonthNavigation,
  MonthOption,
  buildMonthNavigation,
  resolveMonth,
  toMonthOptions
} from '../../shared/utils/month-navigation.utils';
import {
  DepositHistoryQuery,
  DepositRequestInput,
  DirectDepositInput,
  orCodeSchema
} from './deposit.schema';

// =============================================================================
// TYPES
// =============================================================================

export interface DepositDetail {
  id: number;
  referenceNumber: string;
  amount: number;
  orCode: string | null;
  paymentMethod: PaymentMethod;
  status: DepositStatus;
  notes: string | null;
  createdAt: Date;
  approvedAt: Date | null;
  wallet: { id: number; balance: number };
  vehicle: { id: number; licensePlate: string };
  driver: { id: number; driverCode: string; fullName: string };
  createdBy: UserSummary | null;
  approvedBy: UserSummary | null;
}

export interface DepositHistory {
  deposits: DepositDetail[];
  /** Sum of credited deposits in the month */
  total: number;
  /** Deposits of every status in the month */
  count: number;
  navigation: MonthNavigation;
  availableMonths: MonthOption[];
}

export interface PendingDeposits {
  requests: DepositDetail[];
  count: number;
}

export interface DriverSearchResult {
  vehicleId: number;
  licensePlate: string;
  driverName: string;
  driverCode: string;
  licenseNumber: string;
  balance: number;
  routeName: string | null;
  display: string;
}

export interface OrCodeCheck {
  valid: boolean;
  message: string;
}

export const DEPOSIT_CSV_HEADERS = [
  'Reference Number',
  'Date & Time',
  'Driver Name',
  'License Plate',
  'Amount',
  'Payment Method',
  'Status',
  'Processed By'
] as const;

// =============================================================================
// HELPERS
// =============================================================================

export function toDepositDetail(view: DepositView): DepositDetail {
  const { deposit, wallet, vehicle, driver } = view;
  return {
    id: deposit.id,
    referenceNumber: deposit.referenceNumber,
    amount: deposit.amount,
    orCode: deposit.orCode,
    paymentMethod: deposit.paymentMethod,
    status: deposit.status,
    notes: deposit.notes,
    createdAt: deposit.createdAt,
    approvedAt: deposit.approvedAt,
    wallet: { id: wallet.id, balance: wallet.balance },
    vehicle: { id: vehicle.id, licensePlate: vehicle.licensePlate },
    driver: { id: driver.id, driverCode: driver.driverCode, fullName: driverFullName(driver) },
    createdBy: view.createdBy,
    approvedBy: view.approvedBy
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * DEP-20250301-1A2B3C4D
 */
export function generateReferenceNumber(at: Date): string {
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase();
  return `DEP-${formatInstant(at, 'yyyyMMdd')}-${suffix}`;
}

// =============================================================================
// SERVICE
// =============================================================================

export class DepositService {
  constructor(
    private readonly repos: Repositories = db,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Counter deposit by a manager: approved and credited immediately
   */
  async createDirectDeposit(actor: AuthUser, input: DirectDepositInput): Promise<DepositDetail> {
    const entry = await this.prepareDeposit(input.vehicleId, input.amount, input.orCode ?? null);
    const wallet = this.requireWallet(entry);
    const at = this.clock();

    const deposit = await this.repos.wallets.createDeposit({
      referenceNumber: generateReferenceNumber(at),
      walletId: wallet.id,
      amount: input.amount,
      orCode: input.orCode ?? null,
      paymentMethod: input.paymentMethod,
      status: DepositStatus.APPROVED,
      createdById: actor.userId,
      approvedById: actor.userId,
      approvedAt: at,
      notes: input.notes,
      createdAt: at
    });

    logger.info('Direct deposit credited', {
      depositId: deposit.id,
      referenceNumber: deposit.referenceNumber,
      vehicleId: entry.vehicle.id,
      amount: deposit.amount,
      userId: actor.userId
    });

    return this.getDetail(deposit.id);
  }

  /**
   * Treasurer request: pending until a manager approves it
   */
  async createDepositRequest(actor: AuthUser, input: DepositRequestInput): Promise<DepositDetail> {
    const entry = await this.prepareDeposit(input.vehicleId, input.amount, input.orCode);
    const wallet = this.requireWallet(entry);
    const at = this.clock();

    const deposit = await this.repos.wallets.createDeposit({
      referenceNumber: generateReferenceNumber(at),
      walletId: wallet.id,
      amount: input.amount,
      orCode: input.orCode,
      paymentMethod: input.paymentMethod,
      status: DepositStatus.PENDING,
      createdById: actor.userId,
      approvedById: null,
      approvedAt: null,
      notes: input.notes,
      createdAt: at
    });

    logger.info('Deposit request filed', {
      depositId: deposit.id,
      referenceNumber: deposit.referenceNumber,
      vehicleId: entry.vehicle.id,
      amount: deposit.amount,
      userId: actor.userId
    });

    return this.getDetail(deposit.id);
  }

  /**
   * The caller's own requests, newest first
   */
  async listMyRequests(actor: AuthUser, status?: DepositStatus): Promise<DepositDetail[]> {
    const views = await this.repos.wallets.listDeposits(
      { createdById: actor.userId, statuses: status ? [status] : undefined },
      'newest'
    );
    return views.map(toDepositDetail);
  }

  /**
   * One deposit. A treasurer only ever sees their own.
   */
  async getDeposit(actor: AuthUser, id: number): Promise<DepositDetail> {
    const view = await this.repos.wallets.findDepositById(id);
    if (!view || (actor.role === UserRole.TREASURER && view.deposit.createdById !== actor.userId)) {
      throw new NotFoundError('Deposit not found');
    }
    return toDepositDetail(view);
  }

  /**
   * Review queue, oldest first
   */
  async listPending(): Promise<PendingDeposits> {
    const views = await this.repos.wallets.listDeposits({ statuses: [DepositStatus.PENDING] }, 'oldest');
    return { requests: views.map(toDepositDetail), count: views.length };
  }

  async approveDeposit(actor: AuthUser, id: number, notes: string | null): Promise<DepositDetail> {
    const decision = { actorId: actor.userId, notes, at: this.clock() };
    const updated = await this.repos.wallets.approveDeposit(id, decision);
    if (!updated) {
      throw await this.notPending(id);
    }
    return this.announceDecision(actor, id);
  }

  /**
   * Reject a pending request; the wallet is never touched
   */
  async rejectDeposit(actor: AuthUser, id: number, notes: string | null): Promise<DepositDetail> {
    const decision = { actorId: actor.userId, notes, at: this.clock() };
    const updated = await this.repos.wallets.rejectDeposit(id, decision);
    if (!updated) {
      throw await this.notPending(id);
    }
    return this.announceDecision(actor, id);
  }

  /**
   * One month of deposits (every status), at most 200 rows
   */
  async getHistory(query: DepositHistoryQuery): Promise<DepositHistory> {
    const today = toCalendarDate(this.clock());
    const selected = resolveMonth(query.month, today);
    const filter: DepositFilter = { range: monthRange(selected), search: query.search };

    const [views, all, credited, months] = await Promise.all([
      this.repos.wallets.listDeposits(filter, query.sort, LIST_LIMITS.DEPOSIT_HISTORY),
      this.repos.wallets.summarizeDeposits(filter),
      this.repos.wallets.summarizeDeposits({ ...filter, statuses: CREDITED_DEPOSIT_STATUSES }),
      this.repos.wallets.depositMonths({})
    ]);

    return {
      deposits: views.map(toDepositDetail),
      total: credited.total,
      count: all.count,
      navigation: buildMonthNavigation(selected, months, today),
      availableMonths: toMonthOptions(months)
    };
  }

  /**
   * Every deposit of the month as CSV, in the requested order
   */
  async exportHistoryCsv(query: DepositHistoryQuery): Promise<CsvDocument> {
    const selected = resolveMonth(query.month, toCalendarDate(this.clock()));
    const views = await this.repos.wallets.listDeposits(
      { range: monthRange(selected), search: query.search },
      query.sort
    );

    const rows = views.map(({ deposit, driver, vehicle, createdBy }) => [
      deposit.referenceNumber,
      formatInstant(deposit.createdAt, 'yyyy-MM-dd HH:mm'),
      driverFullName(driver),
      vehicle.licensePlate,
      formatCurrency(deposit.amount),
      deposit.paymentMethod.toUpperCase(),
      capitalize(deposit.status),
      createdBy?.username ?? 'N/A'
    ]);

    const month = String(selected.month).padStart(2, '0');
    return {
      filename: `deposits_${selected.year}_${month}.csv`,
      content: buildCsv(DEPOSIT_CSV_HEADERS, rows),
      rowCount: rows.length
    };
  }

  /**
   * Type-ahead for the deposit form: at least 2 characters, 10 results
   */
  async searchDrivers(query: string): Promise<DriverSearchResult[]> {
    const term = query.trim();
    if (term.length < 2) return [];

    const entries = await this.repos.fleet.listVehicles({ search: term, limit: LIST_LIMITS.DRIVER_SEARCH });
    return entries.map(({ vehicle, driver, route, wallet }) => {
      const driverName = driverFullName(driver);
      return {
        vehicleId: vehicle.id,
        licensePlate: vehicle.licensePlate,
        driverName,
        driverCode: driver.driverCode,
        licenseNumber: driver.licenseNumber,
        balance: wallet?.balance ?? 0,
        routeName: route?.name ?? null,
        display: `${driverName} · ${vehicle.licensePlate}`
      };
    });
  }

  async validateOrCode(code: string): Promise<OrCodeCheck> {
    if (code.trim() === '') {
      return { valid: false, message: 'OR code is required' };
    }

    const parsed = orCodeSchema.safeParse(code);
    if (!parsed.success) {
      return { valid: false, message: parsed.error.errors[0]?.message ?? 'Invalid OR code' };
    }

    const existing = await this.repos.wallets.findDepositByOrCode(parsed.data);
    if (existing) {
      return { valid: false, message: 'OR code already used' };
    }
    return { valid: true, message: 'OR code is available' };
  }

  // ---------------------------------------------------------------------------

  private async prepareDeposit(vehicleId: number, amount: number, orCode: string | null): Promise<FleetEntry> {
    const { minDepositAmount } = await this.repos.terminal.getSettings();
    if (amount < minDepositAmount) {
      const message = `Minimum deposit is ${formatCurrency(minDepositAmount)}`;
      throw new ValidationError(message, [{ field: 'amount', message }], ErrorCode.BELOW_MINIMUM_DEPOSIT);
    }

    const entry = await this.repos.fleet.findVehicle(vehicleId);
    if (!entry) {
      throw new NotFoundError('Vehicle not found');
    }

    if (orCode !== null && (await this.repos.wallets.findDepositByOrCode(orCode))) {
      throw new ConflictError('OR code already used', ErrorCode.DUPLICATE_OR_CODE);
    }
    return entry;
  }

  private requireWallet(entry: FleetEntry): WalletRecord {
    if (!entry.wallet) {
      throw new NotFoundError('Wallet not found');
    }
    return entry.wallet;
  }

  private async getDetail(id: number): Promise<DepositDetail> {
    const view = await this.repos.wallets.findDepositById(id);
    if (!view) {
      throw new NotFoundError('Deposit not found');
    }
    return toDepositDetail(view);
  }

  private async notPending(id: number): Promise<Error> {
    const existing = await this.repos.wallets.findDepositById(id);
    if (!existing) {
      return new NotFoundError('Deposit not found');
    }
    logger.warn('Deposit decision refused, no longer pending', {
      depositId: id,
      status: existing.deposit.status
    });
    return new DepositNotPendingError(id, existing.deposit.status);
  }

  private async announceDecision(actor: AuthUser, id: number): Promise<DepositDetail> {
    const detail = await this.getDetail(id);

    logger.info('Deposit reviewed', {
      depositId: detail.id,
      referenceNumber: detail.referenceNumber,
      status: detail.status,
      amount: detail.amount,
      userId: actor.userId
    });

    socketService.depositUpdated({
      depositId: detail.id,
      referenceNumber: detail.referenceNumber,
      status: detail.status,
      walletId: detail.wallet.id,
      balance: detail.wallet.balance,
      createdById: detail.createdBy?.id ?? null
    });
    return detail;
  }
}

export const depositService = new DepositService();
