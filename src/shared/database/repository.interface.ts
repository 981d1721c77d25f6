/**
 * =============================================================================
 * REPOSITORY INTERFACES - Database Abstraction Layer
 * =============================================================================
 *
 * Contracts for all data access. Implementations:
 *   - Postgres (drizzle-orm + pg), production
 *   - Memory, for DB_DRIVER=memory and the test suite
 *
 * Operations that move money (crediting a deposit, charging a terminal fee)
 * are single repository calls so each implementation can make them atomic.
 * =============================================================================
 */

import {
  DepositStatus,
  EntryStatus,
  UserRole,
  VehicleStatus
} from '../../core/constants';
import { DateRange, YearMonth } from '../utils/date.utils';
import {
  DepositRecord,
  DepositView,
  DriverRecord,
  EntryLogRecord,
  FleetEntry,
  QueueEntry,
  RouteRecord,
  SystemSettingsRecord,
  TransactionRecord,
  UserRecord,
  VehicleRecord,
  WalletRecord
} from './records';

export interface AmountSummary {
  total: number;
  count: number;
}

// =============================================================================
// USERS
// =============================================================================

export interface UserListFilter {
  roles?: readonly UserRole[];
  excludeId?: number;
  /** Matches username, first name, last name, email */
  search?: string;
}

export type NewUser = Omit<UserRecord, 'id' | 'createdAt' | 'lastLoginAt'>;
export type UserPatch = Partial<Omit<UserRecord, 'id' | 'createdAt'>>;

export interface UserRepository {
  findById(id: number): Promise<UserRecord | null>;
  /** Case-insensitive */
  findByUsername(username: string): Promise<UserRecord | null>;
  /** Ordered by username */
  list(filter: UserListFilter): Promise<UserRecord[]>;
  create(input: NewUser): Promise<UserRecord>;
  update(id: number, patch: UserPatch): Promise<UserRecord | null>;
  delete(id: number): Promise<boolean>;
}

// =============================================================================
// FLEET
// =============================================================================

export type NewDriver = Omit<DriverRecord, 'id' | 'driverCode' | 'createdAt'>;
export type DriverPatch = Partial<NewDriver>;

export type NewVehicle = Omit<VehicleRecord, 'id' | 'qrValue' | 'createdAt'>;
export type VehiclePatch = Partial<NewVehicle>;

export type NewRoute = Omit<RouteRecord, 'id' | 'createdAt'>;
export type RoutePatch = Partial<NewRoute>;

export interface DriverListItem {
  driver: DriverRecord;
  vehicle: VehicleRecord | null;
}

export interface VehicleListFilter {
  /** Matches plate, driver first/last name, license number, driver code */
  search?: string;
  status?: VehicleStatus;
  routeId?: number;
  limit?: number;
}

export interface FleetRepository {
  findDriverById(id: number): Promise<DriverRecord | null>;
  findDriverByLicense(licenseNumber: string): Promise<DriverRecord | null>;
  /** Ordered by last name, first name */
  listDrivers(search?: string): Promise<DriverListItem[]>;
  /** Assigns the driver code from the new id */
  createDriver(input: NewDriver): Promise<DriverRecord>;
  updateDriver(id: number, patch: DriverPatch): Promise<DriverRecord | null>;
  /** Removes the driver's vehicle, wallet and deposits with it */
  deleteDriver(id: number): Promise<boolean>;
  countDrivers(): Promise<number>;

  findVehicle(id: number): Promise<FleetEntry | null>;
  findVehicleByQrValue(qrValue: string): Promise<FleetEntry | null>;
  findVehicleByPlate(licensePlate: string): Promise<FleetEntry | null>;
  findVehicleByDriverId(driverId: number): Promise<VehicleRecord | null>;
  /** Newest first */
  listVehicles(filter: VehicleListFilter): Promise<FleetEntry[]>;
  /**
   * Inserts the vehicle, stores its QR value and opens an empty wallet,
   * all in one transaction.
   */
  createVehicle(input: NewVehicle, qrValueFor: (id: number, licensePlate: string) => string): Promise<FleetEntry>;
  updateVehicle(id: number, patch: VehiclePatch): Promise<VehicleRecord | null>;
  setQrValue(id: number, qrValue: string): Promise<void>;
  deleteVehicle(id: number): Promise<boolean>;
  countVehicles(): Promise<number>;

  /** Ordered by name */
  listRoutes(activeOnly?: boolean): Promise<RouteRecord[]>;
  findRouteById(id: number): Promise<RouteRecord | null>;
  /** Case-insensitive */
  findRouteByName(name: string): Promise<RouteRecord | null>;
  createRoute(input: NewRoute): Promise<RouteRecord>;
  updateRoute(id: number, patch: RoutePatch): Promise<RouteRecord | null>;
  /** Vehicles on the route keep running without one */
  deleteRoute(id: number): Promise<boolean>;
}

// =============================================================================
// WALLETS & DEPOSITS
// =============================================================================

export type WalletSort = 'newest' | 'largest' | 'smallest' | 'driver_asc' | 'driver_desc';
export type DepositSort = 'newest' | 'oldest' | 'largest' | 'smallest' | 'driver_asc' | 'driver_desc';

export interface WalletListFilter {
  /** Matches plate, driver first/last name, license number, driver code */
  search?: string;
  sort: WalletSort;
  limit: number;
}

export interface WalletEntry {
  wallet: WalletRecord;
  vehicle: VehicleRecord;
  driver: DriverRecord;
  route: RouteRecord | null;
}

/** Latest deposit of any status and how many the wallet has */
export interface WalletActivity {
  lastDeposit: { amount: number; createdAt: Date } | null;
  depositCount: number;
}

export type WalletBoardEntry = WalletEntry & WalletActivity;

export interface WalletStats {
  walletCount: number;
  totalBalance: number;
  lowBalanceCount: number;
}

export interface DepositFilter {
  range?: DateRange;
  statuses?: readonly DepositStatus[];
  createdById?: number;
  walletId?: number;
  /** Matches reference number, OR code, plate, driver name, license number, driver code */
  search?: string;
}

export type DepositMonthFilter = Pick<DepositFilter, 'statuses' | 'createdById'>;

export type NewDeposit = Omit<DepositRecord, 'id' | 'createdAt'> & { createdAt?: Date };

export interface DepositDecision {
  actorId: number;
  notes: string | null;
  at: Date;
}

export interface WalletRepository {
  findWalletById(id: number): Promise<WalletRecord | null>;
  findWalletByVehicleId(vehicleId: number): Promise<WalletRecord | null>;
  /**
   * `newest` orders by last deposit time, wallets without deposits last.
   * Every other sort falls back to it on ties.
   */
  listWallets(filter: WalletListFilter): Promise<WalletBoardEntry[]>;
  /** Over the wallets `search` matches; lowBalanceCount is strictly below the threshold */
  walletStats(lowBalanceThreshold: number, search?: string): Promise<WalletStats>;

  findDepositById(id: number): Promise<DepositView | null>;
  findDepositByOrCode(orCode: string): Promise<DepositRecord | null>;
  /**
   * Inserts the deposit. A deposit created in a credited status adds its
   * amount to the wallet in the same transaction.
   */
  createDeposit(input: NewDeposit): Promise<DepositRecord>;
  /**
   * pending → approved and credit the wallet, atomically.
   * Null when the deposit is missing or no longer pending.
   */
  approveDeposit(id: number, decision: DepositDecision): Promise<DepositRecord | null>;
  /** pending → rejected. Null when missing or no longer pending. */
  rejectDeposit(id: number, decision: DepositDecision): Promise<DepositRecord | null>;
  listDeposits(filter: DepositFilter, sort: DepositSort, limit?: number): Promise<DepositView[]>;
  summarizeDeposits(filter: DepositFilter): Promise<AmountSummary>;
  /** Local-calendar months holding at least one matching deposit, newest first */
  depositMonths(filter: DepositMonthFilter): Promise<YearMonth[]>;
}

// =============================================================================
// TERMINAL
// =============================================================================

export type SettingsPatch = Partial<Omit<SystemSettingsRecord, 'updatedAt'>>;

export interface EntryAdmission {
  vehicleId: number;
  fee: number;
  at: Date;
  departureTime: Date;
  archive: {
    vehiclePlate: string;
    driverName: string;
    routeName: string;
    transactionDate: string;
    transactionYear: number;
    transactionMonth: number;
    transactionDay: number;
  };
}

export type EntryOutcome =
  | { status: 'admitted'; entry: EntryLogRecord; transaction: TransactionRecord; balance: number }
  | { status: 'insufficient'; entry: EntryLogRecord; balance: number }
  | { status: 'already_queued'; entry: EntryLogRecord };

export interface EntryFilter {
  range?: DateRange;
  statuses?: readonly EntryStatus[];
  activeOnly?: boolean;
  routeId?: number;
  limit?: number;
  /** By entry time; default ascending */
  order?: 'asc' | 'desc';
}

export interface EntryPatch {
  boardingStartedAt?: Date | null;
  departureTime?: Date | null;
}

export interface TransactionFilter {
  year?: number;
  month?: number;
  revenueOnly?: boolean;
}

export interface DailyAmount {
  date: string;
  total: number;
}

export interface TerminalRepository {
  getSettings(): Promise<SystemSettingsRecord>;
  updateSettings(patch: SettingsPatch): Promise<SystemSettingsRecord>;

  /**
   * Charge the fee and put the vehicle in the queue, atomically:
   * wallet debit, entry log, archive transaction and profit row.
   * A short balance records an `insufficient` entry and charges nothing.
   */
  admitVehicle(admission: EntryAdmission): Promise<EntryOutcome>;
  findEntryById(id: number): Promise<QueueEntry | null>;
  findActiveEntryForVehicle(vehicleId: number): Promise<EntryLogRecord | null>;
  /** Leaves the queue and stamps the archive exit time. Null unless active. */
  departEntry(id: number, at: Date): Promise<EntryLogRecord | null>;
  /** Null unless active */
  updateEntry(id: number, patch: EntryPatch): Promise<EntryLogRecord | null>;
  listEntries(filter: EntryFilter): Promise<QueueEntry[]>;
  /** Successful entries only */
  summarizeEntryFees(range?: DateRange): Promise<AmountSummary>;
  countQueue(): Promise<number>;
  entryMonths(): Promise<YearMonth[]>;

  /** Ordered by entry time */
  listTransactions(filter: TransactionFilter, order: 'asc' | 'desc'): Promise<TransactionRecord[]>;
  summarizeTransactions(filter: TransactionFilter): Promise<AmountSummary>;
  /** Newest first */
  transactionMonths(revenueOnly: boolean): Promise<YearMonth[]>;

  /** Inclusive local dates; open ends when omitted */
  sumProfit(fromDate?: string, toDate?: string): Promise<number>;
  dailyProfit(fromDate: string, toDate: string): Promise<DailyAmount[]>;
}

export interface Repositories {
  users: UserRepository;
  fleet: FleetRepository;
  wallets: WalletRepository;
  terminal: TerminalRepository;
}
