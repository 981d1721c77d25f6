/**
 * =============================================================================
 * RECORD TYPES
 * =============================================================================
 *
 * Plain row shapes returned by every repository implementation.
 * Money is a number rounded to centavos; instants are Dates; local calendar
 * days are `yyyy-MM-dd` strings.
 * =============================================================================
 */

import {
  DepositStatus,
  EntryStatus,
  PaymentMethod,
  UserRole,
  VehicleStatus,
  VehicleType
} from '../../core/constants';

export interface UserRecord {
  id: number;
  username: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  email: string | null;
  role: UserRole;
  isActive: boolean;
  createdAt: Date;
  lastLoginAt: Date | null;
}

export interface DriverRecord {
  id: number;
  /** Human readable id, e.g. DRV-0007 */
  driverCode: string;
  firstName: string;
  middleName: string | null;
  lastName: string;
  suffix: string | null;
  birthDate: string | null;
  licenseNumber: string;
  licenseType: string;
  licenseExpiry: string | null;
  mobileNumber: string | null;
  address: string | null;
  createdAt: Date;
}

export interface RouteRecord {
  id: number;
  name: string;
  origin: string;
  destination: string;
  baseFare: number;
  isActive: boolean;
  createdAt: Date;
}

export interface VehicleRecord {
  id: number;
  driverId: number;
  licensePlate: string;
  crNumber: string;
  orNumber: string;
  vinNumber: string;
  vehicleType: VehicleType;
  vehicleName: string | null;
  yearModel: number | null;
  registrationNumber: string;
  registrationExpiry: string | null;
  seatCapacity: number | null;
  routeId: number | null;
  status: VehicleStatus;
  qrValue: string | null;
  createdAt: Date;
}

export interface WalletRecord {
  id: number;
  vehicleId: number;
  balance: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface DepositRecord {
  id: number;
  referenceNumber: string;
  walletId: number;
  amount: number;
  orCode: string | null;
  paymentMethod: PaymentMethod;
  status: DepositStatus;
  createdById: number | null;
  approvedById: number | null;
  approvedAt: Date | null;
  notes: string | null;
  createdAt: Date;
}

export interface SystemSettingsRecord {
  minDepositAmount: number;
  terminalFee: number;
  departureCountdownMinutes: number;
  updatedAt: Date;
}

export interface EntryLogRecord {
  id: number;
  vehicleId: number;
  feeCharged: number;
  walletBalanceSnapshot: number | null;
  status: EntryStatus;
  /** True while the vehicle occupies a queue slot */
  isActive: boolean;
  boardingStartedAt: Date | null;
  departureTime: Date | null;
  departedAt: Date | null;
  createdAt: Date;
}

/**
 * Archived terminal visit, denormalized for monthly reporting
 */
export interface TransactionRecord {
  id: number;
  entryLogId: number | null;
  vehicleId: number | null;
  vehiclePlate: string;
  driverName: string;
  routeName: string;
  feeCharged: number;
  walletBalanceSnapshot: number | null;
  entryTimestamp: Date;
  exitTimestamp: Date | null;
  transactionDate: string;
  transactionYear: number;
  transactionMonth: number;
  transactionDay: number;
  isRevenueCounted: boolean;
}

export interface ProfitRecord {
  id: number;
  entryLogId: number | null;
  amount: number;
  /** Local calendar day, yyyy-MM-dd */
  date: string;
  createdAt: Date;
}

// =============================================================================
// JOINED VIEWS
// =============================================================================

/**
 * Vehicle with everything hanging off it
 */
export interface FleetEntry {
  vehicle: VehicleRecord;
  driver: DriverRecord;
  route: RouteRecord | null;
  wallet: WalletRecord | null;
}

export interface UserSummary {
  id: number;
  username: string;
  fullName: string;
}

export interface DepositView {
  deposit: DepositRecord;
  wallet: WalletRecord;
  vehicle: VehicleRecord;
  driver: DriverRecord;
  createdBy: UserSummary | null;
  approvedBy: UserSummary | null;
}

export interface QueueEntry {
  entry: EntryLogRecord;
  vehicle: VehicleRecord;
  driver: DriverRecord;
  route: RouteRecord | null;
}

/** DRV-0007 */
export function formatDriverCode(id: number): string {
  return `DRV-${String(id).padStart(4, '0')}`;
}

export function driverFullName(driver: Pick<DriverRecord, 'firstName' | 'middleName' | 'lastName' | 'suffix'>): string {
  return [driver.firstName, driver.middleName, driver.lastName, driver.suffix]
    .filter((part): part is string => Boolean(part))
    .join(' ');
}

export function userFullName(user: Pick<UserRecord, 'firstName' | 'lastName' | 'username'>): string {
  const name = `${user.firstName} ${user.lastName}`.trim();
  return name || user.username;
}

export function toUserSummary(user: UserRecord): UserSummary {
  return { id: user.id, username: user.username, fullName: userFullName(user) };
}
