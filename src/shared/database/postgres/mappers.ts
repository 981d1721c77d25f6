/**
 * Row → record conversion. NUMERIC columns arrive as strings.
 */

import {
  DepositRecord,
  DriverRecord,
  EntryLogRecord,
  RouteRecord,
  SystemSettingsRecord,
  TransactionRecord,
  UserRecord,
  VehicleRecord,
  WalletRecord,
  formatDriverCode
} from '../records';
import {
  DepositRow,
  DriverRow,
  EntryLogRow,
  RouteRow,
  SystemSettingsRow,
  TransactionRow,
  UserRow,
  VehicleRow,
  WalletRow
} from '../schema';
import { parseMoney } from '../../utils/money.utils';

export function toUserRecord(row: UserRow): UserRecord {
  return { ...row };
}

export function toDriverRecord(row: DriverRow): DriverRecord {
  return { ...row, driverCode: row.driverCode ?? formatDriverCode(row.id) };
}

export function toRouteRecord(row: RouteRow): RouteRecord {
  return { ...row, baseFare: parseMoney(row.baseFare) };
}

export function toVehicleRecord(row: VehicleRow): VehicleRecord {
  return { ...row };
}

export function toWalletRecord(row: WalletRow): WalletRecord {
  return { ...row, balance: parseMoney(row.balance) };
}

export function toDepositRecord(row: DepositRow): DepositRecord {
  return { ...row, amount: parseMoney(row.amount) };
}

export function toSettingsRecord(row: SystemSettingsRow): SystemSettingsRecord {
  return {
    minDepositAmount: parseMoney(row.minDepositAmount),
    terminalFee: parseMoney(row.terminalFee),
    departureCountdownMinutes: row.departureCountdownMinutes,
    updatedAt: row.updatedAt
  };
}

export function toEntryLogRecord(row: EntryLogRow): EntryLogRecord {
  return {
    ...row,
    feeCharged: parseMoney(row.feeCharged),
    walletBalanceSnapshot: row.walletBalanceSnapshot === null ? null : parseMoney(row.walletBalanceSnapshot)
  };
}

export function toTransactionRecord(row: TransactionRow): TransactionRecord {
  return {
    ...row,
    feeCharged: parseMoney(row.feeCharged),
    walletBalanceSnapshot: row.walletBalanceSnapshot === null ? null : parseMoney(row.walletBalanceSnapshot)
  };
}
