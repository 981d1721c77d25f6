/**
 * =============================================================================
 * MEMORY STORE
 * =============================================================================
 *
 * Process-local tables behind the memory repositories (DB_DRIVER=memory and
 * the test suite). Every repository call runs synchronously between awaits,
 * which gives the same all-or-nothing behaviour as a database transaction.
 *
 * Unique constraints mirror the SQL indexes and raise the same ConflictError.
 * =============================================================================
 */

import { config } from '../../../config/environment';
import { DEFAULT_SYSTEM_SETTINGS } from '../../../core/constants';
import { UniqueConstraint, uniqueViolation } from '../constraints';
import {
  DepositRecord,
  DriverRecord,
  EntryLogRecord,
  ProfitRecord,
  RouteRecord,
  SystemSettingsRecord,
  TransactionRecord,
  UserRecord,
  VehicleRecord,
  WalletRecord
} from '../records';

type TableName =
  | 'users'
  | 'drivers'
  | 'routes'
  | 'vehicles'
  | 'wallets'
  | 'deposits'
  | 'entries'
  | 'transactions'
  | 'profits';

export class MemoryStore {
  users: UserRecord[] = [];
  drivers: DriverRecord[] = [];
  routes: RouteRecord[] = [];
  vehicles: VehicleRecord[] = [];
  wallets: WalletRecord[] = [];
  deposits: DepositRecord[] = [];
  entries: EntryLogRecord[] = [];
  transactions: TransactionRecord[] = [];
  profits: ProfitRecord[] = [];
  settings: SystemSettingsRecord;

  private readonly sequences = new Map<TableName, number>();

  constructor(readonly timeZone: string = config.timeZone) {
    this.settings = { ...DEFAULT_SYSTEM_SETTINGS, updatedAt: new Date() };
  }

  nextId(table: TableName): number {
    const next = (this.sequences.get(table) ?? 0) + 1;
    this.sequences.set(table, next);
    return next;
  }
}

/**
 * Throw when another row already holds the value (case-insensitive)
 */
export function assertUnique<T extends { id: number }>(
  rows: readonly T[],
  value: string | null,
  pick: (row: T) => string | null,
  constraint: UniqueConstraint,
  exceptId?: number
): void {
  if (value === null) return;
  const needle = value.toLowerCase();
  const clash = rows.some(row => row.id !== exceptId && pick(row)?.toLowerCase() === needle);
  if (clash) {
    throw uniqueViolation(constraint);
  }
}

export function containsIgnoreCase(haystack: string | null | undefined, needle: string): boolean {
  return Boolean(haystack && haystack.toLowerCase().includes(needle.toLowerCase()));
}

export function matchesAny(needle: string | undefined, values: ReadonlyArray<string | null | undefined>): boolean {
  if (!needle) return true;
  return values.some(value => containsIgnoreCase(value, needle));
}

export function withinRange(instant: Date, range: { from: Date; to: Date } | undefined): boolean {
  if (!range) return true;
  const time = instant.getTime();
  return time >= range.from.getTime() && time < range.to.getTime();
}

/**
 * Apply a partial update, ignoring keys whose value is undefined
 */
export function applyPatch<T extends object>(target: T, patch: Partial<T>): void {
  const defined = Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
  Object.assign(target, defined);
}
