/**
 * =============================================================================
 * DATABASE SCHEMA (drizzle-orm / PostgreSQL)
 * =============================================================================
 *
 * Table definitions used by the Postgres repositories. The DDL that creates
 * them lives in migrations/0001_init.sql and must be kept in step.
 * =============================================================================
 */

import {
  boolean,
  date,
  index,
  integer,
  numeric,
  pgTable,
  serial,
  smallint,
  text,
  timestamp,
  uniqueIndex,
  varchar
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import {
  DepositStatus,
  EntryStatus,
  PaymentMethod,
  UserRole,
  VehicleStatus,
  VehicleType
} from '../../core/constants';

/* ========================= users ========================= */
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  username: varchar('username', { length: 150 }).notNull(),
  passwordHash: text('password_hash').notNull(),
  firstName: varchar('first_name', { length: 150 }).notNull().default(''),
  lastName: varchar('last_name', { length: 150 }).notNull().default(''),
  email: varchar('email', { length: 254 }),
  role: varchar('role', { length: 20 }).$type<UserRole>().notNull(),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  lastLoginAt: timestamp('last_login_at', { withTimezone: true })
}, (t) => [
  uniqueIndex('users_username_lower_unique').on(sql`lower(${t.username})`)
]);

/* ========================= drivers ========================= */
export const drivers = pgTable('drivers', {
  id: serial('id').primaryKey(),
  driverCode: varchar('driver_code', { length: 20 }),
  firstName: varchar('first_name', { length: 100 }).notNull(),
  middleName: varchar('middle_name', { length: 100 }),
  lastName: varchar('last_name', { length: 100 }).notNull(),
  suffix: varchar('suffix', { length: 10 }),
  birthDate: date('birth_date'),
  licenseNumber: varchar('license_number', { length: 30 }).notNull(),
  licenseType: varchar('license_type', { length: 30 }).notNull(),
  licenseExpiry: date('license_expiry'),
  mobileNumber: varchar('mobile_number', { length: 20 }),
  address: text('address'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
}, (t) => [
  uniqueIndex('drivers_license_lower_unique').on(sql`lower(${t.licenseNumber})`),
  uniqueIndex('drivers_driver_code_unique').on(t.driverCode),
  index('idx_drivers_last_name').on(t.lastName)
]);

/* ========================= routes ========================= */
export const transitRoutes = pgTable('routes', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 100 }).notNull(),
  origin: varchar('origin', { length: 100 }).notNull(),
  destination: varchar('destination', { length: 100 }).notNull(),
  baseFare: numeric('base_fare', { precision: 12, scale: 2 }).notNull().default('0'),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
}, (t) => [
  uniqueIndex('routes_name_lower_unique').on(sql`lower(${t.name})`)
]);

/* ========================= vehicles ========================= */
export const vehicles = pgTable('vehicles', {
  id: serial('id').primaryKey(),
  driverId: integer('driver_id').notNull().references(() => drivers.id, { onDelete: 'cascade' }),
  licensePlate: varchar('license_plate', { length: 20 }).notNull(),
  crNumber: varchar('cr_number', { length: 50 }).notNull(),
  orNumber: varchar('or_number', { length: 50 }).notNull(),
  vinNumber: varchar('vin_number', { length: 50 }).notNull(),
  vehicleType: varchar('vehicle_type', { length: 20 }).$type<VehicleType>().notNull(),
  vehicleName: varchar('vehicle_name', { length: 100 }),
  yearModel: integer('year_model'),
  registrationNumber: varchar('registration_number', { length: 50 }).notNull(),
  registrationExpiry: date('registration_expiry'),
  seatCapacity: integer('seat_capacity'),
  routeId: integer('route_id').references(() => transitRoutes.id, { onDelete: 'set null' }),
  status: varchar('status', { length: 20 }).$type<VehicleStatus>().notNull().default(VehicleStatus.ACTIVE),
  qrValue: varchar('qr_value', { length: 255 }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
}, (t) => [
  uniqueIndex('vehicles_plate_lower_unique').on(sql`lower(${t.licensePlate})`),
  uniqueIndex('vehicles_driver_unique').on(t.driverId),
  uniqueIndex('vehicles_qr_value_unique').on(t.qrValue),
  index('idx_vehicles_route').on(t.routeId)
]);

/* ========================= wallets ========================= */
export const wallets = pgTable('wallets', {
  id: serial('id').primaryKey(),
  vehicleId: integer('vehicle_id').notNull().references(() => vehicles.id, { onDelete: 'cascade' }),
  balance: numeric('balance', { precision: 12, scale: 2 }).notNull().default('0'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
}, (t) => [
  uniqueIndex('wallets_vehicle_unique').on(t.vehicleId)
]);

/* ========================= deposits ========================= */
export const deposits = pgTable('deposits', {
  id: serial('id').primaryKey(),
  referenceNumber: varchar('reference_number', { length: 50 }).notNull(),
  walletId: integer('wallet_id').notNull().references(() => wallets.id, { onDelete: 'cascade' }),
  amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
  orCode: varchar('or_code', { length: 50 }),
  paymentMethod: varchar('payment_method', { length: 20 }).$type<PaymentMethod>().notNull(),
  status: varchar('status', { length: 20 }).$type<DepositStatus>().notNull().default(DepositStatus.PENDING),
  createdById: integer('created_by_id').references(() => users.id, { onDelete: 'set null' }),
  approvedById: integer('approved_by_id').references(() => users.id, { onDelete: 'set null' }),
  approvedAt: timestamp('approved_at', { withTimezone: true }),
  notes: text('notes'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
}, (t) => [
  uniqueIndex('deposits_reference_unique').on(t.referenceNumber),
  uniqueIndex('deposits_or_code_lower_unique').on(sql`lower(${t.orCode})`),
  index('idx_deposits_status_created').on(t.status, t.createdAt),
  index('idx_deposits_wallet').on(t.walletId)
]);

/* ========================= system settings ========================= */
export const systemSettings = pgTable('system_settings', {
  id: smallint('id').primaryKey().default(1),
  minDepositAmount: numeric('min_deposit_amount', { precision: 12, scale: 2 }).notNull(),
  terminalFee: numeric('terminal_fee', { precision: 12, scale: 2 }).notNull(),
  departureCountdownMinutes: integer('departure_countdown_minutes').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
});

/* ========================= entry logs ========================= */
export const entryLogs = pgTable('entry_logs', {
  id: serial('id').primaryKey(),
  vehicleId: integer('vehicle_id').notNull().references(() => vehicles.id, { onDelete: 'cascade' }),
  feeCharged: numeric('fee_charged', { precision: 12, scale: 2 }).notNull().default('0'),
  walletBalanceSnapshot: numeric('wallet_balance_snapshot', { precision: 12, scale: 2 }),
  status: varchar('status', { length: 20 }).$type<EntryStatus>().notNull(),
  isActive: boolean('is_active').notNull().default(false),
  boardingStartedAt: timestamp('boarding_started_at', { withTimezone: true }),
  departureTime: timestamp('departure_time', { withTimezone: true }),
  departedAt: timestamp('departed_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
}, (t) => [
  uniqueIndex('entry_logs_one_active_per_vehicle').on(t.vehicleId).where(sql`${t.isActive}`),
  index('idx_entry_logs_created').on(t.createdAt)
]);

/* ========================= transactions ========================= */
export const transactions = pgTable('transactions', {
  id: serial('id').primaryKey(),
  entryLogId: integer('entry_log_id').references(() => entryLogs.id, { onDelete: 'set null' }),
  vehicleId: integer('vehicle_id').references(() => vehicles.id, { onDelete: 'set null' }),
  vehiclePlate: varchar('vehicle_plate', { length: 20 }).notNull(),
  driverName: varchar('driver_name', { length: 255 }).notNull(),
  routeName: varchar('route_name', { length: 100 }).notNull(),
  feeCharged: numeric('fee_charged', { precision: 12, scale: 2 }).notNull(),
  walletBalanceSnapshot: numeric('wallet_balance_snapshot', { precision: 12, scale: 2 }),
  entryTimestamp: timestamp('entry_timestamp', { withTimezone: true }).notNull(),
  exitTimestamp: timestamp('exit_timestamp', { withTimezone: true }),
  transactionDate: date('transaction_date').notNull(),
  transactionYear: integer('transaction_year').notNull(),
  transactionMonth: integer('transaction_month').notNull(),
  transactionDay: integer('transaction_day').notNull(),
  isRevenueCounted: boolean('is_revenue_counted').notNull().default(true)
}, (t) => [
  index('idx_transactions_year_month').on(t.transactionYear, t.transactionMonth),
  index('idx_transactions_date').on(t.transactionDate)
]);

/* ========================= profits ========================= */
export const profits = pgTable('profits', {
  id: serial('id').primaryKey(),
  entryLogId: integer('entry_log_id').references(() => entryLogs.id, { onDelete: 'set null' }),
  amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
  date: date('date').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
}, (t) => [
  index('idx_profits_date').on(t.date)
]);

export type UserRow = typeof users.$inferSelect;
export type DriverRow = typeof drivers.$inferSelect;
export type RouteRow = typeof transitRoutes.$inferSelect;
export type VehicleRow = typeof vehicles.$inferSelect;
export type WalletRow = typeof wallets.$inferSelect;
export type DepositRow = typeof deposits.$inferSelect;
export type SystemSettingsRow = typeof systemSettings.$inferSelect;
export type EntryLogRow = typeof entryLogs.$inferSelect;
export type TransactionRow = typeof transactions.$inferSelect;
export type ProfitRow = typeof profits.$inferSelect;
