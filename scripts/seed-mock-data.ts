/**
 * Mock data for local development.
 *
 * Creates the back office accounts, routes, and drivers with their vehicles
 * and wallets from fixtures/mock-fleet.json. Existing rows (matched by
 * username, route name, license number, plate) are left alone.
 *
 * Usage:
 *   npm run db:seed
 *   npm run db:seed -- --reset      # delete drivers (vehicles, wallets, deposits, entries) and routes first
 *   npm run db:seed -- --deposits   # add credited deposits across the last two months
 *
 * Account passwords come from SEED_PASSWORD (default: change-me).
 */

import { readFileSync } from 'fs';
import path from 'path';
import bcrypt from 'bcryptjs';
import { z } from 'zod';
import { config } from '../src/config/environment';
import { DepositStatus, PaymentMethod, UserRole } from '../src/core/constants';
import { closeDatabase, db } from '../src/shared/database/db';
import { RouteRecord, UserRecord, WalletRecord } from '../src/shared/database/records';
import { logger } from '../src/shared/services/logger.service';
import {
  CalendarDate,
  YearMonth,
  daysInMonth,
  monthLabel,
  shiftMonth,
  toCalendarDate,
  zonedTimeToUtc
} from '../src/shared/utils/date.utils';
import { roundMoney } from '../src/shared/utils/money.utils';
import { generateReferenceNumber } from '../src/modules/deposit/deposit.service';
import { createDriverSchema } from '../src/modules/driver/driver.schema';
import { createRouteSchema } from '../src/modules/transit-route/transit-route.schema';
import { buildQrValue } from '../src/modules/vehicle/vehicle.service';
import { createVehicleSchema } from '../src/modules/vehicle/vehicle.schema';

const DEPOSITS_PER_MONTH = 10;
const PAYMENT_METHODS = [PaymentMethod.CASH, PaymentMethod.GCASH, PaymentMethod.BANK_TRANSFER];

const fixtureSchema = z.object({
  accounts: z.array(z.object({
    username: z.string().min(3),
    firstName: z.string(),
    lastName: z.string(),
    role: z.nativeEnum(UserRole)
  })),
  routes: z.array(createRouteSchema),
  drivers: z.array(createDriverSchema.extend({
    vehicle: createVehicleSchema.omit({ driverId: true, routeId: true }).extend({
      routeName: z.string().nullish(),
      openingBalance: z.number().nonnegative().default(0)
    })
  }))
});

type Fixture = z.infer<typeof fixtureSchema>;

function loadFixture(): Fixture {
  const file = path.join(__dirname, 'fixtures', 'mock-fleet.json');
  return fixtureSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
}

function randomInt(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

function pick<T>(items: readonly T[]): T {
  return items[randomInt(0, items.length - 1)];
}

// =============================================================================
// STEPS
// =============================================================================

async function reset(): Promise<void> {
  const drivers = await db.fleet.listDrivers();
  for (const { driver } of drivers) {
    await db.fleet.deleteDriver(driver.id);
  }
  const routes = await db.fleet.listRoutes();
  for (const route of routes) {
    await db.fleet.deleteRoute(route.id);
  }
  logger.info('Mock data cleared', { drivers: drivers.length, routes: routes.length });
}

async function seedAccounts(fixture: Fixture): Promise<UserRecord> {
  const passwordHash = await bcrypt.hash(config.seedPassword, config.bcryptRounds);
  let admin: UserRecord | null = null;

  for (const account of fixture.accounts) {
    const user = await db.users.findByUsername(account.username) ?? await db.users.create({
      ...account,
      passwordHash,
      email: null,
      isActive: true
    });
    if (user.role === UserRole.ADMIN && !admin) admin = user;
  }

  if (!admin) {
    throw new Error('Fixture must contain an admin account');
  }
  return admin;
}

async function seedRoutes(fixture: Fixture): Promise<Map<string, RouteRecord>> {
  const routes = new Map<string, RouteRecord>();
  for (const input of fixture.routes) {
    const route = await db.fleet.findRouteByName(input.name) ?? await db.fleet.createRoute(input);
    routes.set(route.name, route);
  }
  return routes;
}

async function seedFleet(fixture: Fixture, routes: Map<string, RouteRecord>, admin: UserRecord): Promise<number> {
  let created = 0;

  for (const { vehicle: vehicleInput, ...driverInput } of fixture.drivers) {
    const driver = await db.fleet.findDriverByLicense(driverInput.licenseNumber)
      ?? await db.fleet.createDriver(driverInput);

    if (await db.fleet.findVehicleByPlate(vehicleInput.licensePlate)) continue;

    const { routeName, openingBalance, ...vehicle } = vehicleInput;
    const route = routeName ? routes.get(routeName) : undefined;
    const entry = await db.fleet.createVehicle(
      { ...vehicle, driverId: driver.id, routeId: route?.id ?? null },
      buildQrValue
    );
    created += 1;

    if (entry.wallet && openingBalance > 0) {
      const at = new Date();
      await db.wallets.createDeposit({
        referenceNumber: generateReferenceNumber(at),
        walletId: entry.wallet.id,
        amount: roundMoney(openingBalance),
        orCode: null,
        paymentMethod: PaymentMethod.CASH,
        status: DepositStatus.SUCCESSFUL,
        createdById: admin.id,
        approvedById: admin.id,
        approvedAt: at,
        notes: 'Opening balance',
        createdAt: at
      });
    }

    logger.info('Vehicle seeded', {
      licensePlate: entry.vehicle.licensePlate,
      qrValue: entry.vehicle.qrValue,
      route: route?.name ?? null
    });
  }

  return created;
}

/**
 * Credited deposits on random business hours of the two months before this one
 */
async function seedDeposits(admin: UserRecord): Promise<number> {
  const settings = await db.terminal.getSettings();
  const entries = await db.fleet.listVehicles({});
  const wallets = entries
    .map(entry => entry.wallet)
    .filter((wallet): wallet is WalletRecord => wallet !== null);

  if (wallets.length === 0) {
    logger.warn('No wallets found; seed vehicles first');
    return 0;
  }

  const today = toCalendarDate(new Date());
  const months: YearMonth[] = [shiftMonth(today, -1), shiftMonth(today, -2)];
  const minimum = Math.ceil(settings.minDepositAmount);
  let created = 0;

  for (const month of months) {
    for (let i = 0; i < DEPOSITS_PER_MONTH; i++) {
      const day: CalendarDate = { ...month, day: randomInt(1, daysInMonth(month)) };
      const at = zonedTimeToUtc({ ...day, hour: randomInt(8, 17), minute: randomInt(0, 59) });

      await db.wallets.createDeposit({
        referenceNumber: generateReferenceNumber(at),
        walletId: pick(wallets).id,
        amount: randomInt(minimum, minimum * 5),
        orCode: null,
        paymentMethod: pick(PAYMENT_METHODS),
        status: DepositStatus.SUCCESSFUL,
        createdById: admin.id,
        approvedById: admin.id,
        approvedAt: at,
        notes: null,
        createdAt: at
      });
      created += 1;
    }
    logger.info('Mock deposits created', { month: monthLabel(month), count: DEPOSITS_PER_MONTH });
  }

  return created;
}

// =============================================================================
// MAIN
// =============================================================================

async function run(): Promise<void> {
  const args = new Set(process.argv.slice(2));
  const fixture = loadFixture();

  if (config.database.driver === 'memory') {
    logger.warn('DB_DRIVER is memory: seeded data disappears when this script exits');
  }

  if (args.has('--reset')) {
    await reset();
  }

  const admin = await seedAccounts(fixture);
  const routes = await seedRoutes(fixture);
  const vehicles = await seedFleet(fixture, routes, admin);
  const deposits = args.has('--deposits') ? await seedDeposits(admin) : 0;

  logger.info('Seed complete', {
    accounts: fixture.accounts.length,
    routes: routes.size,
    vehiclesCreated: vehicles,
    depositsCreated: deposits
  });
}

run()
  .then(() => closeDatabase())
  .catch(async (error: unknown) => {
    logger.error('Seed failed', { error: error instanceof Error ? error.message : String(error) });
    await closeDatabase();
    process.exitCode = 1;
  });
