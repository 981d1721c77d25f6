import { and, asc, count, desc, eq, ilike, or, sql, SQL } from 'drizzle-orm';
import {
  DriverListItem,
  DriverPatch,
  FleetRepository,
  NewDriver,
  NewRoute,
  NewVehicle,
  RoutePatch,
  VehicleListFilter,
  VehiclePatch
} from '../repository.interface';
import { DriverRecord, FleetEntry, RouteRecord, VehicleRecord, formatDriverCode } from '../records';
import { drivers, transitRoutes, vehicles, wallets } from '../schema';
import { NotFoundError } from '../../../core/errors/AppError';
import { toMoneyString } from '../../utils/money.utils';
import {
  toDriverRecord,
  toRouteRecord,
  toVehicleRecord,
  toWalletRecord
} from './mappers';
import { Database, hasChanges, withUniqueGuard } from './pg.client';

const fleetColumns = {
  vehicle: vehicles,
  driver: drivers,
  route: transitRoutes,
  wallet: wallets
};

function driverSearch(search: string): SQL | undefined {
  const s = `%${search}%`;
  return or(
    ilike(drivers.firstName, s),
    ilike(drivers.lastName, s),
    ilike(drivers.licenseNumber, s),
    ilike(drivers.driverCode, s),
    ilike(drivers.mobileNumber, s)
  );
}

export class PostgresFleetRepository implements FleetRepository {
  constructor(private readonly db: Database) {}

  // ---------------------------------------------------------------------------
  // Drivers
  // ---------------------------------------------------------------------------

  async findDriverById(id: number): Promise<DriverRecord | null> {
    const [row] = await this.db.select().from(drivers).where(eq(drivers.id, id)).limit(1);
    return row ? toDriverRecord(row) : null;
  }

  async findDriverByLicense(licenseNumber: string): Promise<DriverRecord | null> {
    const [row] = await this.db
      .select()
      .from(drivers)
      .where(sql`lower(${drivers.licenseNumber}) = ${licenseNumber.toLowerCase()}`)
      .limit(1);
    return row ? toDriverRecord(row) : null;
  }

  async listDrivers(search?: string): Promise<DriverListItem[]> {
    const rows = await this.db
      .select({ driver: drivers, vehicle: vehicles })
      .from(drivers)
      .leftJoin(vehicles, eq(vehicles.driverId, drivers.id))
      .where(search ? driverSearch(search) : undefined)
      .orderBy(asc(drivers.lastName), asc(drivers.firstName));
    return rows.map(row => ({
      driver: toDriverRecord(row.driver),
      vehicle: row.vehicle ? toVehicleRecord(row.vehicle) : null
    }));
  }

  async createDriver(input: NewDriver): Promise<DriverRecord> {
    return withUniqueGuard(() => this.db.transaction(async (tx) => {
      const [inserted] = await tx.insert(drivers).values(input).returning({ id: drivers.id });
      const [row] = await tx
        .update(drivers)
        .set({ driverCode: formatDriverCode(inserted.id) })
        .where(eq(drivers.id, inserted.id))
        .returning();
      return toDriverRecord(row);
    }));
  }

  async updateDriver(id: number, patch: DriverPatch): Promise<DriverRecord | null> {
    if (!hasChanges(patch)) return this.findDriverById(id);
    const [row] = await withUniqueGuard(() =>
      this.db.update(drivers).set(patch).where(eq(drivers.id, id)).returning()
    );
    return row ? toDriverRecord(row) : null;
  }

  async deleteDriver(id: number): Promise<boolean> {
    const removed = await this.db.delete(drivers).where(eq(drivers.id, id)).returning({ id: drivers.id });
    return removed.length > 0;
  }

  async countDrivers(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(drivers);
    return row?.value ?? 0;
  }

  // ---------------------------------------------------------------------------
  // Vehicles
  // ---------------------------------------------------------------------------

  private fleetQuery() {
    return this.db
      .select(fleetColumns)
      .from(vehicles)
      .innerJoin(drivers, eq(drivers.id, vehicles.driverId))
      .leftJoin(transitRoutes, eq(transitRoutes.id, vehicles.routeId))
      .leftJoin(wallets, eq(wallets.vehicleId, vehicles.id));
  }

  private async findFleetEntry(where: SQL): Promise<FleetEntry | null> {
    const [row] = await this.fleetQuery().where(where).limit(1);
    return row ? toFleetEntry(row) : null;
  }

  async findVehicle(id: number): Promise<FleetEntry | null> {
    return this.findFleetEntry(eq(vehicles.id, id));
  }

  async findVehicleByQrValue(qrValue: string): Promise<FleetEntry | null> {
    return this.findFleetEntry(eq(vehicles.qrValue, qrValue));
  }

  async findVehicleByPlate(licensePlate: string): Promise<FleetEntry | null> {
    return this.findFleetEntry(sql`lower(${vehicles.licensePlate}) = ${licensePlate.toLowerCase()}`);
  }

  async findVehicleByDriverId(driverId: number): Promise<VehicleRecord | null> {
    const [row] = await this.db.select().from(vehicles).where(eq(vehicles.driverId, driverId)).limit(1);
    return row ? toVehicleRecord(row) : null;
  }

  async listVehicles(filter: VehicleListFilter): Promise<FleetEntry[]> {
    const conds: SQL[] = [];
    if (filter.status) conds.push(eq(vehicles.status, filter.status));
    if (filter.routeId !== undefined) conds.push(eq(vehicles.routeId, filter.routeId));
    if (filter.search) {
      const match = or(ilike(vehicles.licensePlate, `%${filter.search}%`), driverSearch(filter.search));
      if (match) conds.push(match);
    }

    const query = this.fleetQuery()
      .where(conds.length ? and(...conds) : undefined)
      .orderBy(desc(vehicles.createdAt), desc(vehicles.id));
    const rows = filter.limit === undefined ? await query : await query.limit(filter.limit);
    return rows.map(toFleetEntry);
  }

  async createVehicle(
    input: NewVehicle,
    qrValueFor: (id: number, licensePlate: string) => string
  ): Promise<FleetEntry> {
    const id = await withUniqueGuard(() => this.db.transaction(async (tx) => {
      const [inserted] = await tx.insert(vehicles).values(input).returning({ id: vehicles.id });
      await tx
        .update(vehicles)
        .set({ qrValue: qrValueFor(inserted.id, input.licensePlate) })
        .where(eq(vehicles.id, inserted.id));
      await tx.insert(wallets).values({ vehicleId: inserted.id, balance: toMoneyString(0) });
      return inserted.id;
    }));

    const entry = await this.findVehicle(id);
    if (!entry) {
      throw new NotFoundError('Vehicle not found');
    }
    return entry;
  }

  async updateVehicle(id: number, patch: VehiclePatch): Promise<VehicleRecord | null> {
    if (!hasChanges(patch)) {
      const entry = await this.findVehicle(id);
      return entry?.vehicle ?? null;
    }
    const [row] = await withUniqueGuard(() =>
      this.db.update(vehicles).set(patch).where(eq(vehicles.id, id)).returning()
    );
    return row ? toVehicleRecord(row) : null;
  }

  async setQrValue(id: number, qrValue: string): Promise<void> {
    const updated = await withUniqueGuard(() =>
      this.db.update(vehicles).set({ qrValue }).where(eq(vehicles.id, id)).returning({ id: vehicles.id })
    );
    if (updated.length === 0) {
      throw new NotFoundError('Vehicle not found');
    }
  }

  async deleteVehicle(id: number): Promise<boolean> {
    const removed = await this.db.delete(vehicles).where(eq(vehicles.id, id)).returning({ id: vehicles.id });
    return removed.length > 0;
  }

  async countVehicles(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(vehicles);
    return row?.value ?? 0;
  }

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  async listRoutes(activeOnly = false): Promise<RouteRecord[]> {
    const rows = await this.db
      .select()
      .from(transitRoutes)
      .where(activeOnly ? eq(transitRoutes.isActive, true) : undefined)
      .orderBy(asc(transitRoutes.name));
    return rows.map(toRouteRecord);
  }

  async findRouteById(id: number): Promise<RouteRecord | null> {
    const [row] = await this.db.select().from(transitRoutes).where(eq(transitRoutes.id, id)).limit(1);
    return row ? toRouteRecord(row) : null;
  }

  async findRouteByName(name: string): Promise<RouteRecord | null> {
    const [row] = await this.db
      .select()
      .from(transitRoutes)
      .where(sql`lower(${transitRoutes.name}) = ${name.toLowerCase()}`)
      .limit(1);
    return row ? toRouteRecord(row) : null;
  }

  async createRoute(input: NewRoute): Promise<RouteRecord> {
    const [row] = await withUniqueGuard(() =>
      this.db
        .insert(transitRoutes)
        .values({ ...input, baseFare: toMoneyString(input.baseFare) })
        .returning()
    );
    return toRouteRecord(row);
  }

  async updateRoute(id: number, patch: RoutePatch): Promise<RouteRecord | null> {
    if (!hasChanges(patch)) return this.findRouteById(id);
    const { baseFare, ...rest } = patch;
    const [row] = await withUniqueGuard(() =>
      this.db
        .update(transitRoutes)
        .set({ ...rest, baseFare: baseFare === undefined ? undefined : toMoneyString(baseFare) })
        .where(eq(transitRoutes.id, id))
        .returning()
    );
    return row ? toRouteRecord(row) : null;
  }

  async deleteRoute(id: number): Promise<boolean> {
    const removed = await this.db.delete(transitRoutes).where(eq(transitRoutes.id, id)).returning({ id: transitRoutes.id });
    return removed.length > 0;
  }
}

type FleetRow = {
  vehicle: typeof vehicles.$inferSelect;
  driver: typeof drivers.$inferSelect;
  route: typeof transitRoutes.$inferSelect | null;
  wallet: typeof wallets.$inferSelect | null;
};

export function toFleetEntry(row: FleetRow): FleetEntry {
  return {
    vehicle: toVehicleRecord(row.vehicle),
    driver: toDriverRecord(row.driver),
    route: row.route ? toRouteRecord(row.route) : null,
    wallet: row.wallet ? toWalletRecord(row.wallet) : null
  };
}
