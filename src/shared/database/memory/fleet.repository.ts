import { NotFoundError } from '../../../core/errors/AppError';
import { uniqueViolation } from '../constraints';
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
import { DriverRecord, FleetEntry, RouteRecord, VehicleRecord, WalletRecord, formatDriverCode } from '../records';
import { MemoryStore, applyPatch, assertUnique, matchesAny } from './memory.store';

export class MemoryFleetRepository implements FleetRepository {
  constructor(private readonly store: MemoryStore) {}

  // ---------------------------------------------------------------------------
  // Drivers
  // ---------------------------------------------------------------------------

  async findDriverById(id: number): Promise<DriverRecord | null> {
    const driver = this.store.drivers.find(row => row.id === id);
    return driver ? { ...driver } : null;
  }

  async findDriverByLicense(licenseNumber: string): Promise<DriverRecord | null> {
    const needle = licenseNumber.toLowerCase();
    const driver = this.store.drivers.find(row => row.licenseNumber.toLowerCase() === needle);
    return driver ? { ...driver } : null;
  }

  async listDrivers(search?: string): Promise<DriverListItem[]> {
    return this.store.drivers
      .filter(driver => matchesAny(search, [
        driver.firstName,
        driver.lastName,
        driver.licenseNumber,
        driver.driverCode,
        driver.mobileNumber
      ]))
      .sort((a, b) => a.lastName.localeCompare(b.lastName) || a.firstName.localeCompare(b.firstName))
      .map(driver => {
        const vehicle = this.store.vehicles.find(row => row.driverId === driver.id);
        return { driver: { ...driver }, vehicle: vehicle ? { ...vehicle } : null };
      });
  }

  async createDriver(input: NewDriver): Promise<DriverRecord> {
    assertUnique(this.store.drivers, input.licenseNumber, row => row.licenseNumber, 'drivers_license_lower_unique');
    const id = this.store.nextId('drivers');
    const driver: DriverRecord = { ...input, id, driverCode: formatDriverCode(id), createdAt: new Date() };
    this.store.drivers.push(driver);
    return { ...driver };
  }

  async updateDriver(id: number, patch: DriverPatch): Promise<DriverRecord | null> {
    const driver = this.store.drivers.find(row => row.id === id);
    if (!driver) return null;
    if (patch.licenseNumber !== undefined) {
      assertUnique(this.store.drivers, patch.licenseNumber, row => row.licenseNumber, 'drivers_license_lower_unique', id);
    }
    applyPatch(driver, patch);
    return { ...driver };
  }

  async deleteDriver(id: number): Promise<boolean> {
    const index = this.store.drivers.findIndex(row => row.id === id);
    if (index === -1) return false;
    for (const vehicle of this.store.vehicles.filter(row => row.driverId === id)) {
      this.removeVehicle(vehicle.id);
    }
    this.store.drivers.splice(index, 1);
    return true;
  }

  async countDrivers(): Promise<number> {
    return this.store.drivers.length;
  }

  // ---------------------------------------------------------------------------
  // Vehicles
  // ---------------------------------------------------------------------------

  async findVehicle(id: number): Promise<FleetEntry | null> {
    const vehicle = this.store.vehicles.find(row => row.id === id);
    return vehicle ? this.toEntry(vehicle) : null;
  }

  async findVehicleByQrValue(qrValue: string): Promise<FleetEntry | null> {
    const vehicle = this.store.vehicles.find(row => row.qrValue === qrValue);
    return vehicle ? this.toEntry(vehicle) : null;
  }

  async findVehicleByPlate(licensePlate: string): Promise<FleetEntry | null> {
    const needle = licensePlate.toLowerCase();
    const vehicle = this.store.vehicles.find(row => row.licensePlate.toLowerCase() === needle);
    return vehicle ? this.toEntry(vehicle) : null;
  }

  async findVehicleByDriverId(driverId: number): Promise<VehicleRecord | null> {
    const vehicle = this.store.vehicles.find(row => row.driverId === driverId);
    return vehicle ? { ...vehicle } : null;
  }

  async listVehicles(filter: VehicleListFilter): Promise<FleetEntry[]> {
    const entries = this.store.vehicles
      .filter(vehicle => !filter.status || vehicle.status === filter.status)
      .filter(vehicle => filter.routeId === undefined || vehicle.routeId === filter.routeId)
      .map(vehicle => this.toEntry(vehicle))
      .filter(entry => matchesAny(filter.search, [
        entry.vehicle.licensePlate,
        entry.driver.firstName,
        entry.driver.lastName,
        entry.driver.licenseNumber,
        entry.driver.driverCode
      ]))
      .sort((a, b) => b.vehicle.createdAt.getTime() - a.vehicle.createdAt.getTime() || b.vehicle.id - a.vehicle.id);
    return filter.limit === undefined ? entries : entries.slice(0, filter.limit);
  }

  async createVehicle(
    input: NewVehicle,
    qrValueFor: (id: number, licensePlate: string) => string
  ): Promise<FleetEntry> {
    const { vehicles } = this.store;
    assertUnique(vehicles, input.licensePlate, row => row.licensePlate, 'vehicles_plate_lower_unique');
    if (vehicles.some(row => row.driverId === input.driverId)) {
      throw uniqueViolation('vehicles_driver_unique');
    }

    const id = this.store.nextId('vehicles');
    const qrValue = qrValueFor(id, input.licensePlate);
    assertUnique(vehicles, qrValue, row => row.qrValue, 'vehicles_qr_value_unique');

    const now = new Date();
    const vehicle: VehicleRecord = { ...input, id, qrValue, createdAt: now };
    const wallet: WalletRecord = {
      id: this.store.nextId('wallets'),
      vehicleId: id,
      balance: 0,
      createdAt: now,
      updatedAt: now
    };
    vehicles.push(vehicle);
    this.store.wallets.push(wallet);
    return this.toEntry(vehicle);
  }

  async updateVehicle(id: number, patch: VehiclePatch): Promise<VehicleRecord | null> {
    const vehicle = this.store.vehicles.find(row => row.id === id);
    if (!vehicle) return null;
    if (patch.licensePlate !== undefined) {
      assertUnique(this.store.vehicles, patch.licensePlate, row => row.licensePlate, 'vehicles_plate_lower_unique', id);
    }
    if (patch.driverId !== undefined && this.store.vehicles.some(row => row.id !== id && row.driverId === patch.driverId)) {
      throw uniqueViolation('vehicles_driver_unique');
    }
    applyPatch(vehicle, patch);
    return { ...vehicle };
  }

  async setQrValue(id: number, qrValue: string): Promise<void> {
    const vehicle = this.store.vehicles.find(row => row.id === id);
    if (!vehicle) {
      throw new NotFoundError('Vehicle not found');
    }
    assertUnique(this.store.vehicles, qrValue, row => row.qrValue, 'vehicles_qr_value_unique', id);
    vehicle.qrValue = qrValue;
  }

  async deleteVehicle(id: number): Promise<boolean> {
    return this.removeVehicle(id);
  }

  async countVehicles(): Promise<number> {
    return this.store.vehicles.length;
  }

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  async listRoutes(activeOnly = false): Promise<RouteRecord[]> {
    return this.store.routes
      .filter(route => !activeOnly || route.isActive)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(route => ({ ...route }));
  }

  async findRouteById(id: number): Promise<RouteRecord | null> {
    const route = this.store.routes.find(row => row.id === id);
    return route ? { ...route } : null;
  }

  async findRouteByName(name: string): Promise<RouteRecord | null> {
    const needle = name.toLowerCase();
    const route = this.store.routes.find(row => row.name.toLowerCase() === needle);
    return route ? { ...route } : null;
  }

  async createRoute(input: NewRoute): Promise<RouteRecord> {
    assertUnique(this.store.routes, input.name, row => row.name, 'routes_name_lower_unique');
    const route: RouteRecord = { ...input, id: this.store.nextId('routes'), createdAt: new Date() };
    this.store.routes.push(route);
    return { ...route };
  }

  async updateRoute(id: number, patch: RoutePatch): Promise<RouteRecord | null> {
    const route = this.store.routes.find(row => row.id === id);
    if (!route) return null;
    if (patch.name !== undefined) {
      assertUnique(this.store.routes, patch.name, row => row.name, 'routes_name_lower_unique', id);
    }
    applyPatch(route, patch);
    return { ...route };
  }

  async deleteRoute(id: number): Promise<boolean> {
    const index = this.store.routes.findIndex(row => row.id === id);
    if (index === -1) return false;
    this.store.routes.splice(index, 1);
    for (const vehicle of this.store.vehicles) {
      if (vehicle.routeId === id) vehicle.routeId = null;
    }
    return true;
  }

  // ---------------------------------------------------------------------------

  private toEntry(vehicle: VehicleRecord): FleetEntry {
    const driver = this.store.drivers.find(row => row.id === vehicle.driverId);
    if (!driver) {
      throw new NotFoundError(`Driver ${vehicle.driverId} of vehicle ${vehicle.id} is missing`);
    }
    const route = this.store.routes.find(row => row.id === vehicle.routeId);
    const wallet = this.store.wallets.find(row => row.vehicleId === vehicle.id);
    return {
      vehicle: { ...vehicle },
      driver: { ...driver },
      route: route ? { ...route } : null,
      wallet: wallet ? { ...wallet } : null
    };
  }

  /** Cascades like the SQL foreign keys */
  private removeVehicle(id: number): boolean {
    const { store } = this;
    const index = store.vehicles.findIndex(row => row.id === id);
    if (index === -1) return false;

    const walletIds = store.wallets.filter(row => row.vehicleId === id).map(row => row.id);
    const entryIds = store.entries.filter(row => row.vehicleId === id).map(row => row.id);

    store.vehicles.splice(index, 1);
    store.wallets = store.wallets.filter(row => row.vehicleId !== id);
    store.deposits = store.deposits.filter(row => !walletIds.includes(row.walletId));
    store.entries = store.entries.filter(row => row.vehicleId !== id);
    for (const transaction of store.transactions) {
      if (transaction.vehicleId === id) transaction.vehicleId = null;
      if (transaction.entryLogId !== null && entryIds.includes(transaction.entryLogId)) transaction.entryLogId = null;
    }
    for (const profit of store.profits) {
      if (profit.entryLogId !== null && entryIds.includes(profit.entryLogId)) profit.entryLogId = null;
    }
    return true;
  }
}
