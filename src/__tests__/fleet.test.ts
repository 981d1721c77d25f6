/**
 * =============================================================================
 * FLEET REGISTRY - Unit Tests
 * =============================================================================
 *
 * Drivers, vehicles, QR values, wallets and routes.
 * =============================================================================
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    log: jest.fn()
  }
}));

import { DepositStatus, ErrorCode, PaymentMethod, VehicleType } from '../core/constants';
import { NotFoundError } from '../core/errors/AppError';
import { createMemoryRepositories } from '../shared/database/memory';
import { Repositories } from '../shared/database/repository.interface';
import { DriverService } from '../modules/driver/driver.service';
import { createDriverSchema } from '../modules/driver/driver.schema';
import { TransitRouteService, routeSlug } from '../modules/transit-route/transit-route.service';
import { VehicleService, buildQrValue } from '../modules/vehicle/vehicle.service';
import { createVehicleSchema } from '../modules/vehicle/vehicle.schema';

describe('routeSlug', () => {
  it('lowercases and dashes route names', () => {
    expect(routeSlug('Central - North Loop')).toBe('central-north-loop');
    expect(routeSlug('  Old Town / Pier 9 ')).toBe('old-town-pier-9');
  });
});

describe('buildQrValue', () => {
  it('prefixes the id and dashes spaces', () => {
    expect(buildQrValue(7, 'abc 123')).toBe('VEH-7-ABC-123');
  });
});

describe('fleet services', () => {
  let repos: Repositories;
  let drivers: DriverService;
  let vehicles: VehicleService;
  let routes: TransitRouteService;

  function vehicleInput(driverId: number, licensePlate: string, routeId: number | null = null) {
    return createVehicleSchema.parse({
      driverId,
      licensePlate,
      crNumber: 'cr-1',
      orNumber: 'or-1',
      vinNumber: 'vin-1',
      registrationNumber: 'reg-1',
      vehicleType: VehicleType.VAN,
      routeId
    });
  }

  async function registerDriver(licenseNumber: string) {
    return drivers.createDriver(createDriverSchema.parse({
      firstName: 'Rosa',
      lastName: 'Dela Cruz',
      licenseNumber,
      licenseType: 'professional'
    }));
  }

  beforeEach(() => {
    repos = createMemoryRepositories();
    drivers = new DriverService(repos);
    vehicles = new VehicleService(repos);
    routes = new TransitRouteService(repos);
  });

  it('gives drivers sequential codes', async () => {
    const first = await registerDriver('N01-00-000001');
    const second = await registerDriver('N01-00-000002');

    expect(first.driverCode).toBe('DRV-0001');
    expect(second.driverCode).toBe('DRV-0002');
    expect(second.fullName).toBe('Rosa Dela Cruz');
    expect(second.vehicle).toBeNull();
  });

  it('refuses a license number registered twice', async () => {
    await registerDriver('N01-00-000001');
    await expect(registerDriver('n01-00-000001')).rejects.toMatchObject({ code: ErrorCode.LICENSE_TAKEN });
  });

  it('creates the QR value and an empty wallet with the vehicle', async () => {
    const driver = await registerDriver('N01-00-000001');
    const route = await routes.createRoute({
      name: 'Central - Lakeshore',
      origin: 'Central',
      destination: 'Lakeshore',
      baseFare: 60,
      isActive: true
    });

    const vehicle = await vehicles.createVehicle(vehicleInput(driver.id, ' abc 123 ', route.id));

    expect(vehicle.licensePlate).toBe('ABC 123');
    expect(vehicle.crNumber).toBe('CR-1');
    expect(vehicle.qrValue).toBe('VEH-1-ABC-123');
    expect(vehicle.route?.name).toBe('Central - Lakeshore');
    expect(vehicle.balance).toBe(0);
    expect(vehicle.walletId).not.toBeNull();

    const withVehicle = await drivers.getDriver(driver.id);
    expect(withVehicle.vehicle).toEqual({ id: vehicle.id, licensePlate: 'ABC 123', status: 'active' });
  });

  it('allows one vehicle per driver', async () => {
    const driver = await registerDriver('N01-00-000001');
    await vehicles.createVehicle(vehicleInput(driver.id, 'ABC-123'));

    await expect(vehicles.createVehicle(vehicleInput(driver.id, 'XYZ-789'))).rejects.toMatchObject({
      message: 'Driver already has a vehicle',
      code: ErrorCode.DRIVER_HAS_VEHICLE
    });
  });

  it('checks the driver and route exist', async () => {
    await expect(vehicles.createVehicle(vehicleInput(42, 'ABC-123'))).rejects.toMatchObject({
      message: 'Driver not found'
    });

    const driver = await registerDriver('N01-00-000001');
    await expect(vehicles.createVehicle(vehicleInput(driver.id, 'ABC-123', 42))).rejects.toMatchObject({
      message: 'Route not found'
    });
  });

  it('regenerates QR values after a plate change', async () => {
    const driver = await registerDriver('N01-00-000001');
    const vehicle = await vehicles.createVehicle(vehicleInput(driver.id, 'ABC-123'));
    await vehicles.updateVehicle(vehicle.id, { licensePlate: 'NEW-456' });

    expect(await vehicles.regenerateQrCodes()).toEqual({ total: 1, updated: 1 });
    expect((await vehicles.getVehicle(vehicle.id)).qrValue).toBe('VEH-1-NEW-456');
    expect(await vehicles.regenerateQrCodes()).toEqual({ total: 1, updated: 0 });
  });

  it('removes the vehicle, wallet and deposits with the driver', async () => {
    const driver = await registerDriver('N01-00-000001');
    const vehicle = await vehicles.createVehicle(vehicleInput(driver.id, 'ABC-123'));
    if (vehicle.walletId === null) throw new Error('vehicle created without a wallet');
    await repos.wallets.createDeposit({
      referenceNumber: 'DEP-TEST-1',
      walletId: vehicle.walletId,
      amount: 200,
      orCode: null,
      paymentMethod: PaymentMethod.CASH,
      status: DepositStatus.SUCCESSFUL,
      createdById: null,
      approvedById: null,
      approvedAt: null,
      notes: null
    });

    await drivers.deleteDriver(driver.id);

    await expect(vehicles.getVehicle(vehicle.id)).rejects.toBeInstanceOf(NotFoundError);
    expect(await repos.wallets.findWalletById(vehicle.walletId)).toBeNull();
    expect(await repos.wallets.summarizeDeposits({})).toEqual({ total: 0, count: 0 });
  });

  it('unassigns vehicles when their route is deleted', async () => {
    const driver = await registerDriver('N01-00-000001');
    const route = await routes.createRoute({
      name: 'Central - Hillside',
      origin: 'Central',
      destination: 'Hillside',
      baseFare: 45,
      isActive: true
    });
    const vehicle = await vehicles.createVehicle(vehicleInput(driver.id, 'ABC-123', route.id));

    await routes.deleteRoute(route.id);

    expect((await vehicles.getVehicle(vehicle.id)).route).toBeNull();
  });

  it('finds routes by slug', async () => {
    await routes.createRoute({ name: 'Central - Hillside', origin: 'Central', destination: 'Hillside', baseFare: 45, isActive: true });

    expect((await routes.findBySlug('CENTRAL-HILLSIDE'))?.name).toBe('Central - Hillside');
    expect(await routes.findBySlug('central-lakeshore')).toBeNull();
  });
});
