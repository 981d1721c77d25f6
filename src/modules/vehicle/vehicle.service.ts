/**
 * =============================================================================
 * VEHICLE MODULE - SERVICE
 * =============================================================================
 *
 * Vehicle registry. Each vehicle belongs to exactly one driver, carries a QR
 * value scanned at the terminal gate, and owns one prepaid wallet.
 * =============================================================================
 */

import { NotFoundError } from '../../core/errors/AppError';
import { db } from '../../shared/database/db';
import { FleetEntry, RouteRecord, VehicleRecord, driverFullName } from '../../shared/database/records';
import { Repositories } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { CreateVehicleInput, ListVehiclesQuery, UpdateVehicleInput } from './vehicle.schema';

export interface VehicleView extends VehicleRecord {
  driver: { id: number; driverCode: string; fullName: string; licenseNumber: string };
  route: Pick<RouteRecord, 'id' | 'name' | 'origin' | 'destination'> | null;
  walletId: number | null;
  balance: number;
}

export interface QrRegenerationResult {
  total: number;
  updated: number;
}

/**
 * QR payload printed on the vehicle: VEH-{id}-{PLATE}, spaces become dashes
 */
export function buildQrValue(id: number, licensePlate: string): string {
  return `VEH-${id}-${licensePlate}`.replace(/ /g, '-').toUpperCase();
}

export function toVehicleView(entry: FleetEntry): VehicleView {
  const { vehicle, driver, route, wallet } = entry;
  return {
    ...vehicle,
    driver: {
      id: driver.id,
      driverCode: driver.driverCode,
      fullName: driverFullName(driver),
      licenseNumber: driver.licenseNumber
    },
    route: route ? { id: route.id, name: route.name, origin: route.origin, destination: route.destination } : null,
    walletId: wallet?.id ?? null,
    balance: wallet?.balance ?? 0
  };
}

export class VehicleService {
  constructor(private readonly repos: Repositories = db) {}

  async listVehicles(query: ListVehiclesQuery): Promise<VehicleView[]> {
    const entries = await this.repos.fleet.listVehicles(query);
    return entries.map(toVehicleView);
  }

  async getVehicle(id: number): Promise<VehicleView> {
    const entry = await this.repos.fleet.findVehicle(id);
    if (!entry) {
      throw new NotFoundError('Vehicle not found');
    }
    return toVehicleView(entry);
  }

  /**
   * Register a vehicle; its QR value and empty wallet are created with it
   */
  async createVehicle(input: CreateVehicleInput): Promise<VehicleView> {
    await this.assertReferences(input.driverId, input.routeId);

    const entry = await this.repos.fleet.createVehicle(input, buildQrValue);
    logger.info('Vehicle registered', {
      vehicleId: entry.vehicle.id,
      licensePlate: entry.vehicle.licensePlate,
      qrValue: entry.vehicle.qrValue
    });
    return toVehicleView(entry);
  }

  async updateVehicle(id: number, input: UpdateVehicleInput): Promise<VehicleView> {
    await this.assertReferences(input.driverId, input.routeId);

    const updated = await this.repos.fleet.updateVehicle(id, input);
    if (!updated) {
      throw new NotFoundError('Vehicle not found');
    }
    return this.getVehicle(id);
  }

  async deleteVehicle(id: number): Promise<void> {
    const deleted = await this.repos.fleet.deleteVehicle(id);
    if (!deleted) {
      throw new NotFoundError('Vehicle not found');
    }
    logger.info('Vehicle deleted', { vehicleId: id });
  }

  /**
   * Recompute every QR value from the current plate
   */
  async regenerateQrCodes(): Promise<QrRegenerationResult> {
    const entries = await this.repos.fleet.listVehicles({});
    let updated = 0;

    for (const { vehicle } of entries) {
      const qrValue = buildQrValue(vehicle.id, vehicle.licensePlate);
      if (qrValue !== vehicle.qrValue) {
        await this.repos.fleet.setQrValue(vehicle.id, qrValue);
        updated += 1;
      }
    }

    logger.info('QR values regenerated', { total: entries.length, updated });
    return { total: entries.length, updated };
  }

  private async assertReferences(driverId: number | undefined, routeId: number | null | undefined): Promise<void> {
    if (driverId !== undefined && !(await this.repos.fleet.findDriverById(driverId))) {
      throw new NotFoundError('Driver not found');
    }
    if (routeId !== undefined && routeId !== null && !(await this.repos.fleet.findRouteById(routeId))) {
      throw new NotFoundError('Route not found');
    }
  }
}

export const vehicleService = new VehicleService();
