/**
 * =============================================================================
 * DRIVER MODULE - SERVICE
 * =============================================================================
 */

import { NotFoundError } from '../../core/errors/AppError';
import { db } from '../../shared/database/db';
import { DriverRecord, VehicleRecord, driverFullName } from '../../shared/database/records';
import { Repositories } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { CreateDriverInput, UpdateDriverInput } from './driver.schema';

export interface DriverView extends DriverRecord {
  fullName: string;
  vehicle: { id: number; licensePlate: string; status: string } | null;
}

export function toDriverView(driver: DriverRecord, vehicle: VehicleRecord | null): DriverView {
  return {
    ...driver,
    fullName: driverFullName(driver),
    vehicle: vehicle ? { id: vehicle.id, licensePlate: vehicle.licensePlate, status: vehicle.status } : null
  };
}

class DriverService {
  constructor(private readonly repos: Repositories = db) {}

  async listDrivers(search?: string): Promise<DriverView[]> {
    const items = await this.repos.fleet.listDrivers(search);
    return items.map(item => toDriverView(item.driver, item.vehicle));
  }

  async getDriver(id: number): Promise<DriverView> {
    const driver = await this.repos.fleet.findDriverById(id);
    if (!driver) {
      throw new NotFoundError('Driver not found');
    }
    return toDriverView(driver, await this.repos.fleet.findVehicleByDriverId(id));
  }

  async createDriver(input: CreateDriverInput): Promise<DriverView> {
    const driver = await this.repos.fleet.createDriver(input);
    logger.info('Driver registered', { driverId: driver.id, driverCode: driver.driverCode });
    return toDriverView(driver, null);
  }

  async updateDriver(id: number, input: UpdateDriverInput): Promise<DriverView> {
    const driver = await this.repos.fleet.updateDriver(id, input);
    if (!driver) {
      throw new NotFoundError('Driver not found');
    }
    return toDriverView(driver, await this.repos.fleet.findVehicleByDriverId(id));
  }

  /**
   * Removes the driver together with their vehicle, wallet and deposits
   */
  async deleteDriver(id: number): Promise<void> {
    const deleted = await this.repos.fleet.deleteDriver(id);
    if (!deleted) {
      throw new NotFoundError('Driver not found');
    }
    logger.info('Driver deleted', { driverId: id });
  }
}

export { DriverService };
export const driverService = new DriverService();
