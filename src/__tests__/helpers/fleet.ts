/**
 * Fleet fixtures shared by the service tests
 */

import { UserRole, VehicleStatus, VehicleType } from '../../core/constants';
import { FleetEntry, UserRecord } from '../../shared/database/records';
import { Repositories } from '../../shared/database/repository.interface';
import { AuthUser } from '../../shared/middleware/auth.middleware';
import { buildQrValue } from '../../modules/vehicle/vehicle.service';

/** 2025-03-15 10:00 in Manila */
export const FIXED_NOW = new Date('2025-03-15T02:00:00.000Z');

export const fixedClock = (): Date => new Date(FIXED_NOW.getTime());

export async function createAccount(
  repos: Repositories,
  username: string,
  role: UserRole
): Promise<UserRecord> {
  return repos.users.create({
    username,
    passwordHash: 'not-a-real-hash',
    firstName: username,
    lastName: 'Tester',
    email: null,
    role,
    isActive: true
  });
}

export function actorFor(user: UserRecord): AuthUser {
  return {
    userId: user.id,
    role: user.role,
    username: user.username,
    jti: `jti-${user.id}`,
    exp: Math.floor(FIXED_NOW.getTime() / 1000) + 3600
  };
}

export interface VehicleFixture {
  plate: string;
  firstName?: string;
  lastName?: string;
  license?: string;
  routeId?: number | null;
  status?: VehicleStatus;
}

export async function createVehicle(repos: Repositories, fixture: VehicleFixture): Promise<FleetEntry> {
  const driver = await repos.fleet.createDriver({
    firstName: fixture.firstName ?? 'Juan',
    middleName: null,
    lastName: fixture.lastName ?? 'Cruz',
    suffix: null,
    birthDate: null,
    licenseNumber: fixture.license ?? `LIC-${fixture.plate}`,
    licenseType: 'professional',
    licenseExpiry: null,
    mobileNumber: null,
    address: null
  });

  return repos.fleet.createVehicle({
    driverId: driver.id,
    licensePlate: fixture.plate,
    crNumber: `CR-${fixture.plate}`,
    orNumber: `OR-${fixture.plate}`,
    vinNumber: `VIN-${fixture.plate}`,
    vehicleType: VehicleType.JEEPNEY,
    vehicleName: null,
    yearModel: 2020,
    registrationNumber: `REG-${fixture.plate}`,
    registrationExpiry: null,
    seatCapacity: 18,
    routeId: fixture.routeId ?? null,
    status: fixture.status ?? VehicleStatus.ACTIVE
  }, buildQrValue);
}
