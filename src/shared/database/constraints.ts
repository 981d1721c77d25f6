/**
 * Unique constraints shared by both storage drivers. Keys are the index
 * names in migrations/0001_init.sql.
 */

import { ErrorCode } from '../../core/constants';
import { ConflictError } from '../../core/errors/AppError';

interface ConstraintInfo {
  message: string;
  code: ErrorCode;
}

export const UNIQUE_CONSTRAINTS = {
  users_username_lower_unique: { message: 'Username is already taken', code: ErrorCode.USERNAME_TAKEN },
  drivers_license_lower_unique: { message: 'License number is already registered', code: ErrorCode.LICENSE_TAKEN },
  routes_name_lower_unique: { message: 'Route name is already used', code: ErrorCode.ROUTE_NAME_TAKEN },
  vehicles_plate_lower_unique: { message: 'License plate is already registered', code: ErrorCode.PLATE_TAKEN },
  vehicles_driver_unique: { message: 'Driver already has a vehicle', code: ErrorCode.DRIVER_HAS_VEHICLE },
  vehicles_qr_value_unique: { message: 'QR value is already assigned', code: ErrorCode.CONFLICT },
  deposits_reference_unique: { message: 'Reference number already exists', code: ErrorCode.CONFLICT },
  deposits_or_code_lower_unique: { message: 'OR code has already been used', code: ErrorCode.DUPLICATE_OR_CODE },
  entry_logs_one_active_per_vehicle: { message: 'Vehicle is already in the queue', code: ErrorCode.ALREADY_IN_QUEUE }
} satisfies Record<string, ConstraintInfo>;

export type UniqueConstraint = keyof typeof UNIQUE_CONSTRAINTS;

function isUniqueConstraint(name: string): name is UniqueConstraint {
  return Object.prototype.hasOwnProperty.call(UNIQUE_CONSTRAINTS, name);
}

export function uniqueViolation(constraint: string | undefined): ConflictError {
  if (constraint && isUniqueConstraint(constraint)) {
    const { message, code } = UNIQUE_CONSTRAINTS[constraint];
    return new ConflictError(message, code, { constraint });
  }
  return new ConflictError('Record already exists');
}
