/**
 * =============================================================================
 * VEHICLE MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { MIN_YEAR_MODEL, VehicleStatus, VehicleType } from '../../core/constants';
import { isoDateSchema, optionalText, searchSchema } from '../../shared/utils/validation.utils';

/**
 * Document numbers are stored trimmed and uppercased
 */
const documentNumber = (label: string, max = 50) => z.string({ required_error: `${label} is required` })
  .trim()
  .min(1, `${label} is required`)
  .max(max)
  .transform(value => value.toUpperCase());

export const yearModelSchema = z.coerce.number()
  .int()
  .min(MIN_YEAR_MODEL, `Year model cannot be earlier than ${MIN_YEAR_MODEL}`)
  .refine(year => year <= new Date().getFullYear() + 1, 'Year model cannot be more than one year ahead');

export const createVehicleSchema = z.object({
  driverId: z.coerce.number().int().positive(),
  licensePlate: documentNumber('License plate', 20),
  crNumber: documentNumber('CR number'),
  orNumber: documentNumber('OR number'),
  vinNumber: documentNumber('VIN number'),
  registrationNumber: documentNumber('Registration number'),
  vehicleType: z.nativeEnum(VehicleType),
  vehicleName: optionalText(100),
  yearModel: yearModelSchema.nullish().transform(value => value ?? null),
  registrationExpiry: isoDateSchema.nullish().transform(value => value ?? null),
  seatCapacity: z.coerce.number().int().positive('Seat capacity must be greater than zero')
    .nullish()
    .transform(value => value ?? null),
  routeId: z.coerce.number().int().positive().nullish().transform(value => value ?? null),
  status: z.nativeEnum(VehicleStatus).default(VehicleStatus.ACTIVE)
}).strict();

export const updateVehicleSchema = createVehicleSchema.partial();

export const listVehiclesQuerySchema = z.object({
  search: searchSchema,
  status: z.nativeEnum(VehicleStatus).optional(),
  routeId: z.coerce.number().int().positive().optional()
});

export type CreateVehicleInput = z.infer<typeof createVehicleSchema>;
export type UpdateVehicleInput = z.infer<typeof updateVehicleSchema>;
export type ListVehiclesQuery = z.infer<typeof listVehiclesQuerySchema>;
