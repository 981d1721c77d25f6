/**
 * =============================================================================
 * DRIVER MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { LICENSE_TYPE_PROFESSIONAL } from '../../core/constants';
import { isoDateSchema, optionalText, searchSchema } from '../../shared/utils/validation.utils';

const personNameSchema = (label: string) => z.string()
  .trim()
  .min(2, `${label} must be at least 2 characters`)
  .max(100);

const optionalDateSchema = z.union([isoDateSchema, z.literal('')])
  .nullish()
  .transform(value => (value ? value : null));

export const createDriverSchema = z.object({
  firstName: personNameSchema('First name'),
  middleName: optionalText(100),
  lastName: personNameSchema('Last name'),
  suffix: optionalText(10),
  birthDate: optionalDateSchema,
  licenseNumber: z.string().trim().min(3).max(30).transform(value => value.toUpperCase()),
  licenseType: z.literal(LICENSE_TYPE_PROFESSIONAL, {
    errorMap: () => ({ message: 'Only professional licenses are accepted' })
  }).default(LICENSE_TYPE_PROFESSIONAL),
  licenseExpiry: optionalDateSchema,
  mobileNumber: optionalText(20).refine(
    value => value === null || /^\+?[\d\s-]{7,20}$/.test(value),
    'Invalid mobile number'
  ),
  address: optionalText(255)
}).strict();

export const updateDriverSchema = createDriverSchema.partial();

export const listDriversQuerySchema = z.object({
  search: searchSchema
});

export type CreateDriverInput = z.infer<typeof createDriverSchema>;
export type UpdateDriverInput = z.infer<typeof updateDriverSchema>;
