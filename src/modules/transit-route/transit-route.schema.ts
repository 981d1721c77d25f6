/**
 * =============================================================================
 * TRANSIT ROUTE MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { nonNegativeMoneySchema } from '../../shared/utils/validation.utils';

const placeSchema = (label: string) => z.string().trim().min(2, `${label} must be at least 2 characters`).max(100);

export const createRouteSchema = z.object({
  name: placeSchema('Name'),
  origin: placeSchema('Origin'),
  destination: placeSchema('Destination'),
  baseFare: nonNegativeMoneySchema.default(0),
  isActive: z.boolean().default(true)
}).strict();

export const updateRouteSchema = createRouteSchema.partial();

export const listRoutesQuerySchema = z.object({
  active: z.enum(['true', 'false']).optional().transform(value => value === 'true')
});

export type CreateRouteInput = z.infer<typeof createRouteSchema>;
export type UpdateRouteInput = z.infer<typeof updateRouteSchema>;
