/**
 * =============================================================================
 * TERMINAL MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { monthParamSchema, moneySchema } from '../../shared/utils/validation.utils';

/**
 * Scanned QR value, or a typed plate number
 */
export const scanSchema = z.object({
  qrValue: z.string().trim().min(1, 'QR value is required').max(120)
});

export const departureTimeSchema = z.object({
  departureTime: z.coerce.date({ invalid_type_error: 'departureTime must be a date' })
});

export const updateSettingsSchema = z.object({
  minDepositAmount: moneySchema,
  terminalFee: moneySchema,
  departureCountdownMinutes: z.coerce.number().int().min(1).max(180)
}).partial().strict();

export const monthQuerySchema = z.object({
  month: monthParamSchema
});

export const publicQueueQuerySchema = z.object({
  route: z.string()
    .trim()
    .max(120)
    .optional()
    .transform(value => (value ? value : undefined))
});

export type UpdateSettingsInput = z.infer<typeof updateSettingsSchema>;
