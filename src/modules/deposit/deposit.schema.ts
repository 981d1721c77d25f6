/**
 * =============================================================================
 * DEPOSIT MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { DepositStatus, PaymentMethod } from '../../core/constants';
import {
  monthParamSchema,
  moneySchema,
  optionalText,
  searchSchema
} from '../../shared/utils/validation.utils';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

/**
 * Official receipt code: trimmed, uppercased, letters/digits/dashes
 */
export const orCodeSchema = z.string({ required_error: 'OR code is required' })
  .trim()
  .toUpperCase()
  .min(3, 'OR code must be at least 3 characters')
  .max(50, 'OR code must be at most 50 characters')
  .regex(/^[A-Z0-9-]+$/, 'OR code may contain only letters, digits and dashes');

const depositBaseSchema = z.object({
  vehicleId: z.coerce.number().int().positive(),
  amount: moneySchema,
  paymentMethod: z.nativeEnum(PaymentMethod).default(PaymentMethod.CASH),
  notes: optionalText(500)
});

/**
 * Deposit recorded at the counter; the OR code is optional
 */
export const directDepositSchema = depositBaseSchema.extend({
  orCode: z.preprocess(blankToUndefined, orCodeSchema.optional())
}).strict();

/**
 * Treasurer request; the OR code is required
 */
export const depositRequestSchema = depositBaseSchema.extend({
  orCode: orCodeSchema
}).strict();

export const depositDecisionSchema = z.object({
  notes: optionalText(500)
});

export const WALLET_SORTS = ['newest', 'largest', 'smallest', 'driver_asc', 'driver_desc'] as const;
export const DEPOSIT_SORTS = ['newest', 'oldest', 'largest', 'smallest', 'driver_asc', 'driver_desc'] as const;

export const listWalletsQuerySchema = z.object({
  search: searchSchema,
  sort: z.enum(WALLET_SORTS).catch('newest')
});

export const walletBalanceQuerySchema = z.object({
  vehicleId: z.coerce.number().int().positive()
});

export const depositHistoryQuerySchema = z.object({
  month: monthParamSchema,
  sort: z.enum(DEPOSIT_SORTS).catch('newest'),
  search: searchSchema,
  export: z.enum(['csv']).optional().catch(undefined)
});

export const myRequestsQuerySchema = z.object({
  status: z.nativeEnum(DepositStatus).optional().catch(undefined)
});

export const searchDriversQuerySchema = z.object({
  q: z.string().trim().default('')
});

export const validateOrCodeQuerySchema = z.object({
  code: z.string().default('')
});

export type DirectDepositInput = z.infer<typeof directDepositSchema>;
export type DepositRequestInput = z.infer<typeof depositRequestSchema>;
export type ListWalletsQuery = z.infer<typeof listWalletsQuerySchema>;
export type DepositHistoryQuery = z.infer<typeof depositHistoryQuerySchema>;
