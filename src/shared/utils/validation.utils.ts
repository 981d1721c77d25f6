/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and utilities.
 * Used across all modules for consistent validation.
 * =============================================================================
 */

import { z } from 'zod';
import { ValidationError } from '../../core/errors/AppError';
import { parseMonthValue } from './date.utils';
import { MAX_MONEY_AMOUNT } from './money.utils';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * Numeric route parameter (`/:id`)
 */
export const idParamSchema = z.object({
  id: z.coerce.number().int().positive()
});

/**
 * Optional free-text search, trimmed, empty treated as absent
 */
export const searchSchema = z.string()
  .trim()
  .max(100)
  .optional()
  .transform(value => (value ? value : undefined));

/**
 * Month selector in `YYYY-MM` form, 1900 or later. Anything else is passed on
 * as undefined so the caller falls back to its default month.
 */
export const monthParamSchema = z.string()
  .optional()
  .transform(value => (parseMonthValue(value) ? value : undefined));

/**
 * True when the value has no more than two decimal places
 */
export function hasAtMostTwoDecimals(value: number): boolean {
  const cents = value * 100;
  return Math.abs(cents - Math.round(cents)) < 1e-6;
}

/**
 * Positive money amount with centavo precision
 */
export const moneySchema = z.coerce.number({ invalid_type_error: 'Amount must be a number' })
  .finite()
  .positive('Amount must be greater than zero')
  .max(MAX_MONEY_AMOUNT, 'Amount is too large')
  .refine(hasAtMostTwoDecimals, { message: 'Amount can have at most 2 decimal places' });

/**
 * Non-negative money amount (fares)
 */
export const nonNegativeMoneySchema = z.coerce.number()
  .finite()
  .min(0)
  .max(MAX_MONEY_AMOUNT, 'Amount is too large')
  .refine(hasAtMostTwoDecimals, { message: 'Amount can have at most 2 decimal places' });

/**
 * Optional text field: trimmed, empty string becomes null
 */
export function optionalText(max: number) {
  return z.string()
    .trim()
    .max(max)
    .nullish()
    .transform(value => (value ? value : null));
}

/**
 * Calendar date in `YYYY-MM-DD` form
 */
export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD form');

// ============================================================
// VALIDATION
// ============================================================

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on failure
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}
