/**
 * =============================================================================
 * REPORT MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { monthParamSchema } from '../../shared/utils/validation.utils';

export const reportQuerySchema = z.object({
  month: monthParamSchema,
  export: z.enum(['csv']).optional().catch(undefined)
});

export type ReportQuery = z.infer<typeof reportQuerySchema>;
