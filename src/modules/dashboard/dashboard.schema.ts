/**
 * =============================================================================
 * DASHBOARD MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';

/** Out-of-range values fall back to the current month */
export const treasurerDashboardQuerySchema = z.object({
  year: z.coerce.number().int().min(2000).max(9999).optional().catch(undefined),
  month: z.coerce.number().int().min(1).max(12).optional().catch(undefined)
});

export type TreasurerDashboardQuery = z.infer<typeof treasurerDashboardQuerySchema>;
