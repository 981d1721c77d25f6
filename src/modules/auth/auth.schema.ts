/**
 * =============================================================================
 * AUTH MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';

/**
 * Login request schema
 */
export const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required').max(150),
  password: z.string().min(1, 'Password is required').max(128)
}).strict();

export type LoginInput = z.infer<typeof loginSchema>;
