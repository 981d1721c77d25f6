/**
 * =============================================================================
 * USER MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { UserRole } from '../../core/constants';
import { optionalText, searchSchema } from '../../shared/utils/validation.utils';

const usernameSchema = z.string()
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(150)
  .regex(/^[\w.@+-]+$/, 'Username may contain letters, digits and @ . + - _ only');

const passwordSchema = z.string()
  .min(8, 'Password must be at least 8 characters')
  .max(128);

const nameSchema = z.string().trim().max(150).default('');

export const createUserSchema = z.object({
  username: usernameSchema,
  password: passwordSchema,
  firstName: nameSchema,
  lastName: nameSchema,
  email: optionalText(254).pipe(z.string().email('Invalid email address').nullable()),
  role: z.nativeEnum(UserRole),
  isActive: z.boolean().default(true)
}).strict();

export const updateUserSchema = z.object({
  username: usernameSchema.optional(),
  password: passwordSchema.optional(),
  firstName: z.string().trim().max(150).optional(),
  lastName: z.string().trim().max(150).optional(),
  email: optionalText(254).pipe(z.string().email('Invalid email address').nullable()).optional(),
  role: z.nativeEnum(UserRole).optional(),
  isActive: z.boolean().optional()
}).strict();

export const listUsersQuerySchema = z.object({
  search: searchSchema,
  role: z.nativeEnum(UserRole).optional()
});

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;
