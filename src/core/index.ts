/**
 * =============================================================================
 * CORE MODULE - Central Exports
 * =============================================================================
 *
 * Single entry point for constants and error classes.
 *
 * USAGE:
 * ```typescript
 * import { UserRole, DepositStatus, NotFoundError } from '../../core';
 * ```
 * =============================================================================
 */

// Constants & Enums
export * from './constants';

// Error Classes
export * from './errors/AppError';
