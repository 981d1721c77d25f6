/**
 * =============================================================================
 * USER MODULE - ROUTES
 * =============================================================================
 *
 * Back office account management.
 * =============================================================================
 */

import { Router } from 'express';
import { userController } from './user.controller';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { MANAGER_ROLES, UserRole } from '../../core/constants';

const router = Router();

router.use(authMiddleware);

/**
 * @route   GET /api/v1/users
 * @desc    List visible accounts with per-role counts
 * @access  Private (Admin, Staff Admin)
 */
router.get('/', roleGuard(MANAGER_ROLES), userController.listUsers);

/**
 * @route   POST /api/v1/users
 * @desc    Create an account
 * @access  Private (Admin, Staff Admin)
 */
router.post('/', roleGuard(MANAGER_ROLES), userController.createUser);

/**
 * @route   GET /api/v1/users/:id
 * @desc    Get an account
 * @access  Private (Admin, Staff Admin)
 */
router.get('/:id', roleGuard(MANAGER_ROLES), userController.getUser);

/**
 * @route   PUT /api/v1/users/:id
 * @desc    Update an account
 * @access  Private (Admin, Staff Admin)
 */
router.put('/:id', roleGuard(MANAGER_ROLES), userController.updateUser);

/**
 * @route   DELETE /api/v1/users/:id
 * @desc    Delete an account
 * @access  Private (Admin)
 */
router.delete('/:id', roleGuard([UserRole.ADMIN]), userController.deleteUser);

export { router as userRouter };
