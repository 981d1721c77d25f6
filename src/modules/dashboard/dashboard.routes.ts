/**
 * =============================================================================
 * DASHBOARD MODULE - ROUTES
 * =============================================================================
 *
 * One landing endpoint per role; login returns the caller's path.
 * =============================================================================
 */

import { Router } from 'express';
import { dashboardController } from './dashboard.controller';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { MANAGER_ROLES, UserRole } from '../../core/constants';

const router = Router();

router.use(authMiddleware);

/**
 * @route   GET /api/v1/dashboard/admin
 * @desc    Fleet counts and profit totals
 * @access  Private (Admin)
 */
router.get('/admin', roleGuard([UserRole.ADMIN]), dashboardController.getAdmin);

/**
 * @route   GET /api/v1/dashboard/admin/live
 * @desc    Admin figures plus deposits, revenue, 7-day profit chart, recent queue
 * @access  Private (Admin)
 */
router.get('/admin/live', roleGuard([UserRole.ADMIN]), dashboardController.getAdminLive);

/**
 * @route   GET /api/v1/dashboard/staff
 * @access  Private (Staff Admin, Admin)
 */
router.get('/staff', roleGuard(MANAGER_ROLES), dashboardController.getStaff);

/**
 * @route   GET /api/v1/dashboard/treasurer
 * @desc    The caller's deposit requests; ?year=&month= picks the month
 * @access  Private (Treasurer)
 */
router.get('/treasurer', roleGuard([UserRole.TREASURER]), dashboardController.getTreasurer);

export { router as dashboardRouter };
