/**
 * =============================================================================
 * REPORT MODULE - ROUTES
 * =============================================================================
 *
 * Every report takes ?month=YYYY-MM; the comparison and fee reports also
 * take ?export=csv.
 * =============================================================================
 */

import { Router } from 'express';
import { reportController } from './report.controller';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { UserRole } from '../../core/constants';

const router = Router();

router.use(authMiddleware, roleGuard([UserRole.ADMIN]));

/**
 * @route   GET /api/v1/reports/home
 * @desc    Current month and today totals
 * @access  Private (Admin)
 */
router.get('/home', reportController.getHome);

/**
 * @route   GET /api/v1/reports/deposit-analytics
 * @access  Private (Admin)
 */
router.get('/deposit-analytics', reportController.getDepositAnalytics);

/**
 * @route   GET /api/v1/reports/deposits-vs-entry-fees
 * @access  Private (Admin)
 */
router.get('/deposits-vs-entry-fees', reportController.getDepositsVsFees);

/**
 * @route   GET /api/v1/reports/profit-report
 * @desc    Terminal fee analytics; defaults to the latest month with fees
 * @access  Private (Admin)
 */
router.get('/profit-report', reportController.getProfitReport);

export { router as reportRouter };
