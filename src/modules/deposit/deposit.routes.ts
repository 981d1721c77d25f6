/**
 * =============================================================================
 * DEPOSIT MODULE - ROUTES
 * =============================================================================
 *
 * Wallet board, counter deposits, treasurer requests and their review.
 * =============================================================================
 */

import { Router } from 'express';
import { depositController } from './deposit.controller';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { ALL_ROLES, MANAGER_ROLES, UserRole } from '../../core/constants';

const router = Router();

const managersOnly = roleGuard(MANAGER_ROLES);
const treasurerOnly = roleGuard([UserRole.TREASURER]);
const anyRole = roleGuard(ALL_ROLES);

router.use(authMiddleware);

// =============================================================================
// WALLETS
// =============================================================================

/**
 * @route   GET /api/v1/deposits/wallets
 * @desc    Wallets with driver and plate, plus balance totals
 * @query   search, sort (newest|largest|smallest|driver_asc|driver_desc)
 * @access  Private (Admin, Staff Admin)
 */
router.get('/wallets', managersOnly, depositController.listWallets);

/**
 * @route   GET /api/v1/deposits/wallet-balance?vehicleId=
 * @access  Private (all roles)
 */
router.get('/wallet-balance', anyRole, depositController.getWalletBalance);

// =============================================================================
// DEPOSITS
// =============================================================================

/**
 * @route   POST /api/v1/deposits
 * @desc    Counter deposit, approved and credited immediately
 * @access  Private (Admin, Staff Admin)
 */
router.post('/', managersOnly, depositController.createDirectDeposit);

/**
 * @route   POST /api/v1/deposits/requests
 * @desc    File a deposit request for review
 * @access  Private (Treasurer)
 */
router.post('/requests', treasurerOnly, depositController.createDepositRequest);

/**
 * @route   GET /api/v1/deposits/requests/mine?status=
 * @access  Private (Treasurer)
 */
router.get('/requests/mine', treasurerOnly, depositController.listMyRequests);

/**
 * @route   GET /api/v1/deposits/requests/:id
 * @access  Private (all roles; treasurers see their own requests only)
 */
router.get('/requests/:id', anyRole, depositController.getDeposit);

/**
 * @route   GET /api/v1/deposits/pending
 * @desc    Requests awaiting review, oldest first
 * @access  Private (Admin, Staff Admin)
 */
router.get('/pending', managersOnly, depositController.listPending);

/**
 * @route   GET /api/v1/deposits/history
 * @query   month (YYYY-MM), sort (newest|oldest|largest|smallest), search, export=csv
 * @access  Private (Admin, Staff Admin)
 */
router.get('/history', managersOnly, depositController.getHistory);

router.get('/ajax/search-drivers', anyRole, depositController.searchDrivers);
router.get('/ajax/validate-or-code', anyRole, depositController.validateOrCode);

/**
 * @route   POST /api/v1/deposits/:id/approve
 * @desc    Approve a pending request and credit the wallet (409 if already reviewed)
 * @access  Private (Admin, Staff Admin)
 */
router.post('/:id/approve', managersOnly, depositController.approveDeposit);

/**
 * @route   POST /api/v1/deposits/:id/reject
 * @access  Private (Admin, Staff Admin)
 */
router.post('/:id/reject', managersOnly, depositController.rejectDeposit);

/**
 * @route   GET /api/v1/deposits/:id/receipt
 * @access  Private (all roles; treasurers see their own deposits only)
 */
router.get('/:id/receipt', anyRole, depositController.getDeposit);

export { router as depositRouter };
