/**
 * =============================================================================
 * TERMINAL MODULE - ROUTES
 * =============================================================================
 *
 * Gate scanning, the departure queue, fee listings and system settings.
 * The public endpoints feed the lobby TV and need no login.
 * =============================================================================
 */

import { Router } from 'express';
import { terminalController } from './terminal.controller';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { MANAGER_ROLES } from '../../core/constants';

const router = Router();

const managersOnly = [authMiddleware, roleGuard(MANAGER_ROLES)];

// =============================================================================
// PUBLIC
// =============================================================================

/**
 * @route   GET /api/v1/terminal/public/queue?route=slug
 * @access  Public
 */
router.get('/public/queue', terminalController.getPublicQueue);

/**
 * @route   GET /api/v1/terminal/public/tv-display?route=slug
 * @desc    Queue positions and countdowns for the lobby screen
 * @access  Public
 */
router.get('/public/tv-display', terminalController.getTvDisplay);

// =============================================================================
// GATE
// =============================================================================

/**
 * @route   POST /api/v1/terminal/entries/scan
 * @desc    Charge the terminal fee and queue the vehicle
 * @body    { qrValue } (QR value or plate number)
 * @access  Private (Admin, Staff Admin)
 */
router.post('/entries/scan', ...managersOnly, terminalController.scanEntry);

/**
 * @route   POST /api/v1/terminal/entries/exit
 * @access  Private (Admin, Staff Admin)
 */
router.post('/entries/exit', ...managersOnly, terminalController.scanExit);

router.post('/entries/:id/boarding', ...managersOnly, terminalController.startBoarding);
router.post('/entries/:id/depart', ...managersOnly, terminalController.markDeparted);

/**
 * @route   PUT /api/v1/terminal/entries/:id/departure
 * @body    { departureTime } (ISO 8601)
 * @access  Private (Admin, Staff Admin)
 */
router.put('/entries/:id/departure', ...managersOnly, terminalController.setDepartureTime);

// =============================================================================
// QUEUE & FEES
// =============================================================================

router.get('/queue', ...managersOnly, terminalController.getQueue);
router.get('/queue/history', ...managersOnly, terminalController.getQueueHistory);

/**
 * @route   GET /api/v1/terminal/entry-fees?month=YYYY-MM
 * @desc    Revenue-counted fees; defaults to the latest month with fees
 * @access  Private (Admin, Staff Admin)
 */
router.get('/entry-fees', ...managersOnly, terminalController.getEntryFees);

// =============================================================================
// SETTINGS
// =============================================================================

/**
 * @route   GET /api/v1/terminal/settings
 * @access  Private (all roles)
 */
router.get('/settings', authMiddleware, terminalController.getSettings);

/**
 * @route   PUT /api/v1/terminal/settings
 * @body    { minDepositAmount?, terminalFee?, departureCountdownMinutes? }
 * @access  Private (Admin, Staff Admin)
 */
router.put('/settings', ...managersOnly, terminalController.updateSettings);

export { router as terminalRouter };
