/**
 * =============================================================================
 * AUTH MODULE - ROUTES
 * =============================================================================
 *
 * Endpoints:
 * POST /auth/login    - Exchange username/password for an access token
 * POST /auth/logout   - Revoke the current token
 * GET  /auth/me       - Current user
 * =============================================================================
 */

import { Router } from 'express';
import { authController } from './auth.controller';
import { loginRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { authMiddleware } from '../../shared/middleware/auth.middleware';

const router = Router();

/**
 * @route   POST /api/v1/auth/login
 * @desc    Verify credentials and return an access token
 * @access  Public (rate limited)
 */
router.post('/login', loginRateLimiter, authController.login);

/**
 * @route   POST /api/v1/auth/logout
 * @desc    Revoke the current access token
 * @access  Private
 */
router.post('/logout', authMiddleware, authController.logout);

/**
 * @route   GET /api/v1/auth/me
 * @desc    Get current user info
 * @access  Private
 */
router.get('/me', authMiddleware, authController.getCurrentUser);

export { router as authRouter };
