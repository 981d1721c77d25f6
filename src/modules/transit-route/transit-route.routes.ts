/**
 * =============================================================================
 * TRANSIT ROUTE MODULE - ROUTES
 * =============================================================================
 */

import { Router } from 'express';
import { transitRouteController } from './transit-route.controller';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { MANAGER_ROLES } from '../../core/constants';

const router = Router();

router.use(authMiddleware, roleGuard(MANAGER_ROLES));

/**
 * @route   GET /api/v1/routes
 * @desc    List routes with their display slug (?active=true for active only)
 * @access  Private (Admin, Staff Admin)
 */
router.get('/', transitRouteController.listRoutes);

/**
 * @route   POST /api/v1/routes
 * @access  Private (Admin, Staff Admin)
 */
router.post('/', transitRouteController.createRoute);

router.get('/:id', transitRouteController.getRoute);
router.put('/:id', transitRouteController.updateRoute);

/**
 * @route   DELETE /api/v1/routes/:id
 * @desc    Vehicles on the route are kept and lose their route
 * @access  Private (Admin, Staff Admin)
 */
router.delete('/:id', transitRouteController.deleteRoute);

export { router as transitRouteRouter };
