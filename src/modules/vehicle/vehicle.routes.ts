/**
 * =============================================================================
 * VEHICLE MODULE - ROUTES
 * =============================================================================
 *
 * Endpoints:
 * GET    /vehicles                  - List (search, status, routeId)
 * POST   /vehicles                  - Register
 * POST   /vehicles/qr/regenerate    - Recompute all QR values
 * GET    /vehicles/:id              - Details with wallet balance
 * PUT    /vehicles/:id              - Update
 * DELETE /vehicles/:id              - Delete (cascades to wallet and deposits)
 * =============================================================================
 */

import { Router } from 'express';
import { vehicleController } from './vehicle.controller';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { MANAGER_ROLES, UserRole } from '../../core/constants';

const router = Router();

router.use(authMiddleware);

router.get('/', roleGuard(MANAGER_ROLES), vehicleController.listVehicles);
router.post('/', roleGuard(MANAGER_ROLES), vehicleController.createVehicle);

/**
 * @route   POST /api/v1/vehicles/qr/regenerate
 * @access  Private (Admin)
 */
router.post('/qr/regenerate', roleGuard([UserRole.ADMIN]), vehicleController.regenerateQrCodes);

router.get('/:id', roleGuard(MANAGER_ROLES), vehicleController.getVehicle);
router.put('/:id', roleGuard(MANAGER_ROLES), vehicleController.updateVehicle);
router.delete('/:id', roleGuard(MANAGER_ROLES), vehicleController.deleteVehicle);

export { router as vehicleRouter };
