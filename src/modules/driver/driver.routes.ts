/**
 * =============================================================================
 * DRIVER MODULE - ROUTES
 * =============================================================================
 *
 * Driver registry. Every driver holds a professional license and owns at
 * most one vehicle.
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { idParamSchema, validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { MANAGER_ROLES } from '../../core/constants';
import { driverService } from './driver.service';
import { createDriverSchema, listDriversQuerySchema, updateDriverSchema } from './driver.schema';

const router = Router();

router.use(authMiddleware, roleGuard(MANAGER_ROLES));

/**
 * GET /api/v1/drivers
 * List drivers, optionally filtered by name, license or driver code
 */
router.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { search } = validateSchema(listDriversQuerySchema, req.query);
    const drivers = await driverService.listDrivers(search);
    res.json(successResponse({ drivers }, { total: drivers.length }));
  } catch (error) {
    next(error);
  }
});

/**
 * POST /api/v1/drivers
 */
router.post('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = validateSchema(createDriverSchema, req.body);
    const driver = await driverService.createDriver(data);
    res.status(201).json(successResponse({ driver }));
  } catch (error) {
    next(error);
  }
});

/**
 * GET /api/v1/drivers/:id
 */
router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = validateSchema(idParamSchema, req.params);
    const driver = await driverService.getDriver(id);
    res.json(successResponse({ driver }));
  } catch (error) {
    next(error);
  }
});

/**
 * PUT /api/v1/drivers/:id
 */
router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = validateSchema(idParamSchema, req.params);
    const data = validateSchema(updateDriverSchema, req.body);
    const driver = await driverService.updateDriver(id, data);
    res.json(successResponse({ driver }));
  } catch (error) {
    next(error);
  }
});

/**
 * DELETE /api/v1/drivers/:id
 * Cascades to the driver's vehicle, wallet and deposits
 */
router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = validateSchema(idParamSchema, req.params);
    await driverService.deleteDriver(id);
    res.json(successResponse({ message: 'Driver deleted' }));
  } catch (error) {
    next(error);
  }
});

export { router as driverRouter };
