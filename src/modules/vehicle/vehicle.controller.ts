/**
 * =============================================================================
 * VEHICLE MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { vehicleService } from './vehicle.service';
import {
  createVehicleSchema,
  listVehiclesQuerySchema,
  updateVehicleSchema
} from './vehicle.schema';
import { idParamSchema, validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class VehicleController {
  listVehicles = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(listVehiclesQuerySchema, req.query);
    const vehicles = await vehicleService.listVehicles(query);
    res.json(successResponse({ vehicles }, { total: vehicles.length }));
  });

  getVehicle = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const vehicle = await vehicleService.getVehicle(id);
    res.json(successResponse({ vehicle }));
  });

  /**
   * Register a vehicle (QR value and wallet are created with it)
   */
  createVehicle = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createVehicleSchema, req.body);
    const vehicle = await vehicleService.createVehicle(data);
    res.status(201).json(successResponse({ vehicle }));
  });

  updateVehicle = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const data = validateSchema(updateVehicleSchema, req.body);
    const vehicle = await vehicleService.updateVehicle(id, data);
    res.json(successResponse({ vehicle }));
  });

  deleteVehicle = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    await vehicleService.deleteVehicle(id);
    res.json(successResponse({ message: 'Vehicle deleted' }));
  });

  regenerateQrCodes = asyncHandler(async (_req: Request, res: Response) => {
    const result = await vehicleService.regenerateQrCodes();
    res.json(successResponse(result));
  });
}

export const vehicleController = new VehicleController();
