/**
 * =============================================================================
 * TRANSIT ROUTE MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { transitRouteService } from './transit-route.service';
import { createRouteSchema, listRoutesQuerySchema, updateRouteSchema } from './transit-route.schema';
import { idParamSchema, validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class TransitRouteController {
  listRoutes = asyncHandler(async (req: Request, res: Response) => {
    const { active } = validateSchema(listRoutesQuerySchema, req.query);
    const routes = await transitRouteService.listRoutes(active);
    res.json(successResponse({ routes }, { total: routes.length }));
  });

  getRoute = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const route = await transitRouteService.getRoute(id);
    res.json(successResponse({ route }));
  });

  createRoute = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createRouteSchema, req.body);
    const route = await transitRouteService.createRoute(data);
    res.status(201).json(successResponse({ route }));
  });

  updateRoute = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const data = validateSchema(updateRouteSchema, req.body);
    const route = await transitRouteService.updateRoute(id, data);
    res.json(successResponse({ route }));
  });

  deleteRoute = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    await transitRouteService.deleteRoute(id);
    res.json(successResponse({ message: 'Route deleted' }));
  });
}

export const transitRouteController = new TransitRouteController();
