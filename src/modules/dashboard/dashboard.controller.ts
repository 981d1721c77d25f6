/**
 * =============================================================================
 * DASHBOARD MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { dashboardService } from './dashboard.service';
import { treasurerDashboardQuerySchema } from './dashboard.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { requireUser } from '../../shared/middleware/auth.middleware';

class DashboardController {
  getAdmin = asyncHandler(async (_req: Request, res: Response) => {
    res.json(successResponse(await dashboardService.getAdminDashboard()));
  });

  getAdminLive = asyncHandler(async (_req: Request, res: Response) => {
    res.json(successResponse(await dashboardService.getAdminLive()));
  });

  getStaff = asyncHandler(async (_req: Request, res: Response) => {
    res.json(successResponse(await dashboardService.getStaffDashboard()));
  });

  getTreasurer = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(treasurerDashboardQuerySchema, req.query);
    const dashboard = await dashboardService.getTreasurerDashboard(requireUser(req), query);
    res.json(successResponse(dashboard));
  });
}

export const dashboardController = new DashboardController();
