/**
 * =============================================================================
 * REPORT MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { reportService } from './report.service';
import { reportQuerySchema } from './report.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { sendCsv } from '../../shared/utils/csv.utils';

class ReportController {
  getHome = asyncHandler(async (_req: Request, res: Response) => {
    const home = await reportService.getHome();
    res.json(successResponse(home));
  });

  getDepositAnalytics = asyncHandler(async (req: Request, res: Response) => {
    const { month } = validateSchema(reportQuerySchema, req.query);
    const report = await reportService.getDepositAnalytics(month);
    res.json(successResponse(report));
  });

  getDepositsVsFees = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(reportQuerySchema, req.query);
    if (query.export === 'csv') {
      sendCsv(res, await reportService.exportDepositsVsFeesCsv(query.month));
      return;
    }
    const report = await reportService.getDepositsVsFees(query.month);
    res.json(successResponse(report));
  });

  getProfitReport = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(reportQuerySchema, req.query);
    if (query.export === 'csv') {
      sendCsv(res, await reportService.exportProfitCsv(query.month));
      return;
    }
    const report = await reportService.getProfitReport(query.month);
    res.json(successResponse(report));
  });
}

export const reportController = new ReportController();
