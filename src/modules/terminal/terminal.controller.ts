/**
 * =============================================================================
 * TERMINAL MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { terminalService } from './terminal.service';
import {
  departureTimeSchema,
  monthQuerySchema,
  publicQueueQuerySchema,
  scanSchema,
  updateSettingsSchema
} from './terminal.schema';
import { idParamSchema, validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { requireUser } from '../../shared/middleware/auth.middleware';

class TerminalController {
  // ---------------------------------------------------------------------------
  // Gate
  // ---------------------------------------------------------------------------

  scanEntry = asyncHandler(async (req: Request, res: Response) => {
    const { qrValue } = validateSchema(scanSchema, req.body);
    const result = await terminalService.scanEntry(requireUser(req), qrValue);
    res.status(201).json(successResponse(result));
  });

  scanExit = asyncHandler(async (req: Request, res: Response) => {
    const { qrValue } = validateSchema(scanSchema, req.body);
    const entry = await terminalService.scanExit(requireUser(req), qrValue);
    res.json(successResponse({ entry }));
  });

  // ---------------------------------------------------------------------------
  // Queue
  // ---------------------------------------------------------------------------

  startBoarding = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const entry = await terminalService.startBoarding(id);
    res.json(successResponse({ entry }));
  });

  markDeparted = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const entry = await terminalService.markDeparted(id);
    res.json(successResponse({ entry }));
  });

  setDepartureTime = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const { departureTime } = validateSchema(departureTimeSchema, req.body);
    const entry = await terminalService.setDepartureTime(id, departureTime);
    res.json(successResponse({ entry }));
  });

  getQueue = asyncHandler(async (_req: Request, res: Response) => {
    const queue = await terminalService.getQueue();
    res.json(successResponse({ queue }, { total: queue.length }));
  });

  getQueueHistory = asyncHandler(async (req: Request, res: Response) => {
    const { month } = validateSchema(monthQuerySchema, req.query);
    const history = await terminalService.getQueueHistory(month);
    res.json(successResponse(history));
  });

  getEntryFees = asyncHandler(async (req: Request, res: Response) => {
    const { month } = validateSchema(monthQuerySchema, req.query);
    const fees = await terminalService.getEntryFees(month);
    res.json(successResponse(fees));
  });

  // ---------------------------------------------------------------------------
  // Settings
  // ---------------------------------------------------------------------------

  getSettings = asyncHandler(async (_req: Request, res: Response) => {
    const settings = await terminalService.getSettings();
    res.json(successResponse({ settings }));
  });

  updateSettings = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(updateSettingsSchema, req.body);
    const settings = await terminalService.updateSettings(requireUser(req), data);
    res.json(successResponse({ settings }));
  });

  // ---------------------------------------------------------------------------
  // Public screens
  // ---------------------------------------------------------------------------

  getPublicQueue = asyncHandler(async (req: Request, res: Response) => {
    const { route } = validateSchema(publicQueueQuerySchema, req.query);
    const queue = await terminalService.getPublicQueue(route);
    res.json(successResponse(queue));
  });

  getTvDisplay = asyncHandler(async (req: Request, res: Response) => {
    const { route } = validateSchema(publicQueueQuerySchema, req.query);
    const display = await terminalService.getTvDisplay(route);
    res.json(successResponse(display));
  });
}

export const terminalController = new TerminalController();
