/**
 * =============================================================================
 * DEPOSIT MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { depositService } from './deposit.service';
import { walletService } from './wallet.service';
import {
  depositDecisionSchema,
  depositHistoryQuerySchema,
  depositRequestSchema,
  directDepositSchema,
  listWalletsQuerySchema,
  myRequestsQuerySchema,
  searchDriversQuerySchema,
  validateOrCodeQuerySchema,
  walletBalanceQuerySchema
} from './deposit.schema';
import { idParamSchema, validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { requireUser } from '../../shared/middleware/auth.middleware';
import { sendCsv } from '../../shared/utils/csv.utils';
import { LIST_LIMITS } from '../../core/constants';

class DepositController {
  // ---------------------------------------------------------------------------
  // Wallets
  // ---------------------------------------------------------------------------

  listWallets = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(listWalletsQuerySchema, req.query);
    const result = await walletService.listWallets(query);
    res.json(successResponse(result, { total: result.wallets.length, limit: LIST_LIMITS.WALLETS }));
  });

  getWalletBalance = asyncHandler(async (req: Request, res: Response) => {
    const { vehicleId } = validateSchema(walletBalanceQuerySchema, req.query);
    const balance = await walletService.getBalance(vehicleId);
    res.json(successResponse(balance));
  });

  // ---------------------------------------------------------------------------
  // Deposits
  // ---------------------------------------------------------------------------

  createDirectDeposit = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(directDepositSchema, req.body);
    const deposit = await depositService.createDirectDeposit(requireUser(req), data);
    res.status(201).json(successResponse({ deposit }));
  });

  createDepositRequest = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(depositRequestSchema, req.body);
    const deposit = await depositService.createDepositRequest(requireUser(req), data);
    res.status(201).json(successResponse({ deposit }));
  });

  listMyRequests = asyncHandler(async (req: Request, res: Response) => {
    const { status } = validateSchema(myRequestsQuerySchema, req.query);
    const requests = await depositService.listMyRequests(requireUser(req), status);
    res.json(successResponse({ requests }, { total: requests.length }));
  });

  getDeposit = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const deposit = await depositService.getDeposit(requireUser(req), id);
    res.json(successResponse({ deposit }));
  });

  listPending = asyncHandler(async (_req: Request, res: Response) => {
    const result = await depositService.listPending();
    res.json(successResponse(result));
  });

  approveDeposit = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const { notes } = validateSchema(depositDecisionSchema, req.body ?? {});
    const deposit = await depositService.approveDeposit(requireUser(req), id, notes);
    res.json(successResponse({ deposit }));
  });

  rejectDeposit = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const { notes } = validateSchema(depositDecisionSchema, req.body ?? {});
    const deposit = await depositService.rejectDeposit(requireUser(req), id, notes);
    res.json(successResponse({ deposit }));
  });

  /**
   * Month history; ?export=csv downloads the whole month
   */
  getHistory = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(depositHistoryQuerySchema, req.query);
    if (query.export === 'csv') {
      sendCsv(res, await depositService.exportHistoryCsv(query));
      return;
    }
    const history = await depositService.getHistory(query);
    res.json(successResponse(history));
  });

  // ---------------------------------------------------------------------------
  // Form helpers
  // ---------------------------------------------------------------------------

  searchDrivers = asyncHandler(async (req: Request, res: Response) => {
    const { q } = validateSchema(searchDriversQuerySchema, req.query);
    const results = await depositService.searchDrivers(q);
    res.json(successResponse({ results }));
  });

  validateOrCode = asyncHandler(async (req: Request, res: Response) => {
    const { code } = validateSchema(validateOrCodeQuerySchema, req.query);
    const result = await depositService.validateOrCode(code);
    res.json(successResponse(result));
  });
}

export const depositController = new DepositController();
