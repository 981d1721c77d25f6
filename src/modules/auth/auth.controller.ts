/**
 * =============================================================================
 * AUTH MODULE - CONTROLLER
 * =============================================================================
 *
 * Handles HTTP requests for authentication.
 * Controller only handles request/response - business logic is in service.
 * =============================================================================
 */

import { Request, Response } from 'express';
import { authService } from './auth.service';
import { loginSchema } from './auth.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { requireUser } from '../../shared/middleware/auth.middleware';

class AuthController {
  /**
   * Verify credentials and return an access token
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(loginSchema, req.body);

    const result = await authService.login(data.username, data.password);

    res.status(200).json(successResponse(result));
  });

  /**
   * Revoke the current token
   */
  logout = asyncHandler(async (req: Request, res: Response) => {
    authService.logout(requireUser(req));

    res.status(200).json(successResponse({
      message: 'Logged out successfully'
    }));
  });

  /**
   * Get current user info
   */
  getCurrentUser = asyncHandler(async (req: Request, res: Response) => {
    const user = await authService.getCurrentUser(requireUser(req).userId);

    res.status(200).json(successResponse({ user }));
  });
}

export const authController = new AuthController();
