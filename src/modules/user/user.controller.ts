/**
 * =============================================================================
 * USER MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { userService } from './user.service';
import { createUserSchema, listUsersQuerySchema, updateUserSchema } from './user.schema';
import { idParamSchema, validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { requireUser } from '../../shared/middleware/auth.middleware';

class UserController {
  listUsers = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(listUsersQuerySchema, req.query);
    const result = await userService.listUsers(requireUser(req), query);
    res.json(successResponse(result, { total: result.users.length }));
  });

  getUser = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const user = await userService.getUser(requireUser(req), id);
    res.json(successResponse({ user }));
  });

  createUser = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(createUserSchema, req.body);
    const user = await userService.createUser(requireUser(req), data);
    res.status(201).json(successResponse({ user }));
  });

  updateUser = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const data = validateSchema(updateUserSchema, req.body);
    const user = await userService.updateUser(requireUser(req), id, data);
    res.json(successResponse({ user }));
  });

  deleteUser = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    await userService.deleteUser(requireUser(req), id);
    res.json(successResponse({ message: 'User deleted' }));
  });
}

export const userController = new UserController();
