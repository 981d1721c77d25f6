/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Turns anything thrown by a route into the error envelope.
 *   AppError          its own status, code and details
 *   ZodError          400 VALIDATION_ERROR with per-field messages
 *   malformed JSON    400 VALIDATION_ERROR
 *   anything else     500 INTERNAL_ERROR, message hidden in production
 *
 * Stack traces stay in the server log.
 * =============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { logger } from '../services/logger.service';
import { AppError, ValidationError } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { errorResponse } from '../types/api.types';
import { currentUserId } from './auth.middleware';
import { config } from '../../config/environment';

/** express.json() marks unparsable bodies with type 'entity.parse.failed' */
function isMalformedBody(error: Error): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

function toAppError(error: Error): AppError | null {
  if (error instanceof AppError) return error;
  if (error instanceof ZodError) return ValidationError.fromZodError(error);
  if (isMalformedBody(error)) return new ValidationError('Request body is not valid JSON');
  return null;
}

/**
 * Registered last
 */
export function errorHandler(error: Error, req: Request, res: Response, _next: NextFunction): void {
  const appError = toAppError(error);
  const context = {
    requestId: req.headers['x-request-id'],
    method: req.method,
    path: req.path,
    userId: currentUserId(req)
  };

  if (appError) {
    logger.log(appError.statusCode >= 500 ? 'error' : 'warn', appError.message, {
      ...context,
      code: appError.code
    });
    res.status(appError.statusCode).json(errorResponse(appError.code, appError.message, appError.details));
    return;
  }

  logger.error('Unhandled request error', { ...context, error: error.message, stack: error.stack });

  res.status(HTTP_STATUS.INTERNAL_ERROR).json(
    errorResponse(
      ErrorCode.INTERNAL_ERROR,
      config.isProduction ? 'An unexpected error occurred' : error.message
    )
  );
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json(errorResponse(ErrorCode.NOT_FOUND, `Cannot ${req.method} ${req.path}`));
}
