import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode } from '../types/error.types';
import { sendError } from '../utils/response-factory';
import { toValidationError } from './validation.middleware';
import { logger } from '../config/logger';

const isMalformedJson = (err: Error): boolean => err instanceof SyntaxError && 'body' in err;

const toAppError = (err: Error): AppError => {
  if (err instanceof AppError) return err;
  if (err instanceof ZodError) return toValidationError(err);
  if (isMalformedJson(err)) {
    return new AppError(ErrorCode.VALIDATION_ERROR, 'Malformed JSON body', 400);
  }
  // Unknown errors never expose internals
  return new AppError(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', 500);
};

/**
 * Global error handling middleware
 *
 * Business rejections (4xx) log at warn with the caller; anything that
 * reaches 500 logs at error with the original stack.
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const appError = toAppError(err);
  const context = {
    code: appError.code,
    error: err.message,
    path: req.path,
    method: req.method,
    callerId: req.header('x-account-id'),
  };

  if (appError.statusCode >= 500) {
    logger.error('Request failed', { ...context, stack: err.stack });
  } else {
    logger.warn('Request rejected', context);
  }

  sendError(res, appError);
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  sendError(res, new AppError(ErrorCode.NOT_FOUND, `Route ${req.method} ${req.path} not found`, 404));
};
