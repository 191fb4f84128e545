import { Request, Response, NextFunction } from 'express';
import { AppError, ErrorCode } from '../types/error.types';
import { sendError } from '../utils/response-factory';

/**
 * Rejects calls that do not name their caller in X-Account-Id
 */
export const requireCaller = (req: Request, res: Response, next: NextFunction): void => {
  if (!req.header('x-account-id')) {
    sendError(res, new AppError(ErrorCode.MISSING_CALLER, 'X-Account-Id header is required', 400));
    return;
  }
  next();
};
