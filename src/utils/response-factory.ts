import { Response } from 'express';
import { ApiSuccessResponse, ApiErrorResponse } from '../types/api.types';
import { AppError, ErrorCode } from '../types/error.types';

/**
 * Wrap a payload in the `{ data, message? }` envelope
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  return message ? { data, message } : { data };
}

export function createErrorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return { error: details ? { code, message, details } : { code, message } };
}

/** Error envelope carrying an AppError's code, message and details */
export function toErrorResponse(error: AppError): ApiErrorResponse {
  return createErrorResponse(error.code, error.message, error.details);
}

/**
 * Reject a request before it reaches a controller
 */
export function sendError(res: Response, error: AppError): void {
  res.status(error.statusCode).json(toErrorResponse(error));
}
