import { Request, Response, NextFunction } from 'express';
import { AnyZodObject, ZodError, ZodIssue } from 'zod';
import { AppError, ErrorCode } from '../types/error.types';
import { sendError } from '../utils/response-factory';

export interface FieldError {
  field: string;
  message: string;
}

// ['body', 'begin'] -> 'begin'; ['headers', 'x-attached-deposit'] -> 'header x-attached-deposit'
const toFieldError = (issue: ZodIssue): FieldError => {
  const [location, ...rest] = issue.path.map(String);
  const field = rest.join('.');
  return {
    field: location === 'headers' ? `header ${field}` : field || location || 'request',
    message: issue.message,
  };
};

export const toValidationError = (error: ZodError): AppError =>
  new AppError(ErrorCode.VALIDATION_ERROR, 'Validation failed', 400, {
    errors: error.errors.map(toFieldError),
  });

/**
 * Validation middleware factory
 *
 * Checks body, params, query and headers against a route schema. Controllers
 * re-parse with the same schema to get typed values.
 *
 * ```typescript
 * router.post('/:accountId/bookings', requireCaller, validate(createBookingSchema), bookingController.createBooking);
 * ```
 */
export const validate = (schema: AnyZodObject) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const result = await schema.safeParseAsync({
      body: req.body,
      params: req.params,
      query: req.query,
      headers: req.headers,
    });

    if (!result.success) {
      sendError(res, toValidationError(result.error));
      return;
    }
    next();
  };
};
