import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Async handler wrapper
 *
 * Express 4 does not await handlers; rejected promises go to the error middleware
 *
 * Usage:
 * ```typescript
 * getBooking = asyncHandler(async (req, res) => {
 *   const booking = await this.bookingService.getBooking(resourceId, id);
 *   res.json(createSuccessResponse(toBookingResponse(booking)));
 * });
 * ```
 */
export const asyncHandler = (fn: RequestHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
