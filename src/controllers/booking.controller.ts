import { Request, Response } from 'express';
import { BookingService } from '../services/booking.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest, toCallContext } from '../utils/request';
import {
  toBookingResponse,
  toCancellationResponse,
  toQuoteResponse,
  toRefundQuoteResponse,
} from '../utils/serializers';
import {
  cancelBookingSchema,
  createBookingSchema,
  getBookingSchema,
  listBookingsSchema,
  quoteSchema,
  refundQuoteSchema,
} from '../validators/resource.validator';

const DEFAULT_PAGE_SIZE = 100;

/**
 * Booking Controller
 *
 * HTTP request handlers for quotes, bookings and cancellations
 */
export class BookingController {
  constructor(private bookingService: BookingService) {}

  /**
   * GET /v1/resources/:accountId/quote
   * Price of an interval without booking it
   */
  getQuote = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = parseRequest(quoteSchema, req);

    const quote = await this.bookingService.quote(params.accountId, {
      begin: Number(query.begin),
      end: Number(query.end),
    });

    res.status(200).json(createSuccessResponse(toQuoteResponse(quote)));
  });

  /**
   * POST /v1/resources/:accountId/bookings
   * Book an interval, paying with the attached deposit
   */
  createBooking = asyncHandler(async (req: Request, res: Response) => {
    const { params, headers, body } = parseRequest(createBookingSchema, req);

    const booking = await this.bookingService.book(toCallContext(headers), {
      resourceId: params.accountId,
      interval: { begin: body.begin, end: body.end },
    });

    res.status(201).json(createSuccessResponse(toBookingResponse(booking)));
  });

  /**
   * GET /v1/resources/:accountId/bookings
   * List bookings ordered by start time
   */
  listBookings = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = parseRequest(listBookingsSchema, req);

    const bookings = await this.bookingService.listBookings(params.accountId, {
      limit: query.limit ? Number(query.limit) : DEFAULT_PAGE_SIZE,
      offset: query.offset ? Number(query.offset) : 0,
    });

    res.status(200).json(createSuccessResponse(bookings.map(toBookingResponse)));
  });

  /**
   * GET /v1/resources/:accountId/bookings/:bookingId
   * Get booking by ID
   */
  getBooking = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(getBookingSchema, req);

    const booking = await this.bookingService.getBooking(params.accountId, BigInt(params.bookingId));

    res.status(200).json(createSuccessResponse(toBookingResponse(booking)));
  });

  /**
   * GET /v1/resources/:accountId/bookings/:bookingId/refund
   * Refund a cancellation would pay at a given time (default: now)
   */
  getRefundQuote = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = parseRequest(refundQuoteSchema, req);

    const quote = await this.bookingService.quoteRefund(
      params.accountId,
      BigInt(params.bookingId),
      query.at !== undefined ? Number(query.at) : undefined
    );

    res.status(200).json(createSuccessResponse(toRefundQuoteResponse(quote)));
  });

  /**
   * POST /v1/resources/:accountId/bookings/:bookingId/cancel
   * Cancel a booking and pay out its refund
   */
  cancelBooking = asyncHandler(async (req: Request, res: Response) => {
    const { params, headers } = parseRequest(cancelBookingSchema, req);

    const result = await this.bookingService.cancelBooking(
      toCallContext(headers),
      params.accountId,
      BigInt(params.bookingId)
    );

    res.status(200).json(createSuccessResponse(toCancellationResponse(result)));
  });
}
