import { Router } from 'express';
import { ResourceController } from '../../controllers/resource.controller';
import { BookingController } from '../../controllers/booking.controller';
import { validate } from '../../middleware/validation.middleware';
import { requireCaller } from '../../middleware/caller.middleware';
import {
  cancelBookingSchema,
  createBookingSchema,
  getBookingSchema,
  getResourceSchema,
  initializeResourceSchema,
  listBookingsSchema,
  quoteSchema,
  refundQuoteSchema,
} from '../../validators/resource.validator';

/**
 * Resource and booking routes (v1)
 */
export function createResourceRoutes(
  resourceController: ResourceController,
  bookingController: BookingController
): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/resources/{accountId}/initialize:
   *   post:
   *     summary: Initialize a deployed resource (once)
   *     description: Callable by the resource account itself or its parent account.
   *     tags: [Resources]
   *     parameters:
   *       - $ref: '#/components/parameters/ResourceAccountId'
   *       - $ref: '#/components/parameters/AccountIdHeader'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/ResourceInitParams'
   *     responses:
   *       200:
   *         description: Resource initialized
   *       400:
   *         description: Missing X-Account-Id header or invalid params
   *       403:
   *         description: Caller is neither the resource account nor its parent
   *       404:
   *         description: Resource not deployed
   *       409:
   *         description: Resource already initialized
   */
  router.post(
    '/:accountId/initialize',
    requireCaller,
    validate(initializeResourceSchema),
    resourceController.initializeResource
  );

  /**
   * @swagger
   * /v1/resources/{accountId}:
   *   get:
   *     summary: Get resource metadata
   *     tags: [Resources]
   *     parameters:
   *       - $ref: '#/components/parameters/ResourceAccountId'
   *     responses:
   *       200:
   *         description: Resource retrieved successfully
   *       404:
   *         description: Resource not found
   */
  router.get('/:accountId', validate(getResourceSchema), resourceController.getResource);

  /**
   * @swagger
   * /v1/resources/{accountId}/quote:
   *   get:
   *     summary: Price of an interval without booking it
   *     tags: [Bookings]
   *     parameters:
   *       - $ref: '#/components/parameters/ResourceAccountId'
   *       - in: query
   *         name: begin
   *         required: true
   *         schema:
   *           type: integer
   *       - in: query
   *         name: end
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Price quoted
   *       400:
   *         description: Invalid interval or duration too short
   */
  router.get('/:accountId/quote', validate(quoteSchema), bookingController.getQuote);

  /**
   * @swagger
   * /v1/resources/{accountId}/bookings:
   *   post:
   *     summary: Book the half-open interval [begin, end)
   *     description: The attached deposit must cover the price; any surplus stays with the resource.
   *     tags: [Bookings]
   *     parameters:
   *       - $ref: '#/components/parameters/ResourceAccountId'
   *       - $ref: '#/components/parameters/AccountIdHeader'
   *       - $ref: '#/components/parameters/AttachedDepositHeader'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [begin, end]
   *             properties:
   *               begin:
   *                 type: integer
   *               end:
   *                 type: integer
   *     responses:
   *       201:
   *         description: Booking created
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Booking'
   *       402:
   *         description: Attached deposit does not cover the price
   *       409:
   *         description: Interval overlaps an existing booking
   *   get:
   *     summary: List bookings ordered by start time
   *     tags: [Bookings]
   *     parameters:
   *       - $ref: '#/components/parameters/ResourceAccountId'
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           minimum: 1
   *           maximum: 500
   *       - in: query
   *         name: offset
   *         schema:
   *           type: integer
   *           minimum: 0
   *     responses:
   *       200:
   *         description: Bookings retrieved successfully
   */
  router.post(
    '/:accountId/bookings',
    requireCaller,
    validate(createBookingSchema),
    bookingController.createBooking
  );
  router.get('/:accountId/bookings', validate(listBookingsSchema), bookingController.listBookings);

  /**
   * @swagger
   * /v1/resources/{accountId}/bookings/{bookingId}:
   *   get:
   *     summary: Get booking by ID
   *     tags: [Bookings]
   *     parameters:
   *       - $ref: '#/components/parameters/ResourceAccountId'
   *       - $ref: '#/components/parameters/BookingId'
   *     responses:
   *       200:
   *         description: Booking retrieved successfully
   *       404:
   *         description: Booking not found
   */
  router.get('/:accountId/bookings/:bookingId', validate(getBookingSchema), bookingController.getBooking);

  /**
   * @swagger
   * /v1/resources/{accountId}/bookings/{bookingId}/refund:
   *   get:
   *     summary: Refund a cancellation would pay
   *     tags: [Bookings]
   *     parameters:
   *       - $ref: '#/components/parameters/ResourceAccountId'
   *       - $ref: '#/components/parameters/BookingId'
   *       - in: query
   *         name: at
   *         description: Cancellation time in epoch milliseconds (default now)
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Refund quoted
   */
  router.get(
    '/:accountId/bookings/:bookingId/refund',
    validate(refundQuoteSchema),
    bookingController.getRefundQuote
  );

  /**
   * @swagger
   * /v1/resources/{accountId}/bookings/{bookingId}/cancel:
   *   post:
   *     summary: Cancel a booking before it starts and pay out its refund
   *     tags: [Bookings]
   *     parameters:
   *       - $ref: '#/components/parameters/ResourceAccountId'
   *       - $ref: '#/components/parameters/BookingId'
   *       - $ref: '#/components/parameters/AccountIdHeader'
   *     responses:
   *       200:
   *         description: Booking cancelled
   *       403:
   *         description: Caller is not the consumer of the booking
   *       409:
   *         description: Booking has already started
   */
  router.post(
    '/:accountId/bookings/:bookingId/cancel',
    requireCaller,
    validate(cancelBookingSchema),
    bookingController.cancelBooking
  );

  return router;
}
