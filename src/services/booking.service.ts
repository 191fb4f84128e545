import { BookingRepository } from '../repositories/booking.repository';
import { BookingIndexService } from './booking-index.service';
import { ResourceService } from './resource.service';
import { AccountService } from './account.service';
import { EventPublisher } from './event.service';
import { quotePrice, refundAmount } from './pricing.service';
import { Booking, BookInput, CancellationResult, Quote, RefundQuote, TimeInterval } from '../types/booking.types';
import { InitializedResource } from '../types/resource.types';
import { CallContext } from '../types/account.types';
import { PaginationParams } from '../types/api.types';
import { AppError, ErrorCode } from '../types/error.types';
import { minAmount } from '../utils/amount';
import { CallQueue } from '../utils/call-queue';
import { Clock } from '../utils/clock';
import { logger } from '../config/logger';

/**
 * Booking Service
 *
 * Check-price-charge-commit for bookings, plus quotes and cancellation
 * with refund.
 *
 * Every write to a resource runs through the call queue on the resource's
 * account id, so the collision check and the commit of one call can never
 * interleave with another call on the same resource.
 */
export class BookingService {
  constructor(
    private bookingRepo: BookingRepository,
    private bookingIndex: BookingIndexService,
    private resourceService: ResourceService,
    private accountService: AccountService,
    private events: EventPublisher,
    private callQueue: CallQueue,
    private clock: Clock
  ) {}

  /**
   * Book [begin, end) on a resource
   *
   * All-or-nothing: on any failure the ledger, the index and the id counter
   * are untouched and the attached deposit is returned to the caller.
   * Deposit in excess of the price stays with the resource account.
   */
  async book(ctx: CallContext, input: BookInput): Promise<Booking> {
    logger.info('Creating booking', {
      resourceId: input.resourceId,
      callerId: ctx.callerId,
      begin: input.interval.begin,
      end: input.interval.end,
      attachedDeposit: ctx.attachedDeposit.toString(),
    });

    return this.callQueue.run(input.resourceId, async () => {
      const resource = await this.resourceService.getInitializedResource(input.resourceId);

      return this.accountService.withAttachedDeposit(ctx, resource.accountId, async () => {
        // Steps 1-4: interval, minimum duration, collision, price
        const price = await this.admit(resource, input.interval);

        // Step 5: attached funds must cover the price
        if (ctx.attachedDeposit < price) {
          throw new AppError(
            ErrorCode.INSUFFICIENT_FUNDS,
            `Attached deposit ${ctx.attachedDeposit} does not cover price ${price}`,
            402,
            { required: price.toString(), provided: ctx.attachedDeposit.toString() }
          );
        }

        // Steps 6-7: id allocation and commit are one atomic write
        const booking = await this.bookingRepo.commit({
          resourceId: resource.accountId,
          interval: input.interval,
          consumerId: ctx.callerId,
          priceCharged: price,
        });

        // Step 8
        this.events.publish({
          event: 'booking_creation',
          data: {
            resource_id: booking.resourceId,
            id: booking.id.toString(),
            booker_id: booking.consumerId,
            start: booking.interval.begin,
            end: booking.interval.end,
            price: booking.priceCharged.toString(),
          },
        });

        logger.info('Booking created successfully', {
          resourceId: booking.resourceId,
          bookingId: booking.id.toString(),
          price: price.toString(),
          surplusRetained: (ctx.attachedDeposit - price).toString(),
        });

        return booking;
      });
    });
  }

  /**
   * Price the ledger would charge for [begin, end), without booking it.
   * Applies the same interval and minimum-duration rules as book().
   */
  async quote(resourceId: string, interval: TimeInterval): Promise<Quote> {
    const resource = await this.resourceService.getInitializedResource(resourceId);
    this.validateInterval(resource, interval);
    return { resourceId, interval, price: quotePrice(resource.params.pricing, interval) };
  }

  async getBooking(resourceId: string, id: bigint): Promise<Booking> {
    const booking = await this.bookingRepo.findById(resourceId, id);
    if (!booking) {
      throw new AppError(ErrorCode.BOOKING_NOT_FOUND, `Booking ${id} not found on ${resourceId}`, 404);
    }
    return booking;
  }

  async listBookings(resourceId: string, page: PaginationParams): Promise<Booking[]> {
    await this.resourceService.getResource(resourceId);
    return this.bookingRepo.listByResource(resourceId, page);
  }

  /**
   * Refund the consumer would receive for cancelling at `at` (default: now)
   */
  async quoteRefund(resourceId: string, id: bigint, at?: number): Promise<RefundQuote> {
    const resource = await this.resourceService.getInitializedResource(resourceId);
    const booking = await this.getBooking(resourceId, id);
    const now = at ?? this.clock();

    return {
      bookingId: booking.id,
      at: now,
      priceCharged: booking.priceCharged,
      refund: this.refundFor(resource, booking, now),
    };
  }

  /**
   * Cancel a booking and pay out its refund
   *
   * Business rules:
   * - Only the consumer who made the booking may cancel it
   * - A booking cannot be cancelled once its slot has started
   * - The refund follows the resource's pricing policy, capped at the price charged
   * - The freed interval becomes bookable again
   */
  async cancelBooking(ctx: CallContext, resourceId: string, id: bigint): Promise<CancellationResult> {
    logger.info('Cancelling booking', { resourceId, bookingId: id.toString(), callerId: ctx.callerId });

    return this.callQueue.run(resourceId, async () => {
      const resource = await this.resourceService.getInitializedResource(resourceId);
      const booking = await this.getBooking(resourceId, id);

      if (booking.consumerId !== ctx.callerId) {
        throw new AppError(ErrorCode.UNAUTHORIZED, 'Only the booking consumer can cancel it', 403);
      }

      const now = this.clock();
      if (now >= booking.interval.begin) {
        throw new AppError(ErrorCode.BOOKING_ALREADY_STARTED, 'Cannot cancel a booking that has started', 409, {
          begin: booking.interval.begin,
          now,
        });
      }

      const refunded = this.refundFor(resource, booking, now);
      await this.accountService.transfer(resourceId, booking.consumerId, refunded);

      try {
        await this.bookingRepo.remove(resourceId, id);
      } catch (error) {
        await this.accountService.transfer(booking.consumerId, resourceId, refunded);
        throw error;
      }

      this.events.publish({
        event: 'booking_cancellation',
        data: {
          resource_id: resourceId,
          id: booking.id.toString(),
          booker_id: booking.consumerId,
          refunded: refunded.toString(),
        },
      });

      logger.info('Booking cancelled', { resourceId, bookingId: id.toString(), refunded: refunded.toString() });
      return { booking, refunded, cancelledAt: now };
    });
  }

  private async admit(resource: InitializedResource, interval: TimeInterval): Promise<bigint> {
    this.validateInterval(resource, interval);
    await this.bookingIndex.checkNoCollision(resource.accountId, interval);
    return quotePrice(resource.params.pricing, interval);
  }

  private validateInterval(resource: InitializedResource, interval: TimeInterval): void {
    if (interval.end <= interval.begin) {
      throw new AppError(ErrorCode.INVALID_INTERVAL, 'end must be greater than begin', 400, { ...interval });
    }

    const duration = interval.end - interval.begin;
    if (duration < resource.params.minDurationMs) {
      throw new AppError(
        ErrorCode.DURATION_TOO_SHORT,
        `Duration ${duration}ms is shorter than the minimum of ${resource.params.minDurationMs}ms`,
        400,
        { duration, minDurationMs: resource.params.minDurationMs }
      );
    }
  }

  private refundFor(resource: InitializedResource, booking: Booking, now: number): bigint {
    return minAmount(booking.priceCharged, refundAmount(resource.params.pricing, booking.interval, now));
  }
}
