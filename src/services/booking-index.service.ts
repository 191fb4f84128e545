import { BookingRepository } from '../repositories/booking.repository';
import { Booking, BoundaryEntry, TimeInterval } from '../types/booking.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Booking Index Service
 *
 * Decides whether [begin, end) collides with a committed booking using two
 * lookups in the ordered boundary indexes instead of a scan:
 *
 * 1. nearest end to the right of `begin`: collides unless that booking
 *    starts at or after `end`
 * 2. nearest start to the left of `end`: collides unless that booking
 *    ends at or before `begin`
 *
 * Intervals are half-open, so touching intervals never collide.
 */
export class BookingIndexService {
  constructor(private bookingRepo: BookingRepository) {}

  async checkNoCollision(resourceId: string, interval: TimeInterval): Promise<void> {
    const { begin, end } = interval;

    const nextEnd = await this.bookingRepo.findNextEndAfter(resourceId, begin);
    const rightNeighbour = await this.resolve(resourceId, nextEnd);
    if (rightNeighbour && rightNeighbour.interval.begin < end) {
      throw this.collision(resourceId, interval, rightNeighbour);
    }

    const prevBegin = await this.bookingRepo.findPrevBeginBefore(resourceId, end);
    const leftNeighbour = await this.resolve(resourceId, prevBegin);
    if (leftNeighbour && leftNeighbour.interval.end > begin) {
      throw this.collision(resourceId, interval, leftNeighbour);
    }
  }

  private async resolve(resourceId: string, entry: BoundaryEntry | null): Promise<Booking | null> {
    if (!entry) return null;
    const booking = await this.bookingRepo.findById(resourceId, entry.bookingId);
    if (!booking) {
      logger.error('Booking index entry without ledger record', {
        resourceId,
        at: entry.at,
        bookingId: entry.bookingId.toString(),
      });
      throw new AppError(ErrorCode.INTERNAL_ERROR, 'Booking index is inconsistent with the ledger', 500);
    }
    return booking;
  }

  private collision(resourceId: string, interval: TimeInterval, existing: Booking): AppError {
    logger.debug('Booking collision', {
      resourceId,
      requested: interval,
      existingId: existing.id.toString(),
      existing: existing.interval,
    });

    return new AppError(ErrorCode.BOOKING_COLLISION, 'Interval overlaps an existing booking', 409, {
      begin: interval.begin,
      end: interval.end,
      conflictingBookingId: existing.id.toString(),
    });
  }
}
