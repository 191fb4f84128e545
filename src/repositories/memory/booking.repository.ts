import { BookingRepository } from '../booking.repository';
import { Booking, BookingDraft, BoundaryEntry } from '../../types/booking.types';
import { PaginationParams } from '../../types/api.types';
import { ResourceStatus } from '../../types/resource.types';
import { AppError, ErrorCode } from '../../types/error.types';
import { MemoryStore } from './memory-store';

const copyBooking = (booking: Booking): Booking => ({ ...booking, interval: { ...booking.interval } });

const toEntry = (entry: [number, bigint] | null): BoundaryEntry | null =>
  entry ? { at: entry[0], bookingId: entry[1] } : null;

export class InMemoryBookingRepository implements BookingRepository {
  constructor(private store: MemoryStore) {}

  async findById(resourceId: string, id: bigint): Promise<Booking | null> {
    const booking = this.store.bookingsOf(resourceId).byId.get(id);
    return booking ? copyBooking(booking) : null;
  }

  async findNextEndAfter(resourceId: string, at: number): Promise<BoundaryEntry | null> {
    return toEntry(this.store.bookingsOf(resourceId).endsByTime.higherEntry(at));
  }

  async findPrevBeginBefore(resourceId: string, at: number): Promise<BoundaryEntry | null> {
    return toEntry(this.store.bookingsOf(resourceId).startsByTime.lowerEntry(at));
  }

  async listByResource(resourceId: string, page: PaginationParams): Promise<Booking[]> {
    const collection = this.store.bookingsOf(resourceId);
    const ordered: Booking[] = [];
    for (const [, id] of collection.startsByTime.entries()) {
      const booking = collection.byId.get(id);
      if (booking) ordered.push(copyBooking(booking));
    }
    return ordered.slice(page.offset, page.offset + page.limit);
  }

  async commit(draft: BookingDraft): Promise<Booking> {
    const resource = this.store.resources.get(draft.resourceId);
    if (!resource || resource.status !== ResourceStatus.INITIALIZED) {
      throw new AppError(ErrorCode.NOT_INITIALIZED, `Resource ${draft.resourceId} is not initialized`, 409);
    }

    const collection = this.store.bookingsOf(draft.resourceId);
    const { begin, end } = draft.interval;
    // Boundaries of non-overlapping intervals are unique; a clash here means the caller skipped the collision check
    if (collection.startsByTime.has(begin) || collection.endsByTime.has(end)) {
      throw new AppError(ErrorCode.BOOKING_COLLISION, 'Interval overlaps an existing booking', 409, { begin, end });
    }

    const id = resource.nextBookingId;
    resource.nextBookingId = id + 1n;

    const booking: Booking = {
      id,
      resourceId: draft.resourceId,
      interval: { begin, end },
      consumerId: draft.consumerId,
      priceCharged: draft.priceCharged,
      createdAt: new Date(),
    };
    collection.byId.set(id, booking);
    collection.startsByTime.set(begin, id);
    collection.endsByTime.set(end, id);

    return copyBooking(booking);
  }

  async remove(resourceId: string, id: bigint): Promise<Booking | null> {
    const collection = this.store.bookingsOf(resourceId);
    const booking = collection.byId.get(id);
    if (!booking) return null;

    collection.byId.delete(id);
    collection.startsByTime.delete(booking.interval.begin);
    collection.endsByTime.delete(booking.interval.end);
    return copyBooking(booking);
  }
}
