import { SupabaseClient } from '@supabase/supabase-js';
import { Booking, BookingDraft, BookingRow, BoundaryEntry } from '../types/booking.types';
import { PaginationParams } from '../types/api.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Booking Repository
 *
 * The booking ledger of each resource plus its two boundary indexes
 * (starts by time, ends by time). The ledger and both indexes are only
 * ever written together.
 */
export interface BookingRepository {
  findById(resourceId: string, id: bigint): Promise<Booking | null>;
  /** Entry of the ends index with the smallest time strictly greater than `at`. */
  findNextEndAfter(resourceId: string, at: number): Promise<BoundaryEntry | null>;
  /** Entry of the starts index with the largest time strictly less than `at`. */
  findPrevBeginBefore(resourceId: string, at: number): Promise<BoundaryEntry | null>;
  listByResource(resourceId: string, page: PaginationParams): Promise<Booking[]>;
  /**
   * Allocate the next booking id of the resource and insert the booking
   * with its start and end entries as one atomic write.
   */
  commit(draft: BookingDraft): Promise<Booking>;
  /** Remove the booking and both of its index entries; null if absent. */
  remove(resourceId: string, id: bigint): Promise<Booking | null>;
}

interface BoundaryRow {
  at: number;
  booking_id: string;
}

// Ids and amounts are read as text; PostgREST would render them as JSON numbers
export const BOOKING_COLUMNS = 'resource_id, id::text, begin_at, end_at, consumer_id, price_charged::text, created_at';
const BOUNDARY_COLUMNS = 'at, booking_id::text';

export class SupabaseBookingRepository implements BookingRepository {
  constructor(private client: SupabaseClient) {}

  async findById(resourceId: string, id: bigint): Promise<Booking | null> {
    const { data, error } = await this.client
      .from('bookings')
      .select(BOOKING_COLUMNS)
      .eq('resource_id', resourceId)
      .eq('id', id.toString())
      .single<BookingRow>();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to find booking', { resourceId, id: id.toString(), error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to find booking: ${error.message}`, 500);
    }

    return fromBookingRow(data);
  }

  async findNextEndAfter(resourceId: string, at: number): Promise<BoundaryEntry | null> {
    const { data, error } = await this.client
      .from('booking_ends')
      .select(BOUNDARY_COLUMNS)
      .eq('resource_id', resourceId)
      .gt('at', at)
      .order('at', { ascending: true })
      .limit(1)
      .maybeSingle<BoundaryRow>();

    if (error) {
      logger.error('Failed to search booking ends', { resourceId, at, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to search booking index: ${error.message}`, 500);
    }

    return data ? { at: data.at, bookingId: BigInt(data.booking_id) } : null;
  }

  async findPrevBeginBefore(resourceId: string, at: number): Promise<BoundaryEntry | null> {
    const { data, error } = await this.client
      .from('booking_starts')
      .select(BOUNDARY_COLUMNS)
      .eq('resource_id', resourceId)
      .lt('at', at)
      .order('at', { ascending: false })
      .limit(1)
      .maybeSingle<BoundaryRow>();

    if (error) {
      logger.error('Failed to search booking starts', { resourceId, at, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to search booking index: ${error.message}`, 500);
    }

    return data ? { at: data.at, bookingId: BigInt(data.booking_id) } : null;
  }

  async listByResource(resourceId: string, page: PaginationParams): Promise<Booking[]> {
    const { data, error } = await this.client
      .from('bookings')
      .select(BOOKING_COLUMNS)
      .eq('resource_id', resourceId)
      .order('begin_at', { ascending: true })
      .range(page.offset, page.offset + page.limit - 1)
      .returns<BookingRow[]>();

    if (error) {
      logger.error('Failed to list bookings', { resourceId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to list bookings: ${error.message}`, 500);
    }

    return (data ?? []).map((row) => fromBookingRow(row));
  }

  /**
   * Commit using the commit_booking_atomic database function, which locks
   * the resource row, allocates next_booking_id and inserts the booking
   * and both boundary rows in one transaction. The bookings table carries
   * an exclusion constraint on the interval as a fallback, reported here as
   * a null id.
   */
  async commit(draft: BookingDraft): Promise<Booking> {
    logger.debug('Committing booking atomically', {
      resourceId: draft.resourceId,
      begin: draft.interval.begin,
      end: draft.interval.end,
    });

    const { data: bookingId, error } = await this.client.rpc('commit_booking_atomic', {
      p_resource_id: draft.resourceId,
      p_begin: draft.interval.begin,
      p_end: draft.interval.end,
      p_consumer_id: draft.consumerId,
      p_price: draft.priceCharged.toString(),
    });

    if (error) {
      logger.error('Failed to commit booking', { resourceId: draft.resourceId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to commit booking: ${error.message}`, 500);
    }

    if (typeof bookingId !== 'string') {
      throw new AppError(ErrorCode.BOOKING_COLLISION, 'Interval overlaps an existing booking', 409, {
        begin: draft.interval.begin,
        end: draft.interval.end,
      });
    }

    const booking = await this.findById(draft.resourceId, BigInt(bookingId));
    if (!booking) {
      throw new AppError(ErrorCode.DATABASE_ERROR, 'Booking committed but not found', 500);
    }
    return booking;
  }

  async remove(resourceId: string, id: bigint): Promise<Booking | null> {
    const existing = await this.findById(resourceId, id);
    if (!existing) return null;

    const { error } = await this.client.rpc('remove_booking_atomic', {
      p_resource_id: resourceId,
      p_id: id.toString(),
    });

    if (error) {
      logger.error('Failed to remove booking', { resourceId, id: id.toString(), error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to remove booking: ${error.message}`, 500);
    }

    return existing;
  }
}

export function fromBookingRow(row: BookingRow): Booking {
  return {
    id: BigInt(row.id),
    resourceId: row.resource_id,
    interval: { begin: Number(row.begin_at), end: Number(row.end_at) },
    consumerId: row.consumer_id,
    priceCharged: BigInt(row.price_charged),
    createdAt: new Date(row.created_at),
  };
}
