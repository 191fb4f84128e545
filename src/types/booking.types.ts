/**
 * Booking domain types
 */

// Half-open [begin, end) in epoch milliseconds
export interface TimeInterval {
  begin: number;
  end: number;
}

export interface Booking {
  id: bigint;
  resourceId: string;
  interval: TimeInterval;
  consumerId: string;
  priceCharged: bigint;
  createdAt: Date;
}

// Everything except the id, which the ledger allocates at commit time
export interface BookingDraft {
  resourceId: string;
  interval: TimeInterval;
  consumerId: string;
  priceCharged: bigint;
}

// One entry of the starts-by-time or ends-by-time index
export interface BoundaryEntry {
  at: number;
  bookingId: bigint;
}

export interface BookInput {
  resourceId: string;
  interval: TimeInterval;
}

export interface Quote {
  resourceId: string;
  interval: TimeInterval;
  price: bigint;
}

export interface RefundQuote {
  bookingId: bigint;
  at: number;
  priceCharged: bigint;
  refund: bigint;
}

export interface CancellationResult {
  booking: Booking;
  refunded: bigint;
  cancelledAt: number;
}

// Database row type (snake_case from PostgreSQL)
export interface BookingRow {
  resource_id: string;
  // Selected as text to keep full precision
  id: string;
  begin_at: number;
  end_at: number;
  consumer_id: string;
  price_charged: string;
  created_at: string;
}
