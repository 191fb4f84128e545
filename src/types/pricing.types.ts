/**
 * Pricing policy types
 *
 * A closed union: every consumer switches over `type` exhaustively.
 * Amounts are u128-range bigints; durations are integer milliseconds.
 */

export enum PricingPolicyType {
  FLAT_RENT = 'flat_rent',
  DECAYING_REFUND_RENT = 'decaying_refund_rent',
}

// price = duration * pricePerMs; refund = price
export interface FlatRent {
  type: PricingPolicyType.FLAT_RENT;
  pricePerMs: bigint;
}

// price = baseFee + duration * pricePerMs; refund decays over refundWindowMs before begin
export interface DecayingRefundRent {
  type: PricingPolicyType.DECAYING_REFUND_RENT;
  baseFee: bigint;
  pricePerMs: bigint;
  refundWindowMs: number;
}

export type PricingPolicy = FlatRent | DecayingRefundRent;

// Wire shape (snake_case, decimal-string amounts)
export type PricingPolicyDto =
  | { type: 'flat_rent'; price_per_ms: string }
  | { type: 'decaying_refund_rent'; base_fee: string; price_per_ms: string; refund_window_ms: number };
