import { PricingPolicy, PricingPolicyType } from '../types/pricing.types';
import { TimeInterval } from '../types/booking.types';
import { checkedAdd, checkedDiv, checkedMul, checkedSub, minAmount } from '../utils/amount';

/**
 * Pricing and refund calculators
 *
 * Pure functions over the closed PricingPolicy union. Integer arithmetic
 * only; every step is range-checked and throws ARITHMETIC_OVERFLOW rather
 * than wrapping.
 */

// Fixed-point scale of the refund factor: 1000 = full refund
export const REFUND_PRECISION = 1000n;

const durationOf = (interval: TimeInterval): bigint => BigInt(interval.end) - BigInt(interval.begin);

// floor(amount * factor / PRECISION) without forming the full product
const scaleByFactor = (amount: bigint, factor: bigint): bigint => {
  const whole = amount / REFUND_PRECISION;
  const remainder = amount % REFUND_PRECISION;
  return checkedAdd(checkedMul(whole, factor), (remainder * factor) / REFUND_PRECISION);
};

export function quotePrice(policy: PricingPolicy, interval: TimeInterval): bigint {
  const rent = checkedMul(durationOf(interval), policy.pricePerMs);
  switch (policy.type) {
    case PricingPolicyType.FLAT_RENT:
      return rent;
    case PricingPolicyType.DECAYING_REFUND_RENT:
      return checkedAdd(policy.baseFee, rent);
  }
}

/**
 * Refund factor in units of REFUND_PRECISION for a cancellation `distance`
 * milliseconds before the booking starts.
 *
 * Quadratic in progress through the window: with p = window - distance,
 * factor = PRECISION * (window² - p²) / window². Full at the window edge,
 * falling to zero at the start of the booking.
 */
export function refundFactor(distance: bigint, window: bigint): bigint {
  if (distance <= 0n) return 0n;
  if (distance >= window) return REFUND_PRECISION;

  const progress = window - distance;
  const squaredWindow = checkedMul(window, window);
  const squaredProgress = checkedMul(progress, progress);
  return checkedDiv(checkedMul(REFUND_PRECISION, checkedSub(squaredWindow, squaredProgress)), squaredWindow);
}

/**
 * Amount refunded when the booking over `interval` is cancelled at `now`.
 * Never exceeds quotePrice for the same interval.
 */
export function refundAmount(policy: PricingPolicy, interval: TimeInterval, now: number): bigint {
  const price = quotePrice(policy, interval);
  switch (policy.type) {
    case PricingPolicyType.FLAT_RENT:
      return price;
    case PricingPolicyType.DECAYING_REFUND_RENT: {
      if (now >= interval.begin) return 0n;
      const factor = refundFactor(BigInt(interval.begin) - BigInt(now), BigInt(policy.refundWindowMs));
      return minAmount(price, scaleByFactor(price, factor));
    }
  }
}
