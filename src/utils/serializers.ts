import { PricingPolicy, PricingPolicyDto, PricingPolicyType } from '../types/pricing.types';
import { Resource, ResourceInitParams, ResourceInitParamsDto, ResourceStatus } from '../types/resource.types';
import { Booking, CancellationResult, Quote, RefundQuote } from '../types/booking.types';
import { Account } from '../types/account.types';
import { ProvisioningAttempt } from '../types/provisioning.types';
import { formatAmount, parseAmount } from './amount';

/**
 * Conversions between domain values (bigint amounts, camelCase) and the
 * exchange format (decimal strings, snake_case) used by the HTTP API,
 * events and JSON columns.
 */

export function toPricingDto(policy: PricingPolicy): PricingPolicyDto {
  switch (policy.type) {
    case PricingPolicyType.FLAT_RENT:
      return { type: 'flat_rent', price_per_ms: formatAmount(policy.pricePerMs) };
    case PricingPolicyType.DECAYING_REFUND_RENT:
      return {
        type: 'decaying_refund_rent',
        base_fee: formatAmount(policy.baseFee),
        price_per_ms: formatAmount(policy.pricePerMs),
        refund_window_ms: policy.refundWindowMs,
      };
  }
}

export function fromPricingDto(dto: PricingPolicyDto): PricingPolicy {
  switch (dto.type) {
    case 'flat_rent':
      return { type: PricingPolicyType.FLAT_RENT, pricePerMs: parseAmount(dto.price_per_ms) };
    case 'decaying_refund_rent':
      return {
        type: PricingPolicyType.DECAYING_REFUND_RENT,
        baseFee: parseAmount(dto.base_fee),
        pricePerMs: parseAmount(dto.price_per_ms),
        refundWindowMs: dto.refund_window_ms,
      };
  }
}

export function toInitParamsDto(params: ResourceInitParams): ResourceInitParamsDto {
  return {
    title: params.title,
    description: params.description,
    contact: params.contact,
    coordinates: [params.coordinates[0], params.coordinates[1]],
    min_duration_ms: params.minDurationMs,
    image_urls: [...params.imageUrls],
    tags: [...params.tags],
    pricing: toPricingDto(params.pricing),
  };
}

export function fromInitParamsDto(dto: ResourceInitParamsDto): ResourceInitParams {
  return {
    title: dto.title,
    description: dto.description,
    contact: dto.contact,
    coordinates: [dto.coordinates[0], dto.coordinates[1]],
    minDurationMs: dto.min_duration_ms,
    imageUrls: [...dto.image_urls],
    tags: [...dto.tags],
    pricing: fromPricingDto(dto.pricing),
  };
}

// --- HTTP response bodies ---

export function toResourceResponse(resource: Resource) {
  if (resource.status === ResourceStatus.DEPLOYED) {
    return {
      account_id: resource.accountId,
      status: resource.status,
      deployed_at: resource.deployedAt.toISOString(),
    };
  }
  return {
    account_id: resource.accountId,
    status: resource.status,
    ...toInitParamsDto(resource.params),
    next_booking_id: resource.nextBookingId.toString(),
    deployed_at: resource.deployedAt.toISOString(),
    initialized_at: resource.initializedAt.toISOString(),
  };
}

export function toBookingResponse(booking: Booking) {
  return {
    id: booking.id.toString(),
    resource_id: booking.resourceId,
    begin: booking.interval.begin,
    end: booking.interval.end,
    consumer_id: booking.consumerId,
    price_charged: formatAmount(booking.priceCharged),
    created_at: booking.createdAt.toISOString(),
  };
}

export function toQuoteResponse(quote: Quote) {
  return {
    resource_id: quote.resourceId,
    begin: quote.interval.begin,
    end: quote.interval.end,
    price: formatAmount(quote.price),
  };
}

export function toRefundQuoteResponse(quote: RefundQuote) {
  return {
    booking_id: quote.bookingId.toString(),
    at: quote.at,
    price_charged: formatAmount(quote.priceCharged),
    refund: formatAmount(quote.refund),
  };
}

export function toCancellationResponse(result: CancellationResult) {
  return {
    booking: toBookingResponse(result.booking),
    refunded: formatAmount(result.refunded),
    cancelled_at: result.cancelledAt,
  };
}

export function toAccountResponse(account: Account) {
  return {
    id: account.id,
    balance: formatAmount(account.balance),
    created_at: account.createdAt.toISOString(),
  };
}

export function toAttemptResponse(attempt: ProvisioningAttempt) {
  return {
    id: attempt.id,
    name: attempt.name,
    resource_account_id: attempt.resourceAccountId,
    owner_id: attempt.ownerId,
    creator_id: attempt.creatorId,
    attached_deposit: formatAmount(attempt.attachedDeposit),
    status: attempt.status,
    ...(attempt.failureReason !== undefined && { failure_reason: attempt.failureReason }),
    ...(attempt.refundedAmount !== undefined && { refunded_amount: formatAmount(attempt.refundedAmount) }),
    created_at: attempt.createdAt.toISOString(),
    ...(attempt.settledAt && { settled_at: attempt.settledAt.toISOString() }),
  };
}
