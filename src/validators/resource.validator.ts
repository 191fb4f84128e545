import { z } from 'zod';
import {
  accountIdSchema,
  amountSchema,
  callerHeadersSchema,
  integerQuerySchema,
  paginationQuerySchema,
  timestampSchema,
} from './common.validator';

/**
 * Resource and booking validation schemas
 */

const durationSchema = (field: string) =>
  z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .int(`${field} must be an integer`)
    .nonnegative(`${field} must not be negative`)
    .refine(Number.isSafeInteger, `${field} is out of range`);

export const pricingPolicySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('flat_rent'),
    price_per_ms: amountSchema,
  }),
  z.object({
    type: z.literal('decaying_refund_rent'),
    base_fee: amountSchema,
    price_per_ms: amountSchema,
    refund_window_ms: durationSchema('refund_window_ms'),
  }),
]);

export const resourceInitParamsSchema = z.object({
  title: z.string().min(1, 'Title is required').max(255, 'Title must be at most 255 characters'),
  description: z.string().max(5000, 'Description must be at most 5000 characters'),
  contact: z.string().max(255, 'Contact must be at most 255 characters'),
  coordinates: z.tuple([z.number().finite(), z.number().finite()]),
  min_duration_ms: durationSchema('min_duration_ms'),
  image_urls: z.array(z.string().url('Invalid image URL')).max(50),
  tags: z.array(z.string().min(1).max(64)).max(50),
  pricing: pricingPolicySchema,
});

const resourceParams = z.object({
  accountId: accountIdSchema,
});

const bookingParams = resourceParams.extend({
  bookingId: z.string().regex(/^\d+$/, 'Invalid booking ID format'),
});

// Initialize resource schema
export const initializeResourceSchema = z.object({
  params: resourceParams,
  headers: callerHeadersSchema,
  body: resourceInitParamsSchema,
});

// Get resource schema
export const getResourceSchema = z.object({
  params: resourceParams,
});

// Quote schema
export const quoteSchema = z.object({
  params: resourceParams,
  query: z.object({
    begin: integerQuerySchema,
    end: integerQuerySchema,
  }),
});

// Create booking schema
export const createBookingSchema = z.object({
  params: resourceParams,
  headers: callerHeadersSchema,
  body: z.object({
    begin: timestampSchema,
    end: timestampSchema,
  }),
});

// List bookings schema
export const listBookingsSchema = z.object({
  params: resourceParams,
  query: paginationQuerySchema,
});

// Get booking schema
export const getBookingSchema = z.object({
  params: bookingParams,
});

// Refund quote schema
export const refundQuoteSchema = z.object({
  params: bookingParams,
  query: z.object({
    at: integerQuerySchema.optional(),
  }),
});

// Cancel booking schema
export const cancelBookingSchema = z.object({
  params: bookingParams,
  headers: callerHeadersSchema,
});

// Infer TypeScript types from schemas
export type ResourceInitParamsBody = z.infer<typeof resourceInitParamsSchema>;
export type CreateBookingRequest = z.infer<typeof createBookingSchema>;
export type QuoteRequest = z.infer<typeof quoteSchema>;
