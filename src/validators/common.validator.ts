import { z } from 'zod';
import { isU128String } from '../utils/amount';
import { isValidAccountId } from '../utils/account-id';

/**
 * Shared validation schemas
 */

// u128 amount as a decimal string
export const amountSchema = z
  .string({ invalid_type_error: 'Amount must be a decimal string' })
  .refine(isU128String, 'Amount must be an unsigned integer below 2^128');

export const accountIdSchema = z
  .string({ required_error: 'Account ID is required' })
  .refine(isValidAccountId, 'Invalid account ID format');

// Epoch milliseconds
export const timestampSchema = z
  .number({
    required_error: 'Timestamp is required',
    invalid_type_error: 'Timestamp must be a number',
  })
  .int('Timestamp must be an integer')
  .refine(Number.isSafeInteger, 'Timestamp is out of range');

// Integer query parameter (query values arrive as strings)
export const integerQuerySchema = z
  .string()
  .regex(/^-?\d+$/, 'Must be an integer')
  .refine((val) => Number.isSafeInteger(Number(val)), 'Integer is out of range');

// Identity and attached funds of the caller
export const callerHeadersSchema = z.object({
  'x-account-id': accountIdSchema,
  'x-attached-deposit': amountSchema.optional(),
});

export const paginationQuerySchema = z.object({
  limit: z
    .string()
    .regex(/^\d+$/, 'limit must be a positive integer')
    .refine((val) => Number(val) >= 1 && Number(val) <= 500, 'limit must be between 1 and 500')
    .optional(),
  offset: z.string().regex(/^\d+$/, 'offset must be a non-negative integer').optional(),
});
