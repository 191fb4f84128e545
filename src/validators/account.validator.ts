import { z } from 'zod';
import { accountIdSchema, amountSchema } from './common.validator';

/**
 * Account validation schemas
 */

// Open account request schema
export const openAccountSchema = z.object({
  body: z.object({
    account_id: accountIdSchema,
    initial_balance: amountSchema.optional(),
  }),
});

// Get account by ID schema
export const getAccountSchema = z.object({
  params: z.object({
    accountId: accountIdSchema,
  }),
});
