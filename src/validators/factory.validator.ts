import { z } from 'zod';
import { accountIdSchema, callerHeadersSchema } from './common.validator';
import { resourceInitParamsSchema } from './resource.validator';

/**
 * Factory validation schemas
 */

// Create resource request schema
export const createResourceSchema = z.object({
  headers: callerHeadersSchema,
  body: z.object({
    name: z
      .string({ required_error: 'Name is required' })
      .min(1, 'Name is required')
      .max(32, 'Name must be at most 32 characters'),
    owner_id: accountIdSchema,
    init_params: resourceInitParamsSchema,
  }),
});

// Provisioned name lookup schema
export const getProvisionedNameSchema = z.object({
  params: z.object({
    name: z.string().min(1, 'Name is required'),
  }),
});

// Provisioning attempt lookup schema
export const getAttemptSchema = z.object({
  params: z.object({
    attemptId: z.string().uuid('Invalid attempt ID format'),
  }),
});

// Set owner schema
export const setOwnerSchema = z.object({
  headers: callerHeadersSchema,
  body: z.object({
    owner_id: accountIdSchema,
  }),
});

// Infer TypeScript types from schemas
export type CreateResourceRequest = z.infer<typeof createResourceSchema>;
