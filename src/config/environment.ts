import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

// Unset and empty (KEY= in .env) both mean "not configured"
const optionalString = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === '' ? undefined : val), schema.optional());

type NodeEnv = 'development' | 'production' | 'test';

/**
 * Whether POST /v1/accounts may open accounts with a balance
 *
 * An explicit setting wins; otherwise funding is on in development and
 * test, off in production.
 */
export function accountFundingEnabled(nodeEnv: NodeEnv, setting?: 'true' | 'false'): boolean {
  if (setting !== undefined) return setting === 'true';
  return nodeEnv !== 'production';
}

// Define environment variable schema with Zod for type-safe validation
const envSchema = z
  .object({
    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Server configuration
    PORT: z.string().default('3000').transform(Number),

    // Storage backend: in-process maps or Supabase tables
    STORAGE_DRIVER: z.enum(['memory', 'supabase']).default('memory'),
    SUPABASE_URL: optionalString(z.string().url('Invalid Supabase URL')),
    SUPABASE_SERVICE_ROLE_KEY: optionalString(z.string().min(1)),

    // Factory configuration
    FACTORY_ACCOUNT_ID: z.string().min(1).default('factory.slots'),
    FACTORY_OWNER_ID: z.string().min(1).default('operator.slots'),
    RESOURCE_STORAGE_COST: z.string().regex(/^\d+$/, 'Must be a non-negative integer').default('1000000'),
    PROVISIONING_REFUND_POLICY: z.enum(['full', 'minus_storage_cost']).default('full'),
    PROVISIONING_TIMEOUT_MS: z.string().default('30000').transform(Number),

    // Sandbox account funding endpoint
    ALLOW_ACCOUNT_FUNDING: optionalString(z.enum(['true', 'false'])),

    // Logging configuration
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // CORS configuration
    ALLOWED_ORIGINS: z.string().default('*'),
  })
  .superRefine((val, ctx) => {
    if (val.STORAGE_DRIVER !== 'supabase') return;
    if (!val.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'SUPABASE_URL is required when STORAGE_DRIVER=supabase',
      });
    }
    if (!val.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY is required when STORAGE_DRIVER=supabase',
      });
    }
  })
  .transform((val) => ({
    ...val,
    ALLOW_ACCOUNT_FUNDING: accountFundingEnabled(val.NODE_ENV, val.ALLOW_ACCOUNT_FUNDING),
  }));

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

export type Environment = typeof env;

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🗄️  Storage driver: ${env.STORAGE_DRIVER}`);
  console.log(`🏭 Factory account: ${env.FACTORY_ACCOUNT_ID}`);
  console.log(`💰 Account funding: ${env.ALLOW_ACCOUNT_FUNDING ? 'enabled' : 'disabled'}`);
}
