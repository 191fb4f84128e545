import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

const amount = (description: string) => ({
  type: 'string',
  pattern: '^\\d+$',
  description: `${description} (decimal string, u128 range)`,
});

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Slot Booking API',
      version: '1.0.0',
      description: `
Time-slot booking for shared resources, plus a factory that provisions new resources.

## Calls
- The caller is named by the \`X-Account-Id\` header
- Funds are attached with the \`X-Attached-Deposit\` header (decimal string, default 0)
- A failed call returns its attached deposit to the caller

## Booking guarantees
- Bookings are half-open intervals \`[begin, end)\` in epoch milliseconds
- No two bookings on a resource overlap; adjacent bookings are allowed
- Booking ids are assigned sequentially from 1 and never reused
- Calls on one resource run one at a time, each to completion

## Provisioning
1. \`POST /v1/factory/resources\` returns a **PENDING** attempt (202)
2. The factory creates, funds, deploys and initializes \`<name>.${env.FACTORY_ACCOUNT_ID}\`
3. The attempt becomes **CONFIRMED**, or **FAILED** with the creator refunded
      `.trim(),
      contact: {
        name: 'API Support',
      },
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      {
        name: 'Resources',
        description: 'Resource initialization and metadata',
      },
      {
        name: 'Bookings',
        description: 'Quotes, bookings and cancellations',
      },
      {
        name: 'Factory',
        description: 'Resource provisioning and factory ownership',
      },
      {
        name: 'Accounts',
        description: 'Platform accounts and balances',
      },
    ],
    components: {
      parameters: {
        ResourceAccountId: {
          in: 'path',
          name: 'accountId',
          required: true,
          schema: { type: 'string' },
          description: 'Account id of the resource',
        },
        BookingId: {
          in: 'path',
          name: 'bookingId',
          required: true,
          schema: { type: 'string', pattern: '^\\d+$' },
        },
        AccountIdHeader: {
          in: 'header',
          name: 'X-Account-Id',
          required: true,
          schema: { type: 'string' },
          description: 'Calling account',
        },
        AttachedDepositHeader: {
          in: 'header',
          name: 'X-Attached-Deposit',
          required: false,
          schema: { type: 'string', pattern: '^\\d+$', default: '0' },
          description: 'Funds attached to the call',
        },
      },
      schemas: {
        PricingPolicy: {
          oneOf: [
            {
              type: 'object',
              required: ['type', 'price_per_ms'],
              properties: {
                type: { type: 'string', enum: ['flat_rent'] },
                price_per_ms: amount('Price per millisecond'),
              },
            },
            {
              type: 'object',
              required: ['type', 'base_fee', 'price_per_ms', 'refund_window_ms'],
              properties: {
                type: { type: 'string', enum: ['decaying_refund_rent'] },
                base_fee: amount('Fixed fee per booking'),
                price_per_ms: amount('Price per millisecond'),
                refund_window_ms: {
                  type: 'integer',
                  minimum: 0,
                  description: 'How long before begin the refund starts to decay',
                },
              },
            },
          ],
        },
        ResourceInitParams: {
          type: 'object',
          required: ['title', 'description', 'contact', 'coordinates', 'min_duration_ms', 'image_urls', 'tags', 'pricing'],
          properties: {
            title: { type: 'string' },
            description: { type: 'string' },
            contact: { type: 'string' },
            coordinates: {
              type: 'array',
              items: { type: 'number' },
              minItems: 2,
              maxItems: 2,
            },
            min_duration_ms: { type: 'integer', minimum: 0 },
            image_urls: { type: 'array', items: { type: 'string', format: 'uri' } },
            tags: { type: 'array', items: { type: 'string' } },
            pricing: { $ref: '#/components/schemas/PricingPolicy' },
          },
        },
        Booking: {
          type: 'object',
          properties: {
            id: { type: 'string', description: 'Sequential booking id' },
            resource_id: { type: 'string' },
            begin: { type: 'integer' },
            end: { type: 'integer' },
            consumer_id: { type: 'string' },
            price_charged: amount('Price charged'),
            created_at: { type: 'string', format: 'date-time' },
          },
        },
        ProvisioningAttempt: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            name: { type: 'string' },
            resource_account_id: { type: 'string' },
            owner_id: { type: 'string' },
            creator_id: { type: 'string' },
            attached_deposit: amount('Deposit attached to create_resource'),
            status: { type: 'string', enum: ['PENDING', 'CONFIRMED', 'FAILED'] },
            failure_reason: { type: 'string' },
            refunded_amount: amount('Amount returned to the creator'),
            created_at: { type: 'string', format: 'date-time' },
            settled_at: { type: 'string', format: 'date-time' },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: {
                  type: 'string',
                  description: 'Error code',
                },
                message: {
                  type: 'string',
                  description: 'Human-readable error message',
                },
                details: {
                  type: 'object',
                  description: 'Additional error details',
                },
              },
            },
          },
        },
      },
    },
  },
  // Route files with JSDoc comments (.ts from source, .js once built)
  apis: [path.join(__dirname, '../routes/**/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
