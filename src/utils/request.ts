import { Request } from 'express';
import { AnyZodObject, z } from 'zod';
import { CallContext } from '../types/account.types';

/**
 * Typed view of a request that already passed `validate(schema)`
 */
export function parseRequest<S extends AnyZodObject>(schema: S, req: Request): z.infer<S> {
  return schema.parse({
    body: req.body,
    params: req.params,
    query: req.query,
    headers: req.headers,
  });
}

export function toCallContext(headers: { 'x-account-id': string; 'x-attached-deposit'?: string | undefined }): CallContext {
  return {
    callerId: headers['x-account-id'],
    attachedDeposit: BigInt(headers['x-attached-deposit'] ?? '0'),
  };
}
