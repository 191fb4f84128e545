import { AppError, ErrorCode } from '../types/error.types';

export const TIMEOUT_REASON = 'timeout';

export const timeoutError = (): AppError => new AppError(ErrorCode.PROVISIONING_FAILED, TIMEOUT_REASON, 504);

/**
 * Throw the abort reason if the signal has fired
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (!signal?.aborted) return;
  throw signal.reason instanceof Error ? signal.reason : timeoutError();
}

/**
 * Tie a PostgREST query to a signal so an abort cancels the request
 */
export function abortable<Q extends { abortSignal(signal: AbortSignal): unknown }>(query: Q, signal?: AbortSignal): Q {
  if (signal) query.abortSignal(signal);
  return query;
}
