import { ParcelStoreError, type ParcelErrorDetails, type ParcelOperation } from '../errors/index.js';
import type { OperationContext } from '../interfaces/index.js';

/**
 * Fail with kind "Cancelled" if the caller's signal has been aborted.
 * Stores call this before each statement they issue.
 */
export function throwIfCancelled(
  ctx: OperationContext | undefined,
  operation: ParcelOperation,
  details: Omit<ParcelErrorDetails, 'operation'> = {}
): void {
  const signal = ctx?.signal;
  if (!signal?.aborted) return;

  throw new ParcelStoreError(
    `${operation}: cancelled`,
    'Cancelled',
    { ...details, operation },
    { cause: signal.reason }
  );
}
