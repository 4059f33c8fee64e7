import type { Logger } from './logger.js';

/**
 * OperationContext
 * Per-call options passed as the last argument of every ParcelStore method
 */
export interface OperationContext {
  /**
   * Cancellation signal.
   * Checked before every statement; once aborted, the operation fails with
   * kind "Cancelled" and issues no further statements.
   */
  signal?: AbortSignal;

  /** Logger for this call, overriding the store's own */
  logger?: Logger;
}
