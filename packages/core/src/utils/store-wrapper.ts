/**
 * Store Wrappers
 * Higher-order functions for enhancing parcel stores with cross-cutting concerns
 */

import type { ParcelOperation } from '../errors/index.js';
import type { Logger, OperationContext, ParcelStore } from '../interfaces/index.js';
import { errorToLog } from './logging.js';

/**
 * Wrap a ParcelStore so that every call is logged with timing information.
 * The same logger is handed to the store through the operation context
 * unless the caller already supplied one.
 *
 * Usage:
 * ```typescript
 * const store = new SqliteParcelStore(createDatabase(':memory:'));
 * const traced = withCallTracing(store, logger);
 *
 * // debug: setStatus started
 * // info:  setStatus completed in 2ms
 * ```
 */
export function withCallTracing(store: ParcelStore, logger: Logger): ParcelStore {
  async function traced<T>(
    operation: ParcelOperation,
    ctx: OperationContext | undefined,
    call: (ctx: OperationContext) => Promise<T>
  ): Promise<T> {
    const startTime = Date.now();
    const callCtx: OperationContext = { ...ctx, logger: ctx?.logger ?? logger };

    logger.debug(`${operation} started`, { operation });
    try {
      const result = await call(callCtx);
      const duration = Date.now() - startTime;
      logger.info(`${operation} completed in ${duration}ms`, {
        operation,
        duration,
        status: 'success',
      });
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      logger.error(`${operation} failed after ${duration}ms`, {
        operation,
        duration,
        error: errorToLog(error),
      });
      throw error;
    }
  }

  return {
    add: (parcel, ctx) => traced('add', ctx, (c) => store.add(parcel, c)),
    get: (number, ctx) => traced('get', ctx, (c) => store.get(number, c)),
    getByClient: (client, ctx) => traced('getByClient', ctx, (c) => store.getByClient(client, c)),
    setStatus: (number, status, ctx) => traced('setStatus', ctx, (c) => store.setStatus(number, status, c)),
    setAddress: (number, address, ctx) => traced('setAddress', ctx, (c) => store.setAddress(number, address, c)),
    delete: (number, ctx) => traced('delete', ctx, (c) => store.delete(number, c)),
  };
}
