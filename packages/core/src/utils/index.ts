/**
 * Utility functions for stores
 */

export { serializeForLog, errorToLog, createLogger, fromPino } from './logging.js';
export type { CreateLoggerOptions } from './logging.js';
export { withCallTracing } from './store-wrapper.js';
export { throwIfCancelled } from './cancellation.js';
