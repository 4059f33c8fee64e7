// Domain types
export * from './types/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Status lifecycle
export * from './status/index.js';

// Errors
export {
  ParcelStoreError,
  isParcelStoreError,
  noConnection,
  notFound,
  concurrentModification,
  storageFailure,
} from './errors/index.js';
export type { ParcelErrorKind, ParcelErrorDetails, ParcelOperation } from './errors/index.js';

// Validation
export {
  NewParcelSchema,
  ParcelNumberSchema,
  ClientIdSchema,
  AddressSchema,
  MAX_ADDRESS_LENGTH,
  MAX_CREATED_AT_LENGTH,
  parseOrThrow,
} from './validation.js';

// Persistence
export * from './stores/index.js';

// Configuration
export { loadConfig, ConfigSchema, ConfigError } from './config/index.js';
export type { ParcelKeeperConfig } from './config/index.js';

// Utilities
export {
  serializeForLog,
  errorToLog,
  createLogger,
  fromPino,
  withCallTracing,
  throwIfCancelled,
} from './utils/index.js';
export type { CreateLoggerOptions } from './utils/index.js';
