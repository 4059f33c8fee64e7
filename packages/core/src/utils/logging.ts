/**
 * Logging Utilities - Safe object serialization for logging
 */

import { pino, type BaseLogger, type LevelWithSilent, type Logger as PinoLogger } from 'pino';
import { ParcelStoreError } from '../errors/index.js';
import type { Logger } from '../interfaces/index.js';

/**
 * Safely serialize objects for logging
 * Prevents circular reference errors and safely handles various object types.
 */
export function serializeForLog(obj: unknown): unknown {
  try {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj !== 'object') return obj;
    return JSON.parse(JSON.stringify(obj));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Create a safe log object from an error
 * ParcelStoreErrors also carry their kind, details and the cause's message.
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof ParcelStoreError) {
    const entry: Record<string, unknown> = {
      type: error.name,
      kind: error.kind,
      message: error.message,
      details: { ...error.details },
    };
    if (error.cause !== undefined) {
      entry.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    }
    return entry;
  }

  if (error instanceof Error) {
    return {
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'object' && error !== null) {
    const serialized = serializeForLog(error);
    return typeof serialized === 'object' && serialized !== null
      ? { ...serialized }
      : { type: 'object', message: String(serialized) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}

export interface CreateLoggerOptions {
  /** pino level, default "info" */
  level?: LevelWithSilent;
  /** Bound to every entry, e.g. { service: "parcel-store" } */
  bindings?: Record<string, unknown>;
  /** Use an existing pino instance instead of creating one */
  instance?: PinoLogger;
}

/**
 * Adapt a pino logger (or a Fastify request logger) to the Logger interface.
 * pino takes the merge object first and the message second.
 */
export function fromPino(base: BaseLogger): Logger {
  return {
    debug: (message, meta) => base.debug(meta ?? {}, message),
    info: (message, meta) => base.info(meta ?? {}, message),
    warn: (message, meta) => base.warn(meta ?? {}, message),
    error: (message, meta) => base.error(meta ?? {}, message),
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const root = options.instance ?? pino({ level: options.level ?? 'info' });
  return fromPino(options.bindings ? root.child(options.bindings) : root);
}
