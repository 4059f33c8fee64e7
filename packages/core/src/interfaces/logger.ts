/**
 * Logger interface
 * Minimal structured logger accepted by stores and wrappers.
 * `createLogger` adapts pino to it; `console` satisfies it too.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
