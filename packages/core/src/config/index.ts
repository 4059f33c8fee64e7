import { z } from 'zod';

/**
 * Environment configuration for processes that host a parcel store
 */

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ConfigSchema = z.object({
  PARCEL_STORE_DRIVER: z.enum(['sqlite', 'memory']).default('sqlite'),
  PARCEL_DB_PATH: z.string().min(1).default('parcel.db'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
});

export type ParcelKeeperConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly variables: string[]
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ParcelKeeperConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const variables = [...new Set(result.error.issues.map((issue) => issue.path.map(String).join('.')))];
    throw new ConfigError(`Invalid configuration: ${variables.join(', ')}`, variables);
  }
  return result.data;
}
