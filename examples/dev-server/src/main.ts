import {
  ConfigError,
  InMemoryParcelStore,
  createLogger,
  errorToLog,
  loadConfig,
  withCallTracing,
  type Logger,
  type ParcelKeeperConfig,
} from '@parcelkeeper/core';
import { SqliteParcelStore } from '@parcelkeeper/store-sqlite';
import { buildServer } from './server.js';

function openStore(config: ParcelKeeperConfig, logger: Logger) {
  if (config.PARCEL_STORE_DRIVER === 'memory') {
    return new InMemoryParcelStore(undefined, { logger });
  }
  return SqliteParcelStore.open(config.PARCEL_DB_PATH, { logger });
}

const start = async () => {
  let config: ParcelKeeperConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({ level: config.LOG_LEVEL, bindings: { component: 'parcel-store' } });
  const store = openStore(config, logger);
  const fastify = buildServer({
    store: withCallTracing(store, logger),
    logger: { level: config.LOG_LEVEL },
  });

  const shutdown = async () => {
    await fastify.close();
    store.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error('Shutdown failed', { error: errorToLog(err) });
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await fastify.listen({ port: config.PORT, host: config.HOST });
  } catch (err) {
    logger.error('Failed to start', { error: errorToLog(err) });
    store.close();
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
