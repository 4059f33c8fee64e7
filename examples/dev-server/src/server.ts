import Fastify, { type FastifyServerOptions } from 'fastify';
import { errorToLog, type ParcelStore } from '@parcelkeeper/core';
import { toHttpError } from './errors.js';
import { registerHealthRoute } from './routes/health.js';
import { registerParcelRoutes } from './routes/parcels.js';

export interface ServerOptions {
  store: ParcelStore;
  /** Fastify logger setting; off by default */
  logger?: FastifyServerOptions['logger'];
}

export function buildServer(options: ServerOptions) {
  const fastify = Fastify({ logger: options.logger ?? false });

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.status(400).send({
        error: 'InvalidParcel',
        message: error.message,
        details: {},
      });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        details: {},
      });
    }

    const { statusCode, body } = toHttpError(error);
    if (statusCode >= 500) {
      request.log.error({ err: errorToLog(error) }, 'Request failed');
    }
    return reply.status(statusCode).send(body);
  });

  registerHealthRoute(fastify);
  registerParcelRoutes(fastify, options.store);

  return fastify;
}
