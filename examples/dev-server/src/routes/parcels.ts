/**
 * Parcel routes
 *
 * - POST   /parcels                  add
 * - GET    /parcels/:number          get
 * - GET    /clients/:client/parcels  getByClient
 * - PUT    /parcels/:number/status   setStatus
 * - PUT    /parcels/:number/address  setAddress
 * - DELETE /parcels/:number          delete
 *
 * Store errors propagate to the server's error handler.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { fromPino, type OperationContext, type ParcelStore } from '@parcelkeeper/core';

interface NumberParams {
  number: number;
}

interface ClientParams {
  client: number;
}

interface AddBody {
  client: number;
  status: string;
  address: string;
  createdAt?: string;
}

const NUMBER_PARAMS_SCHEMA = {
  type: 'object',
  required: ['number'],
  properties: {
    number: { type: 'integer', description: 'Parcel number' },
  },
} as const;

const CLIENT_PARAMS_SCHEMA = {
  type: 'object',
  required: ['client'],
  properties: {
    client: { type: 'integer', description: 'Client identifier' },
  },
} as const;

const PARCEL_SCHEMA = {
  type: 'object',
  properties: {
    number: { type: 'integer' },
    client: { type: 'integer' },
    status: { type: 'string' },
    address: { type: 'string' },
    createdAt: { type: 'string' },
  },
} as const;

/**
 * Per-request context: request-scoped logger, and a signal that aborts
 * when the client goes away before the response is written.
 */
function operationContext(request: FastifyRequest, reply: FastifyReply): OperationContext {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('client closed the connection'));
    }
  });
  return { signal: controller.signal, logger: fromPino(request.log) };
}

export function registerParcelRoutes(fastify: FastifyInstance, store: ParcelStore) {
  fastify.post<{ Body: AddBody }>('/parcels', {
    schema: {
      description: 'Register a parcel',
      body: {
        type: 'object',
        required: ['client', 'status', 'address'],
        properties: {
          client: { type: 'integer' },
          status: { type: 'string', description: 'registered, sent or delivered' },
          address: { type: 'string' },
          createdAt: { type: 'string', description: 'Defaults to the current time' },
        },
      },
      response: {
        201: { type: 'object', properties: { number: { type: 'integer' } } },
      },
    },
  }, async (request, reply) => {
    const { client, status, address, createdAt } = request.body;
    const number = await store.add(
      { client, status, address, createdAt: createdAt ?? new Date().toISOString() },
      operationContext(request, reply)
    );
    return reply.code(201).send({ number });
  });

  fastify.get<{ Params: NumberParams }>('/parcels/:number', {
    schema: {
      description: 'Load one parcel',
      params: NUMBER_PARAMS_SCHEMA,
      response: { 200: PARCEL_SCHEMA },
    },
  }, async (request, reply) => {
    return store.get(request.params.number, operationContext(request, reply));
  });

  fastify.get<{ Params: ClientParams }>('/clients/:client/parcels', {
    schema: {
      description: 'List the parcels of a client',
      params: CLIENT_PARAMS_SCHEMA,
      response: {
        200: { type: 'object', properties: { parcels: { type: 'array', items: PARCEL_SCHEMA } } },
      },
    },
  }, async (request, reply) => {
    const parcels = await store.getByClient(request.params.client, operationContext(request, reply));
    return { parcels };
  });

  fastify.put<{ Params: NumberParams; Body: { status: string } }>('/parcels/:number/status', {
    schema: {
      description: 'Advance the status one step',
      params: NUMBER_PARAMS_SCHEMA,
      body: {
        type: 'object',
        required: ['status'],
        properties: { status: { type: 'string' } },
      },
    },
  }, async (request, reply) => {
    await store.setStatus(request.params.number, request.body.status, operationContext(request, reply));
    return reply.code(204).send();
  });

  fastify.put<{ Params: NumberParams; Body: { address: string } }>('/parcels/:number/address', {
    schema: {
      description: 'Change the address of a registered parcel',
      params: NUMBER_PARAMS_SCHEMA,
      body: {
        type: 'object',
        required: ['address'],
        properties: { address: { type: 'string' } },
      },
    },
  }, async (request, reply) => {
    await store.setAddress(request.params.number, request.body.address, operationContext(request, reply));
    return reply.code(204).send();
  });

  fastify.delete<{ Params: NumberParams }>('/parcels/:number', {
    schema: {
      description: 'Delete a registered parcel',
      params: NUMBER_PARAMS_SCHEMA,
    },
  }, async (request, reply) => {
    await store.delete(request.params.number, operationContext(request, reply));
    return reply.code(204).send();
  });
}
