/**
 * Request ID Plugin
 *
 * Assigns a correlation ID to every request:
 * - Accepts inbound X-Request-Id header from clients
 * - Generates a UUID if none provided
 * - Binds requestId to the pino logger for structured logging
 * - Returns X-Request-Id header on every response
 *
 * Call it on the root instance (not through register) so the hooks cover
 * every route.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}

export const MAX_REQUEST_ID_LENGTH = 128;

export function requestIdPlugin(fastify: FastifyInstance): void {
  fastify.decorateRequest('requestId', '');

  fastify.addHook('onRequest', async (request: FastifyRequest) => {
    const inbound = request.headers['x-request-id'];
    request.requestId = typeof inbound === 'string' && inbound.length > 0 && inbound.length <= MAX_REQUEST_ID_LENGTH
      ? inbound
      : randomUUID();
    request.log = request.log.child({ requestId: request.requestId });
  });

  fastify.addHook('onSend', async (request: FastifyRequest, reply: FastifyReply, payload: unknown) => {
    reply.header('X-Request-Id', request.requestId);
    return payload;
  });
}
