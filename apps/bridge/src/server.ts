/**
 * HTTP control API
 * Fastify server exposing the bridge contract under /api
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { BridgeController } from './controller/bridge-controller.js';
import type { LoggerOptions } from './lib/logger.js';
import { requestIdPlugin } from './plugins/request-id.js';
import { bridgeRoutes } from './routes/bridge.routes.js';
import { devicesRoutes } from './routes/devices.routes.js';
import { scenesRoutes } from './routes/scenes.routes.js';

export interface ServerOptions {
  /** pino options for request logs; false disables them. */
  logger: LoggerOptions | false;
  corsOrigin: string;
}

export async function buildServer(controller: BridgeController, options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger });

  await fastify.register(cors, {
    origin: options.corsOrigin === '*' ? true : options.corsOrigin.split(',').map(o => o.trim()),
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
  });

  requestIdPlugin(fastify);

  // Centralized error handler: consistent envelope, no stack traces.
  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    const requestId = request.requestId;
    if (error.validation) {
      return reply.status(400).send({
        error: { code: 'VALIDATION_ERROR', message: error.message, requestId },
      });
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        error: { code: error.code ?? 'BAD_REQUEST', message: error.message, requestId },
      });
    }
    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(statusCode).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error', requestId },
    });
  });

  fastify.get('/api/health', async () => ({
    status: 'ok',
    ready: controller.ready,
    timestamp: new Date().toISOString(),
  }));

  await fastify.register(bridgeRoutes, { prefix: '/api/bridge', controller });
  await fastify.register(devicesRoutes, { prefix: '/api/devices', controller });
  await fastify.register(scenesRoutes, { prefix: '/api/scenes', controller });

  return fastify;
}
