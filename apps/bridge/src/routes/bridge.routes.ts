/**
 * Bridge Controller Routes
 * Status, discovery, full refresh and operator notices
 */

import type { FastifyInstance } from 'fastify';
import { contract } from '@shadebridge/contract';
import { registerContractRoute } from '../lib/contract-route.js';
import { fail, ok } from '../utils/reply.js';
import { gatewayFailure, requireReady, type BridgeRouteOptions } from './route-helpers.js';

const PREFIX = '/bridge';

export async function bridgeRoutes(fastify: FastifyInstance, opts: BridgeRouteOptions): Promise<void> {
  const { controller } = opts;

  registerContractRoute(fastify, contract.bridge.status, PREFIX, {
    handler: async (_request, reply) => ok(reply, controller.statusReport()),
  });

  /**
   * POST /bridge/discover
   * 202 when a pass is already running.
   */
  registerContractRoute(fastify, contract.bridge.discover, PREFIX, {
    preHandler: requireReady(controller),
    handler: async (_request, reply) => {
      const result = await controller.discover();
      if (result.status === 'failed') {
        return fail(reply, 'DISCOVERY_FAILED', result.error, 502);
      }
      return ok(reply, result, result.status === 'already-running' ? 202 : 200);
    },
  });

  registerContractRoute(fastify, contract.bridge.query, PREFIX, {
    preHandler: requireReady(controller),
    handler: async (request, reply) => {
      try {
        return ok(reply, await controller.queryAll());
      } catch (err) {
        return gatewayFailure(request, reply, err);
      }
    },
  });

  registerContractRoute(fastify, contract.bridge.clearNotices, PREFIX, {
    handler: async () => {
      controller.clearNotices();
    },
  });
}
