/**
 * Scene Routes
 */

import type { FastifyInstance } from 'fastify';
import { contract } from '@shadebridge/contract';
import { registerContractRoute } from '../lib/contract-route.js';
import { fail, ok } from '../utils/reply.js';
import { gatewayFailure, requireReady, type BridgeRouteOptions } from './route-helpers.js';

const PREFIX = '/scenes';

export async function scenesRoutes(fastify: FastifyInstance, opts: BridgeRouteOptions): Promise<void> {
  const { controller } = opts;

  registerContractRoute(fastify, contract.scenes.list, PREFIX, {
    handler: async (_request, reply) => ok(reply, { scenes: controller.listScenes() }),
  });

  registerContractRoute(fastify, contract.scenes.get, PREFIX, {
    handler: async (request, reply) => {
      const { address } = request.contractData.params;
      const scene = controller.getScene(address);
      if (!scene) {
        return fail(reply, 'NOT_FOUND', `No scene at address ${address}`, 404);
      }
      return ok(reply, { scene });
    },
  });

  registerContractRoute(fastify, contract.scenes.activate, PREFIX, {
    preHandler: requireReady(controller),
    handler: async (request, reply) => {
      const { address } = request.contractData.params;
      try {
        const result = await controller.activateScene(address);
        if (!result) {
          return fail(reply, 'NOT_FOUND', `No scene at address ${address}`, 404);
        }
        return ok(reply, result, result.accepted ? 200 : 202);
      } catch (err) {
        return gatewayFailure(request, reply, err);
      }
    },
  });

  registerContractRoute(fastify, contract.scenes.query, PREFIX, {
    preHandler: requireReady(controller),
    handler: async (request, reply) => {
      const { address } = request.contractData.params;
      const scene = controller.queryScene(address);
      if (!scene) {
        return fail(reply, 'NOT_FOUND', `No scene at address ${address}`, 404);
      }
      return ok(reply, { scene });
    },
  });
}
