/**
 * Shade Device Routes
 * Read models, motion commands and per-device refresh
 */

import type { FastifyInstance } from 'fastify';
import { contract } from '@shadebridge/contract';
import { registerContractRoute } from '../lib/contract-route.js';
import { fail, ok } from '../utils/reply.js';
import { gatewayFailure, requireReady, type BridgeRouteOptions } from './route-helpers.js';

const PREFIX = '/devices';

export async function devicesRoutes(fastify: FastifyInstance, opts: BridgeRouteOptions): Promise<void> {
  const { controller } = opts;

  registerContractRoute(fastify, contract.devices.list, PREFIX, {
    handler: async (_request, reply) => ok(reply, { devices: controller.listDevices() }),
  });

  registerContractRoute(fastify, contract.devices.get, PREFIX, {
    handler: async (request, reply) => {
      const { address } = request.contractData.params;
      const device = controller.getDevice(address);
      if (!device) {
        return fail(reply, 'NOT_FOUND', `No shade at address ${address}`, 404);
      }
      return ok(reply, { device });
    },
  });

  /**
   * POST /devices/:address/commands
   * Forward one motion command; `accepted: false` means the gateway asked
   * for it to be re-issued later.
   */
  registerContractRoute(fastify, contract.devices.command, PREFIX, {
    preHandler: requireReady(controller),
    handler: async (request, reply) => {
      const { address } = request.contractData.params;
      try {
        const result = await controller.executeDeviceCommand(address, request.contractData.body);
        if (!result) {
          return fail(reply, 'NOT_FOUND', `No shade at address ${address}`, 404);
        }
        return ok(reply, result, result.accepted ? 200 : 202);
      } catch (err) {
        return gatewayFailure(request, reply, err);
      }
    },
  });

  registerContractRoute(fastify, contract.devices.query, PREFIX, {
    preHandler: requireReady(controller),
    handler: async (request, reply) => {
      const { address } = request.contractData.params;
      const device = controller.queryDevice(address);
      if (!device) {
        return fail(reply, 'NOT_FOUND', `No shade at address ${address}`, 404);
      }
      return ok(reply, { device });
    },
  });
}
