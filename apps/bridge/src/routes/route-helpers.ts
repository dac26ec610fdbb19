/**
 * Shared pieces of the bridge route plugins.
 */

import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import type { BridgeController } from '../controller/bridge-controller.js';
import { errorMessage, isGatewayError } from '../gateway/errors.js';
import { TimeoutError } from '../lib/timeouts.js';
import { fail } from '../utils/reply.js';

export type BridgeRouteOptions = {
  controller: BridgeController;
};

/** Reject with 503 until the controller finished start-up. */
export function requireReady(controller: BridgeController): preHandlerAsyncHookHandler {
  return async function requireReadyHook(_request: FastifyRequest, reply: FastifyReply) {
    if (!controller.ready) {
      return fail(reply, 'NOT_READY', 'Bridge is still starting or failed to start', 503);
    }
  };
}

/** Map a failed gateway call onto the error envelope. */
export function gatewayFailure(request: FastifyRequest, reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof TimeoutError) {
    request.log.warn({ code: 'GATEWAY_TIMEOUT', operation: err.operation }, err.message);
    return fail(reply, 'GATEWAY_TIMEOUT', err.message, 504);
  }
  if (isGatewayError(err)) {
    request.log.warn({ code: 'GATEWAY_COMMAND_FAILED', kind: err.kind }, err.message);
    return fail(reply, 'GATEWAY_COMMAND_FAILED', err.message, 502, { kind: err.kind });
  }
  throw err instanceof Error ? err : new Error(errorMessage(err));
}
