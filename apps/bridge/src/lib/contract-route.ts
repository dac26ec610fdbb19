/**
 * Contract Route Adapter
 *
 * Registers Fastify routes from contract definitions with automatic:
 * - params/query/body validation (Zod, before handler)
 * - response validation (Zod, after handler, before serialization)
 * - standardized error envelope for validation failures
 *
 * The shared contract is authoritative for every registered endpoint.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import type { ContractRoute } from '@shadebridge/contract';
import { z } from 'zod';
import { fail, type ErrorBody } from '../utils/reply.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type Parsed<S> = S extends z.ZodTypeAny ? z.output<S> : undefined;

/** Parsed and validated contract data attached to request. */
export interface ContractData<R extends ContractRoute> {
  params: Parsed<R['params']>;
  query: Parsed<R['query']>;
  body: Parsed<R['body']>;
}

export type ContractRequest<R extends ContractRoute> = FastifyRequest & { contractData: ContractData<R> };

/** Handler receives request with .contractData populated. */
export type ContractHandler<R extends ContractRoute> = (
  request: ContractRequest<R>,
  reply: FastifyReply,
) => Promise<FastifyReply | void>;

export interface ContractRouteOptions<R extends ContractRoute> {
  /** Fastify preHandler hooks */
  preHandler?: preHandlerAsyncHookHandler | preHandlerAsyncHookHandler[];
  /** The route handler function. */
  handler: ContractHandler<R>;
  /** Status code sent for void routes when the handler sent nothing (default 204). */
  successStatus?: number;
}

// Stand-in for a part the contract does not declare.
const ABSENT = z.unknown().transform(() => undefined);

// ---------------------------------------------------------------------------
// Path conversion
// ---------------------------------------------------------------------------

/**
 * Contract paths are absolute (e.g. /devices/:address); Fastify routes are
 * relative to their plugin prefix (e.g. /:address under /api/devices).
 */
function contractPathToFastify(contractPath: string, prefix: string): string {
  if (contractPath.startsWith(prefix)) {
    const relative = contractPath.slice(prefix.length);
    return relative || '/';
  }
  return contractPath;
}

// ---------------------------------------------------------------------------
// Response validation
// ---------------------------------------------------------------------------

/**
 * Validate the unwrapped payload (inside { data: ... }) against the contract
 * response schema. Failures are logged with field paths only.
 */
function validateResponse(
  responseSchema: z.ZodTypeAny | 'void',
  payload: unknown,
  request: FastifyRequest,
): boolean {
  if (responseSchema === 'void') {
    return true;
  }

  const result = responseSchema.safeParse(payload);
  if (result.success) {
    return true;
  }

  request.log.error({
    code: 'SERVER_RESPONSE_INVALID',
    method: request.method,
    url: request.url,
    issues: result.error.issues.map(i => ({
      path: i.path,
      code: i.code,
      message: i.message,
    })),
  });
  return false;
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Register a single contract-authoritative route on a Fastify instance.
 *
 * @param prefix - Route prefix (e.g. '/devices') that the contract path
 *                 starts with; the plugin is registered under it.
 */
export function registerContractRoute<R extends ContractRoute>(
  fastify: FastifyInstance,
  route: R,
  prefix: string,
  options: ContractRouteOptions<R>,
): void {
  const { preHandler, handler, successStatus } = options;
  const preHandlerArray = preHandler
    ? (Array.isArray(preHandler) ? preHandler : [preHandler])
    : [];

  fastify.route({
    method: route.method,
    url: contractPathToFastify(route.path, prefix),
    preHandler: preHandlerArray,

    preSerialization: async (request: FastifyRequest, reply: FastifyReply, payload: unknown): Promise<unknown> => {
      // Only success responses that carry { data } are checked.
      if (reply.statusCode >= 400 || typeof payload !== 'object' || payload === null || !('data' in payload)) {
        return payload;
      }
      if (validateResponse(route.response, payload.data, request)) {
        return payload;
      }
      reply.code(500);
      const body: ErrorBody = {
        error: { code: 'SERVER_RESPONSE_INVALID', message: 'Response validation failed' },
      };
      return body;
    },

    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      // ── Validate params ──
      const params = (route.params ?? ABSENT).safeParse(request.params);
      if (!params.success) {
        return fail(reply, 'INVALID_REQUEST', 'Invalid path parameters', 400, params.error.flatten());
      }

      // ── Validate query ──
      const query = (route.query ?? ABSENT).safeParse(request.query);
      if (!query.success) {
        return fail(reply, 'INVALID_REQUEST', 'Invalid query parameters', 400, query.error.flatten());
      }

      // ── Validate body ──
      const body = (route.body ?? ABSENT).safeParse(request.body);
      if (!body.success) {
        return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, body.error.flatten());
      }

      const contractData: ContractData<R> = {
        params: params.data,
        query: query.data,
        body: body.data,
      };
      const result = await handler(Object.assign(request, { contractData }), reply);

      // Handle 204 void responses
      if (route.response === 'void' && !reply.sent) {
        return reply.status(successStatus ?? 204).send();
      }

      return result;
    },
  });
}
