/**
 * Standardized API Reply Helpers
 *
 * All API responses use a consistent envelope:
 *   Success: { data: <payload> }
 *   Error:   { error: { code: string, message: string, details?: unknown } }
 *
 * Usage:
 *   return ok(reply, { devices: [...] });
 *   return fail(reply, 'NOT_FOUND', 'No shade at address sh1234', 404);
 */

import type { FastifyReply } from 'fastify';
import type { ErrorCode, ErrorEnvelope } from '@shadebridge/contract';

export type ErrorBody = ErrorEnvelope;

/**
 * Send a success response wrapped in { data }.
 */
export function ok<T>(reply: FastifyReply, data: T, statusCode = 200): FastifyReply {
  return reply.status(statusCode).send({ data });
}

/**
 * Send an error response wrapped in { error: { code, message, details? } }.
 */
export function fail(
  reply: FastifyReply,
  code: ErrorCode,
  message: string,
  statusCode = 400,
  details?: unknown,
): FastifyReply {
  const body: ErrorBody = { error: { code, message } };
  if (details !== undefined) {
    body.error.details = details;
  }
  return reply.status(statusCode).send(body);
}
