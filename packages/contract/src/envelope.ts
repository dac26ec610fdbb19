/**
 * Response envelopes and the error codes the bridge answers with.
 *
 *   Success: { data: <payload> }
 *   Error:   { error: { code, message, details?, requestId? } }
 */

import { z } from 'zod';

export const ErrorCode = z.enum([
  'INVALID_REQUEST',
  'VALIDATION_ERROR',
  'NOT_FOUND',
  'NOT_READY',
  'GATEWAY_COMMAND_FAILED',
  'GATEWAY_TIMEOUT',
  'DISCOVERY_FAILED',
  'SERVER_RESPONSE_INVALID',
  'INTERNAL_ERROR',
]);
export type ErrorCode = z.infer<typeof ErrorCode>;

export function DataEnvelope<T extends z.ZodTypeAny>(schema: T) {
  return z.object({ data: schema });
}

// `code` stays a plain string: framework errors pass their own codes through.
export const ErrorEnvelope = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
    requestId: z.string().optional(),
  }),
});
export type ErrorEnvelope = z.infer<typeof ErrorEnvelope>;
