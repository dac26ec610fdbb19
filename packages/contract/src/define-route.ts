/**
 * Control API route definitions.
 *
 * A route is a plain object: method, path relative to /api, and the Zod
 * schemas the bridge validates params, query, body and response against.
 */

import type { z } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface ContractRoute {
  method: HttpMethod;
  path: string;
  summary?: string;
  params?: z.ZodTypeAny;
  query?: z.ZodTypeAny;
  body?: z.ZodTypeAny;
  /** Payload schema inside `{ data }`, or 'void' for a 204. */
  response: z.ZodTypeAny | 'void';
  /**
   * Set on routes that may answer 202 with the same payload; describes
   * when they do.
   */
  accepted?: string;
}

/** Identity helper; keeps the literal types of a route for inference. */
export function defineRoute<T extends ContractRoute>(def: T): T {
  return def;
}
