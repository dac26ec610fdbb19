/**
 * Scene route contracts.
 */

import { z } from 'zod';
import { defineRoute } from '../define-route.js';
import { AddressParamsSchema, CommandResultSchema, StatusFieldsSchema } from './devices.js';

// ---------------------------------------------------------------------------
// Shared schemas
// ---------------------------------------------------------------------------

export const SceneApiSchema = z.object({
  address: z.string(),
  name: z.string(),
  sceneId: z.string(),
  memberCount: z.number().int().nonnegative(),
  /** Activity as calculated from member positions. */
  active: z.boolean(),
  /** Activity as last reported by gateway execution events. */
  gatewayActive: z.boolean(),
  status: StatusFieldsSchema,
});
export type SceneApi = z.infer<typeof SceneApiSchema>;

// ---------------------------------------------------------------------------
// Route definitions
// ---------------------------------------------------------------------------

export const sceneRoutes = {
  list: defineRoute({
    method: 'GET' as const,
    path: '/scenes',
    summary: 'List scene entities',
    response: z.object({ scenes: z.array(SceneApiSchema) }),
  }),

  get: defineRoute({
    method: 'GET' as const,
    path: '/scenes/:address',
    summary: 'Get one scene entity',
    params: AddressParamsSchema,
    response: z.object({ scene: SceneApiSchema }),
  }),

  activate: defineRoute({
    method: 'POST' as const,
    path: '/scenes/:address/activate',
    summary: 'Execute the scenario on the gateway',
    params: AddressParamsSchema,
    response: CommandResultSchema,
    accepted: 'The gateway execution queue is full; activate again later',
  }),

  query: defineRoute({
    method: 'POST' as const,
    path: '/scenes/:address/query',
    summary: 'Recompute scene activity',
    params: AddressParamsSchema,
    response: z.object({ scene: SceneApiSchema }),
  }),
};
