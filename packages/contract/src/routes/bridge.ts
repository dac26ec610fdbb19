/**
 * Bridge (controller) route contracts.
 */

import { z } from 'zod';
import { defineRoute } from '../define-route.js';

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

export const PollerState = z.enum(['idle', 'listening']);
export type PollerState = z.infer<typeof PollerState>;

export const NoticeSchema = z.object({
  key: z.string(),
  message: z.string(),
});

export const BridgeStatusSchema = z.object({
  ready: z.boolean(),
  /** 0 stopped, 1 running, 2 failed */
  status: z.number().int().min(0).max(2),
  nodeCount: z.number().int().nonnegative(),
  poller: PollerState,
  discoveryRunning: z.boolean(),
  heartbeat: z.enum(['DON', 'DOF']).nullable(),
  idleTicks: z.number().int().nonnegative(),
  notices: z.array(NoticeSchema),
});
export type BridgeStatus = z.infer<typeof BridgeStatusSchema>;

export const DiscoveryResultSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    devices: z.number().int().nonnegative(),
    scenes: z.number().int().nonnegative(),
    created: z.number().int().nonnegative(),
    retired: z.number().int().nonnegative(),
  }),
  z.object({ status: z.literal('already-running') }),
  z.object({ status: z.literal('failed'), error: z.string() }),
]);
export type DiscoveryResult = z.infer<typeof DiscoveryResultSchema>;

// ---------------------------------------------------------------------------
// Route definitions
// ---------------------------------------------------------------------------

export const bridgeRoutes = {
  status: defineRoute({
    method: 'GET' as const,
    path: '/bridge/status',
    summary: 'Controller status, poller state and operator notices',
    response: BridgeStatusSchema,
  }),

  discover: defineRoute({
    method: 'POST' as const,
    path: '/bridge/discover',
    summary: 'Reconcile entities with the gateway inventory',
    response: DiscoveryResultSchema,
    accepted: 'A discovery pass is already running',
  }),

  query: defineRoute({
    method: 'POST' as const,
    path: '/bridge/query',
    summary: 'Refresh every entity from the gateway',
    response: z.object({ devices: z.number().int(), scenes: z.number().int() }),
  }),

  clearNotices: defineRoute({
    method: 'DELETE' as const,
    path: '/bridge/notices',
    summary: 'Remove all operator notices',
    response: 'void' as const,
  }),
};
