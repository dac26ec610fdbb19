/**
 * Device route contracts.
 *
 * Wire-format schemas for shade entities as the bridge reports them.
 */

import { z } from 'zod';
import { BatteryStatus, CapabilityClass, PositionsSchema, ShadeKind } from '@shadebridge/domain';
import { defineRoute } from '../define-route.js';

// ---------------------------------------------------------------------------
// Shared schemas
// ---------------------------------------------------------------------------

/** Host status fields (ST, GV0..GV7) as last reported. */
export const StatusFieldsSchema = z.record(z.string(), z.number().nullable());

export const DeviceApiSchema = z.object({
  address: z.string(),
  name: z.string(),
  kind: ShadeKind,
  deviceId: z.string(),
  controllableName: z.string(),
  capabilities: CapabilityClass,
  positions: PositionsSchema,
  online: z.boolean(),
  moving: z.boolean(),
  batteryStatus: BatteryStatus,
  status: StatusFieldsSchema,
});
export type DeviceApi = z.infer<typeof DeviceApiSchema>;

export const AddressParamsSchema = z.object({
  address: z.string().min(1).max(14),
});

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

const Percent = z.number().int().min(0).max(100);

export const DeviceCommandBodySchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('open') }),
  z.object({ command: z.literal('close') }),
  z.object({ command: z.literal('stop') }),
  z.object({ command: z.literal('my') }),
  z.object({ command: z.literal('tilt-open') }),
  z.object({ command: z.literal('tilt-close') }),
  z.object({
    command: z.literal('set-position'),
    positions: z
      .object({ primary: Percent.optional(), secondary: Percent.optional(), tilt: Percent.optional() })
      .refine(p => p.primary !== undefined || p.secondary !== undefined || p.tilt !== undefined, {
        message: 'At least one axis is required',
      }),
  }),
]);
export type DeviceCommandBody = z.infer<typeof DeviceCommandBodySchema>;

export const CommandResultSchema = z.object({
  address: z.string(),
  command: z.string(),
  /** Gateway execution ids; empty when the gateway asked us to retry later. */
  executions: z.array(z.string()),
  accepted: z.boolean(),
});
export type CommandResult = z.infer<typeof CommandResultSchema>;

// ---------------------------------------------------------------------------
// Route definitions
// ---------------------------------------------------------------------------

export const deviceRoutes = {
  list: defineRoute({
    method: 'GET' as const,
    path: '/devices',
    summary: 'List shade entities',
    response: z.object({ devices: z.array(DeviceApiSchema) }),
  }),

  get: defineRoute({
    method: 'GET' as const,
    path: '/devices/:address',
    summary: 'Get one shade entity',
    params: AddressParamsSchema,
    response: z.object({ device: DeviceApiSchema }),
  }),

  command: defineRoute({
    method: 'POST' as const,
    path: '/devices/:address/commands',
    summary: 'Send a motion command to a shade',
    params: AddressParamsSchema,
    body: DeviceCommandBodySchema,
    response: CommandResultSchema,
    accepted: 'The gateway asked for the command to be re-issued later',
  }),

  query: defineRoute({
    method: 'POST' as const,
    path: '/devices/:address/query',
    summary: 'Refresh and report one shade',
    params: AddressParamsSchema,
    response: z.object({ device: DeviceApiSchema }),
  }),
};
