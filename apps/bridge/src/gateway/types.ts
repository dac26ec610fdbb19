/**
 * Gateway wire formats and the client facade the core talks to.
 */

import { z } from 'zod';

// ============================================================================
// WIRE SCHEMAS
// ============================================================================

export const RawStateSchema = z.object({
  name: z.string(),
  type: z.number().optional(),
  value: z.unknown(),
});
export type RawState = z.infer<typeof RawStateSchema>;

export const RawDeviceSchema = z.object({
  deviceURL: z.string().min(1),
  label: z.string().default(''),
  controllableName: z.string().default(''),
  available: z.boolean().default(true),
  placeOID: z.string().optional(),
  states: z.array(RawStateSchema).default([]),
});
export type RawDevice = z.infer<typeof RawDeviceSchema>;

export const RawCommandSchema = z.object({
  name: z.string(),
  parameters: z.array(z.unknown()).default([]),
});
export type RawCommand = z.infer<typeof RawCommandSchema>;

export const RawActionSchema = z.object({
  deviceURL: z.string(),
  commands: z.array(RawCommandSchema).default([]),
});
export type RawAction = z.infer<typeof RawActionSchema>;

export const RawScenarioSchema = z.object({
  oid: z.string().min(1),
  label: z.string().default(''),
  actions: z.array(RawActionSchema).default([]),
});
export type RawScenario = z.infer<typeof RawScenarioSchema>;

export const RawEventSchema = z
  .object({
    name: z.string(),
    timestamp: z.number().optional(),
    deviceURL: z.string().optional(),
    deviceStates: z.array(RawStateSchema).optional(),
    execId: z.string().optional(),
    newState: z.string().optional(),
    oldState: z.string().optional(),
    actions: z.array(RawActionSchema).optional(),
    actionGroupOID: z.string().optional(),
  })
  .passthrough();
export type RawEvent = z.infer<typeof RawEventSchema>;

export const ExecResponseSchema = z.object({ execId: z.string() });
export const ListenerResponseSchema = z.object({ id: z.string() });

// ============================================================================
// FACADE
// ============================================================================

export interface DeviceCommand {
  name: string;
  parameters: Array<string | number | boolean>;
}

/**
 * Operations the core needs from the gateway. Implementations translate
 * every failure into a GatewayError.
 */
export interface GatewayClient {
  readonly isConnected: boolean;
  readonly listenerId: string | null;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  listDevices(): Promise<RawDevice[]>;
  listScenarios(): Promise<RawScenario[]>;

  /** Resolves the execution id, or null when the gateway asked us to come back later. */
  executeCommand(deviceId: string, command: DeviceCommand): Promise<string | null>;
  executeScenario(scenarioId: string): Promise<string | null>;

  registerListener(): Promise<string>;
  fetchEvents(): Promise<RawEvent[]>;
  unregisterListener(): Promise<void>;
}
