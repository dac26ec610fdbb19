/**
 * @shadebridge/contract — HTTP control API contract definitions.
 *
 * Exports route contracts, envelope helpers, and the contract registry.
 */

// Core types
export type { ContractRoute, HttpMethod } from './define-route.js';
export { defineRoute } from './define-route.js';

// Envelope helpers
export { DataEnvelope, ErrorCode, ErrorEnvelope } from './envelope.js';

// Route contracts & registry
export { contract, bridgeRoutes, deviceRoutes, sceneRoutes } from './routes/index.js';

// Re-export schemas that consumers may need for type inference
export {
  DeviceApiSchema,
  type DeviceApi,
  DeviceCommandBodySchema,
  type DeviceCommandBody,
  CommandResultSchema,
  type CommandResult,
} from './routes/devices.js';
export { SceneApiSchema, type SceneApi } from './routes/scenes.js';
export {
  BridgeStatusSchema,
  type BridgeStatus,
  DiscoveryResultSchema,
  type DiscoveryResult,
  PollerState,
} from './routes/bridge.js';

// OpenAPI
export { generateOpenApiDocument } from './openapi/generate.js';
