/**
 * HTTP read models, assembled from the registry record and the host's
 * status fields of one entity.
 */

import type { DeviceApi, SceneApi } from '@shadebridge/contract';
import type { SceneEntity } from '../entities/scene-entity.js';
import type { ShadeEntity } from '../entities/shade-entity.js';
import type { EntityHost } from '../host/entity-host.js';
import type { EntityRegistry } from '../registry/entity-registry.js';

export function toDeviceApi(
  entity: ShadeEntity,
  registry: EntityRegistry,
  host: EntityHost,
): DeviceApi | undefined {
  const device = registry.getDevice(entity.gatewayId);
  if (!device) return undefined;

  return {
    address: entity.address,
    name: entity.displayName,
    kind: entity.shadeKind,
    deviceId: device.id,
    controllableName: device.controllableName,
    capabilities: device.capabilities,
    positions: device.positions,
    online: device.online,
    moving: device.moving,
    batteryStatus: device.batteryStatus,
    status: host.getEntity(entity.address)?.status ?? {},
  };
}

export function toSceneApi(
  entity: SceneEntity,
  registry: EntityRegistry,
  host: EntityHost,
): SceneApi {
  const scene = registry.getScene(entity.gatewayId);
  return {
    address: entity.address,
    name: entity.displayName,
    sceneId: entity.gatewayId,
    memberCount: scene?.members.length ?? 0,
    active: registry.isCalculatedActive(entity.gatewayId),
    gatewayActive: registry.isGatewayActive(entity.gatewayId),
    status: host.getEntity(entity.address)?.status ?? {},
  };
}
