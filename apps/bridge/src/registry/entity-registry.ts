/**
 * Entity Registry
 *
 * Authoritative in-memory view of devices, scenes and scene activity.
 * Every method is synchronous, so each call runs to completion on the event
 * loop before any other consumer can observe the registry. Callers must not
 * hold values across an await and expect them to stay current.
 */

import type { DeviceRecord, Positions, SceneRecord } from '@shadebridge/domain';

export class EntityRegistry {
  private readonly devices = new Map<string, DeviceRecord>();
  private readonly scenes = new Map<string, SceneRecord>();
  private readonly gatewayActive = new Set<string>();
  private readonly calculated = new Set<string>();

  // ── Devices ──

  getDevice(id: string): DeviceRecord | undefined {
    return this.devices.get(id);
  }

  listDevices(): DeviceRecord[] {
    return [...this.devices.values()];
  }

  deviceIds(): string[] {
    return [...this.devices.keys()];
  }

  upsertDevice(record: DeviceRecord): void {
    this.devices.set(record.id, record);
  }

  /** Shallow-merge fields into an existing device. Unknown ids are ignored. */
  mergeDevice(id: string, patch: Partial<Omit<DeviceRecord, 'id'>>): DeviceRecord | undefined {
    const current = this.devices.get(id);
    if (!current) return undefined;
    const next: DeviceRecord = { ...current, ...patch };
    this.devices.set(id, next);
    return next;
  }

  /** Merge axis values; axes absent from `positions` keep their value. */
  updatePositions(id: string, positions: Positions): DeviceRecord | undefined {
    const current = this.devices.get(id);
    if (!current) return undefined;
    return this.mergeDevice(id, { positions: { ...current.positions, ...positions } });
  }

  removeDevice(id: string): boolean {
    return this.devices.delete(id);
  }

  // ── Scenes ──

  getScene(id: string): SceneRecord | undefined {
    return this.scenes.get(id);
  }

  listScenes(): SceneRecord[] {
    return [...this.scenes.values()];
  }

  sceneIds(): string[] {
    return [...this.scenes.keys()];
  }

  upsertScene(record: SceneRecord): void {
    this.scenes.set(record.id, record);
  }

  removeScene(id: string): boolean {
    this.gatewayActive.delete(id);
    this.calculated.delete(id);
    return this.scenes.delete(id);
  }

  /** Ids of every scene with `deviceId` among its members. */
  scenesContaining(deviceId: string): string[] {
    const result: string[] = [];
    for (const scene of this.scenes.values()) {
      if (scene.members.some(m => m.deviceId === deviceId)) {
        result.push(scene.id);
      }
    }
    return result;
  }

  // ── Scene activity ──

  markGatewayActive(sceneId: string): void {
    this.gatewayActive.add(sceneId);
  }

  markGatewayInactive(sceneId: string): void {
    this.gatewayActive.delete(sceneId);
  }

  isGatewayActive(sceneId: string): boolean {
    return this.gatewayActive.has(sceneId);
  }

  setCalculatedActive(sceneId: string, active: boolean): void {
    if (active) {
      this.calculated.add(sceneId);
    } else {
      this.calculated.delete(sceneId);
    }
  }

  isCalculatedActive(sceneId: string): boolean {
    return this.calculated.has(sceneId);
  }

  gatewayActiveSet(): ReadonlySet<string> {
    return this.gatewayActive;
  }

  calculatedActiveSet(): ReadonlySet<string> {
    return this.calculated;
  }
}
