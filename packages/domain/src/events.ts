/**
 * Event records shared between the poller, the controller and every
 * entity consumer.
 *
 * PURE DOMAIN LOGIC - records are plain values; the queue that carries
 * them lives in the bridge app.
 */

import type { BatteryStatus, Positions } from './types.js';

// ============================================================================
// RECORD SHAPES
// ============================================================================

interface DeviceEventBase {
  timestamp: number;
  deviceId: string;
}

interface SceneEventBase {
  timestamp: number;
  sceneId: string;
}

export interface DeviceStateChangedEvent extends DeviceEventBase {
  kind: 'device-state-changed';
  positions: Positions;
  moving?: boolean;
  signal?: number;
}

export interface MotionStartedEvent extends DeviceEventBase {
  kind: 'motion-started';
}

export interface MotionStoppedEvent extends DeviceEventBase {
  kind: 'motion-stopped';
}

export interface DeviceOnlineEvent extends DeviceEventBase {
  kind: 'device-online';
}

export interface DeviceOfflineEvent extends DeviceEventBase {
  kind: 'device-offline';
}

export interface BatteryAlertEvent extends DeviceEventBase {
  kind: 'battery-alert';
  batteryStatus: BatteryStatus;
}

export interface DeviceAddedEvent extends DeviceEventBase {
  kind: 'device-added';
}

export interface DeviceRemovedEvent extends DeviceEventBase {
  kind: 'device-removed';
}

export interface SceneActivatedEvent extends SceneEventBase {
  kind: 'scene-activated';
}

export interface SceneDeactivatedEvent extends SceneEventBase {
  kind: 'scene-deactivated';
}

export interface SceneAddedEvent extends SceneEventBase {
  kind: 'scene-added';
}

export interface SceneRemovedEvent extends SceneEventBase {
  kind: 'scene-removed';
}

/**
 * Membership record naming entities that must refresh from the registry.
 * Each listed consumer removes its own id; the record is dropped once both
 * lists are empty.
 */
export interface HomeSnapshotEvent {
  kind: 'home-snapshot';
  devices: string[];
  scenes: string[];
}

/**
 * Membership record asking the listed scenes to recompute their activity
 * after a member device finished moving.
 */
export interface SceneRecomputeEvent {
  kind: 'scene-recompute';
  deviceId: string;
  scenes: string[];
}

export type DeviceEvent =
  | DeviceStateChangedEvent
  | MotionStartedEvent
  | MotionStoppedEvent
  | DeviceOnlineEvent
  | DeviceOfflineEvent
  | BatteryAlertEvent
  | DeviceAddedEvent
  | DeviceRemovedEvent;

export type SceneEvent =
  | SceneActivatedEvent
  | SceneDeactivatedEvent
  | SceneAddedEvent
  | SceneRemovedEvent;

export type TimestampedEvent = DeviceEvent | SceneEvent;

export type MembershipEvent = HomeSnapshotEvent | SceneRecomputeEvent;

export type EventRecord = TimestampedEvent | MembershipEvent;

export type EventKind = EventRecord['kind'];

// ============================================================================
// HELPERS
// ============================================================================

export function isTimestamped(record: EventRecord): record is TimestampedEvent {
  return 'timestamp' in record;
}

export function isDeviceEvent(record: EventRecord): record is DeviceEvent {
  return isTimestamped(record) && 'deviceId' in record;
}

export function isSceneEvent(record: EventRecord): record is SceneEvent {
  return isTimestamped(record) && 'sceneId' in record;
}

/** Gateway id the record is addressed to, if it is a timestamped record. */
export function eventTargetId(record: EventRecord): string | undefined {
  if (isDeviceEvent(record)) return record.deviceId;
  if (isSceneEvent(record)) return record.sceneId;
  return undefined;
}

/**
 * Earliest timestamped record in the given list. Ties resolve to the one
 * published first. Membership records are ignored.
 */
export function earliestTimestamped(records: readonly EventRecord[]): TimestampedEvent | undefined {
  let earliest: TimestampedEvent | undefined;
  for (const record of records) {
    if (!isTimestamped(record)) continue;
    if (!earliest || record.timestamp < earliest.timestamp) {
      earliest = record;
    }
  }
  return earliest;
}

export function findHomeSnapshot(records: readonly EventRecord[]): HomeSnapshotEvent | undefined {
  for (const record of records) {
    if (record.kind === 'home-snapshot') return record;
  }
  return undefined;
}
