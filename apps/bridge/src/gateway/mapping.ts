/**
 * Conversion from gateway wire objects to registry records.
 */

import {
  numericIdHash,
  resolveDeviceProfile,
  type BatteryStatus,
  type DeviceProfile,
  type DeviceRecord,
  type Positions,
  type SceneMember,
  type ScenePosition,
  type SceneRecord,
} from '@shadebridge/domain';
import type { RawAction, RawDevice, RawScenario, RawState } from './types.js';

// ---------------------------------------------------------------------------
// State names
// ---------------------------------------------------------------------------

export const STATE = {
  closure: 'core:ClosureState',
  deployment: 'core:DeploymentState',
  orientation: 'core:SlateOrientationState',
  status: 'core:StatusState',
  moving: 'core:MovingState',
  battery: 'core:BatteryState',
  rssi: 'core:DiscreteRSSILevelState',
} as const;

const RSSI_LEVELS: Record<string, number> = {
  verylow: 0,
  low: 1,
  normal: 2,
  good: 3,
  verygood: 4,
  excellent: 5,
};

const BATTERY_LEVELS: Record<string, BatteryStatus> = {
  full: 1,
  normal: 1,
  low: 2,
  verylow: 3,
};

// ---------------------------------------------------------------------------
// State readers
// ---------------------------------------------------------------------------

function stateValue(states: readonly RawState[], name: string): unknown {
  return states.find(s => s.name === name)?.value;
}

/** Numeric 0..100 from a state value, or undefined when absent or not numeric. */
export function toPercent(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) return undefined;
  return Math.min(100, Math.max(0, Math.trunc(n)));
}

/** Positions carried by a state list; axes not mentioned are left out. */
export function statesToPositions(states: readonly RawState[]): Positions {
  const positions: Positions = {};
  const primary = toPercent(stateValue(states, STATE.closure));
  const secondary = toPercent(stateValue(states, STATE.deployment));
  const tilt = toPercent(stateValue(states, STATE.orientation));
  if (primary !== undefined) positions.primary = primary;
  if (secondary !== undefined) positions.secondary = secondary;
  if (tilt !== undefined) positions.tilt = tilt;
  return positions;
}

export function readMoving(states: readonly RawState[]): boolean | undefined {
  const value = stateValue(states, STATE.moving);
  return typeof value === 'boolean' ? value : undefined;
}

/** `available` / `unavailable` from core:StatusState. */
export function readAvailability(states: readonly RawState[]): boolean | undefined {
  const value = stateValue(states, STATE.status);
  if (typeof value !== 'string') return undefined;
  return value.toLowerCase() === 'available';
}

export function readBattery(states: readonly RawState[]): BatteryStatus | undefined {
  const value = stateValue(states, STATE.battery);
  if (typeof value !== 'string') return undefined;
  return BATTERY_LEVELS[value.toLowerCase()] ?? 0;
}

/** Signal index 0..5; unrecognised levels read as `normal`. */
export function readSignal(states: readonly RawState[]): number | undefined {
  const value = stateValue(states, STATE.rssi);
  if (value === undefined || value === null) return undefined;
  return RSSI_LEVELS[String(value).toLowerCase()] ?? 2;
}

// ---------------------------------------------------------------------------
// Devices
// ---------------------------------------------------------------------------

export function toDeviceRecord(raw: RawDevice, profile: DeviceProfile = resolveDeviceProfile(raw.controllableName)): DeviceRecord {
  const available = readAvailability(raw.states);
  return {
    id: raw.deviceURL,
    label: raw.label,
    controllableName: raw.controllableName,
    kind: profile.kind,
    capabilities: profile.capabilities,
    roomId: raw.placeOID ? numericIdHash(raw.placeOID) : 0,
    batteryStatus: readBattery(raw.states) ?? 0,
    positions: statesToPositions(raw.states),
    online: raw.available && available !== false,
    moving: readMoving(raw.states) ?? false,
    signal: readSignal(raw.states) ?? null,
  };
}

// ---------------------------------------------------------------------------
// Scenarios
// ---------------------------------------------------------------------------

function firstNumber(parameters: readonly unknown[]): number | undefined {
  const [first] = parameters;
  return typeof first === 'number' && Number.isFinite(first) ? first : undefined;
}

/**
 * Target positions a scenario action drives its device to. Rail targets are
 * scaled by 100; actions without a positional command produce nothing.
 */
export function actionToTargets(action: RawAction): ScenePosition | undefined {
  const pos: ScenePosition = {};
  for (const command of action.commands) {
    const value = firstNumber(command.parameters);
    switch (command.name) {
      case 'setClosure':
        if (value !== undefined) pos.pos1 = value * 100;
        break;
      case 'setDeployment':
        if (value !== undefined) pos.pos2 = value * 100;
        break;
      case 'setOrientation':
        if (value !== undefined) pos.tilt = value;
        break;
      case 'open':
        pos.pos1 = 0;
        break;
      case 'close':
        pos.pos1 = 10_000;
        break;
      default:
        break;
    }
  }
  return Object.keys(pos).length > 0 ? pos : undefined;
}

export function toSceneRecord(raw: RawScenario): SceneRecord {
  const members: SceneMember[] = [];
  for (const action of raw.actions) {
    const pos = actionToTargets(action);
    if (pos) members.push({ deviceId: action.deviceURL, pos });
  }
  return { id: raw.oid, label: raw.label, members };
}
