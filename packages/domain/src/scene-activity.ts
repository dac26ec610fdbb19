/**
 * Scene Activity Calculator
 *
 * PURE DOMAIN LOGIC - No gateway, no queue, no host dependencies.
 * Decides whether a scene is currently "in effect" by comparing every
 * member's target position with the device's actual position.
 */

import { isDuolite } from './capability.js';
import type { CapabilityClass, DeviceRecord, PositionAxis, ScenePosition, SceneRecord } from './types.js';

// ============================================================================
// INPUT / OUTPUT
// ============================================================================

export type DeviceLookup = (deviceId: string) => DeviceRecord | undefined;

export type SceneInactiveReason =
  | 'NO_MEMBERS'
  | 'MEMBER_NOT_FOUND'
  | 'POSITION_MISSING'
  | 'OUT_OF_TOLERANCE'
  | 'DUOLITE_EXCLUSIVITY'
  | 'EVALUATION_ERROR';

export type SceneActivity =
  | { active: true }
  | { active: false; reason: SceneInactiveReason; deviceId?: string };

/** Allowed drift between target and actual, in percent points. */
export const POSITION_TOLERANCE = 2;

// ============================================================================
// AXIS MAPPING
// ============================================================================

type TargetKey = 'pos1' | 'pos2' | 'tilt';

const TARGET_KEYS: readonly TargetKey[] = ['pos1', 'pos2', 'tilt'];

interface AxisMapping {
  axis: PositionAxis;
  divisor: number;
}

/**
 * Scene targets use pos1/pos2 scaled by 100 and unscaled tilt. Capability 7
 * (top-down/bottom-up) reports its rails the other way round.
 */
export function mapTargetToAxis(key: TargetKey, capabilities: CapabilityClass): AxisMapping {
  switch (key) {
    case 'pos1':
      return { axis: capabilities === 7 ? 'secondary' : 'primary', divisor: 100 };
    case 'pos2':
      return { axis: capabilities === 7 ? 'primary' : 'secondary', divisor: 100 };
    case 'tilt':
      return { axis: 'tilt', divisor: 1 };
  }
}

// ============================================================================
// RULES
// ============================================================================

function checkMember(
  pos: ScenePosition,
  device: DeviceRecord,
  capabilities: CapabilityClass,
): SceneInactiveReason | null {
  for (const key of TARGET_KEYS) {
    const target = pos[key];
    if (target === undefined) continue;

    const { axis, divisor } = mapTargetToAxis(key, capabilities);
    const actual = device.positions[axis];
    if (actual === undefined || actual === null) {
      return 'POSITION_MISSING';
    }
    if (Math.abs(Math.floor(target / divisor) - actual) > POSITION_TOLERANCE) {
      return 'OUT_OF_TOLERANCE';
    }
  }

  // A duolite cannot have its front sheer raised and its rear blackout
  // lowered at the same time; targets on one rail pin the other one.
  if (isDuolite(capabilities)) {
    if (pos.pos1 !== undefined && device.positions.secondary !== 100) {
      return 'DUOLITE_EXCLUSIVITY';
    }
    if (pos.pos2 !== undefined && device.positions.primary !== 0) {
      return 'DUOLITE_EXCLUSIVITY';
    }
  }

  return null;
}

/**
 * Evaluate a scene. Fails closed: an unknown member, a missing position or
 * any exception makes the scene inactive.
 */
export function evaluateSceneActivity(scene: SceneRecord, lookupDevice: DeviceLookup): SceneActivity {
  if (scene.members.length === 0) {
    return { active: false, reason: 'NO_MEMBERS' };
  }

  try {
    for (const member of scene.members) {
      const device = lookupDevice(member.deviceId);
      if (!device) {
        return { active: false, reason: 'MEMBER_NOT_FOUND', deviceId: member.deviceId };
      }
      const capabilities = device.capabilities ?? member.capabilityHint ?? null;
      const reason = checkMember(member.pos, device, capabilities);
      if (reason) {
        return { active: false, reason, deviceId: member.deviceId };
      }
    }
  } catch {
    return { active: false, reason: 'EVALUATION_ERROR' };
  }

  return { active: true };
}

// ============================================================================
// CONSISTENCY CHECK
// ============================================================================

export interface GatewayAgreement {
  agrees: boolean;
  calculated: boolean;
  reported: boolean;
}

/**
 * Compare the calculated state of one scene with what the gateway reported.
 * Informational only; callers log a disagreement and do not correct it.
 */
export function checkGatewayAgreement(
  sceneId: string,
  calculatedActive: ReadonlySet<string>,
  gatewayActive: ReadonlySet<string>,
): GatewayAgreement {
  const calculated = calculatedActive.has(sceneId);
  const reported = gatewayActive.has(sceneId);
  return { agrees: calculated === reported, calculated, reported };
}
