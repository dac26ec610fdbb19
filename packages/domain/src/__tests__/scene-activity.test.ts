/**
 * Scene activity calculator tests.
 *
 * Proves:
 * 1. A scene matches when every member is within tolerance
 * 2. Fail-closed behaviour (no members, unknown member, missing position, exceptions)
 * 3. Axis mapping for capability 7 and the tilt divisor
 * 4. Duolite rail exclusivity
 * 5. Gateway agreement check
 * 6. Tolerance holds on every target axis of every capability class
 */

import { describe, it, expect } from 'vitest';
import {
  evaluateSceneActivity,
  checkGatewayAgreement,
  mapTargetToAxis,
  type DeviceLookup,
} from '../scene-activity.js';
import type { CapabilityClass, DeviceRecord, PositionAxis, Positions, ScenePosition, SceneRecord } from '../types.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function device(overrides: Partial<DeviceRecord> = {}): DeviceRecord {
  return {
    id: 'io://1234-5678-9012/100',
    label: 'Living Room',
    controllableName: 'io:RollerShutterGenericIOComponent',
    kind: 'shade-primary',
    capabilities: 0,
    roomId: 1,
    batteryStatus: 1,
    positions: { primary: 50 },
    online: true,
    moving: false,
    signal: null,
    ...overrides,
  };
}

function lookupFrom(...devices: DeviceRecord[]): DeviceLookup {
  const byId = new Map(devices.map(d => [d.id, d]));
  return id => byId.get(id);
}

function scene(members: SceneRecord['members']): SceneRecord {
  return { id: 'oid-1', label: 'Evening', members };
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

describe('evaluateSceneActivity — matching', () => {
  it('is active when the member sits exactly at the target', () => {
    const d = device({ positions: { primary: 50 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 5000 } }]),
      lookupFrom(d),
    );
    expect(result).toEqual({ active: true });
  });

  it('accepts a drift of exactly 2 points', () => {
    const d = device({ positions: { primary: 52 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 5000 } }]),
      lookupFrom(d),
    );
    expect(result.active).toBe(true);
  });

  it('rejects a drift of 3 points', () => {
    const d = device({ positions: { primary: 53 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 5000 } }]),
      lookupFrom(d),
    );
    expect(result).toEqual({ active: false, reason: 'OUT_OF_TOLERANCE', deviceId: d.id });
  });

  it('floors scaled targets before comparing', () => {
    // floor(5299 / 100) = 52, |52 - 50| = 2
    const d = device({ positions: { primary: 50 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 5299 } }]),
      lookupFrom(d),
    );
    expect(result.active).toBe(true);
  });

  it('ignores vel and etaInSeconds', () => {
    const d = device({ positions: { primary: 0 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 0, vel: 9999, etaInSeconds: 30 } }]),
      lookupFrom(d),
    );
    expect(result.active).toBe(true);
  });

  it('requires every member to match', () => {
    const a = device({ id: 'io://x/1', positions: { primary: 0 } });
    const b = device({ id: 'io://x/2', positions: { primary: 80 } });
    const result = evaluateSceneActivity(
      scene([
        { deviceId: a.id, pos: { pos1: 0 } },
        { deviceId: b.id, pos: { pos1: 0 } },
      ]),
      lookupFrom(a, b),
    );
    expect(result).toEqual({ active: false, reason: 'OUT_OF_TOLERANCE', deviceId: 'io://x/2' });
  });
});

// ---------------------------------------------------------------------------
// Fail closed
// ---------------------------------------------------------------------------

describe('evaluateSceneActivity — fail closed', () => {
  it('treats an empty scene as inactive', () => {
    expect(evaluateSceneActivity(scene([]), lookupFrom())).toEqual({
      active: false,
      reason: 'NO_MEMBERS',
    });
  });

  it('treats an unknown member as inactive', () => {
    const result = evaluateSceneActivity(
      scene([{ deviceId: 'io://x/missing', pos: { pos1: 0 } }]),
      lookupFrom(),
    );
    expect(result).toEqual({ active: false, reason: 'MEMBER_NOT_FOUND', deviceId: 'io://x/missing' });
  });

  it('treats a missing actual position as inactive', () => {
    const d = device({ positions: { primary: 10, secondary: null } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos2: 1000 } }]),
      lookupFrom(d),
    );
    expect(result).toEqual({ active: false, reason: 'POSITION_MISSING', deviceId: d.id });
  });

  it('treats a throwing lookup as inactive', () => {
    const result = evaluateSceneActivity(
      scene([{ deviceId: 'io://x/1', pos: { pos1: 0 } }]),
      () => {
        throw new Error('registry unavailable');
      },
    );
    expect(result).toEqual({ active: false, reason: 'EVALUATION_ERROR' });
  });
});

// ---------------------------------------------------------------------------
// Every capability class
// ---------------------------------------------------------------------------

const ACTUAL: Record<PositionAxis, number> = { primary: 0, secondary: 100, tilt: 45 };

const CAPABILITY_CLASSES: CapabilityClass[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, null];

const sweep = CAPABILITY_CLASSES.flatMap(capabilities =>
  (['pos1', 'pos2', 'tilt'] as const).map(target => ({
    name: `class ${capabilities ?? 'null'} ${target}`,
    capabilities,
    target,
  })),
);

/** ACTUAL with one axis moved `drift` points towards the middle. */
function drifted(axis: PositionAxis, drift: number): Positions {
  const positions = { ...ACTUAL };
  positions[axis] += positions[axis] >= 50 ? -drift : drift;
  return positions;
}

function targetPosition(target: 'pos1' | 'pos2' | 'tilt', value: number): ScenePosition {
  if (target === 'pos1') return { pos1: value };
  if (target === 'pos2') return { pos2: value };
  return { tilt: value };
}

describe('evaluateSceneActivity — every capability class', () => {
  it.each(sweep)('$name matches within tolerance', ({ capabilities, target }) => {
    const { axis, divisor } = mapTargetToAxis(target, capabilities);
    const d = device({ capabilities, positions: drifted(axis, 2) });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: targetPosition(target, ACTUAL[axis] * divisor) }]),
      lookupFrom(d),
    );
    expect(result).toEqual({ active: true });
  });

  it.each(sweep)('$name rejects a drift of 3 on the targeted axis', ({ capabilities, target }) => {
    const { axis, divisor } = mapTargetToAxis(target, capabilities);
    const d = device({ capabilities, positions: drifted(axis, 3) });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: targetPosition(target, ACTUAL[axis] * divisor) }]),
      lookupFrom(d),
    );
    expect(result).toEqual({ active: false, reason: 'OUT_OF_TOLERANCE', deviceId: d.id });
  });
});

// ---------------------------------------------------------------------------
// Axis mapping
// ---------------------------------------------------------------------------

describe('mapTargetToAxis', () => {
  it('swaps rails for capability 7', () => {
    expect(mapTargetToAxis('pos1', 7)).toEqual({ axis: 'secondary', divisor: 100 });
    expect(mapTargetToAxis('pos2', 7)).toEqual({ axis: 'primary', divisor: 100 });
  });

  it('keeps rails in order for other classes', () => {
    expect(mapTargetToAxis('pos1', 0)).toEqual({ axis: 'primary', divisor: 100 });
    expect(mapTargetToAxis('pos2', null)).toEqual({ axis: 'secondary', divisor: 100 });
  });

  it('does not scale tilt', () => {
    expect(mapTargetToAxis('tilt', 2)).toEqual({ axis: 'tilt', divisor: 1 });
  });

  it('compares capability 7 pos1 against the secondary rail', () => {
    const d = device({ capabilities: 7, kind: 'shade-dual', positions: { primary: 0, secondary: 40 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 4000 } }]),
      lookupFrom(d),
    );
    expect(result.active).toBe(true);
  });

  it('compares tilt targets unscaled', () => {
    const d = device({ capabilities: 2, kind: 'shade-full', positions: { primary: 100, tilt: 45 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 10000, tilt: 44 } }]),
      lookupFrom(d),
    );
    expect(result.active).toBe(true);
  });

  it('falls back to the member capability hint when the device has none', () => {
    const d = device({ capabilities: null, positions: { primary: 0, secondary: 30 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 3000 }, capabilityHint: 7 }]),
      lookupFrom(d),
    );
    expect(result.active).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Duolite
// ---------------------------------------------------------------------------

describe('evaluateSceneActivity — duolite exclusivity', () => {
  it('rejects a pos1 target unless the rear rail is fully up', () => {
    const d = device({ capabilities: 8, kind: 'shade-dual', positions: { primary: 60, secondary: 90 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 6000 } }]),
      lookupFrom(d),
    );
    expect(result).toEqual({ active: false, reason: 'DUOLITE_EXCLUSIVITY', deviceId: d.id });
  });

  it('accepts a pos1 target with the rear rail at 100', () => {
    const d = device({ capabilities: 8, kind: 'shade-dual', positions: { primary: 60, secondary: 100 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 6000 } }]),
      lookupFrom(d),
    );
    expect(result.active).toBe(true);
  });

  it('rejects a pos2 target unless the front rail is fully down', () => {
    const d = device({ capabilities: 9, kind: 'shade-full', positions: { primary: 1, secondary: 20, tilt: 0 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos2: 2000 } }]),
      lookupFrom(d),
    );
    expect(result).toEqual({ active: false, reason: 'DUOLITE_EXCLUSIVITY', deviceId: d.id });
  });

  it('does not apply to non-duolite classes', () => {
    const d = device({ capabilities: 7, kind: 'shade-dual', positions: { primary: 20, secondary: 60 } });
    const result = evaluateSceneActivity(
      scene([{ deviceId: d.id, pos: { pos1: 6000 } }]),
      lookupFrom(d),
    );
    expect(result.active).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Gateway agreement
// ---------------------------------------------------------------------------

describe('checkGatewayAgreement', () => {
  it('agrees when both sets contain the scene', () => {
    expect(checkGatewayAgreement('a', new Set(['a']), new Set(['a']))).toEqual({
      agrees: true,
      calculated: true,
      reported: true,
    });
  });

  it('reports a disagreement', () => {
    expect(checkGatewayAgreement('a', new Set(['a']), new Set())).toEqual({
      agrees: false,
      calculated: true,
      reported: false,
    });
  });
});
