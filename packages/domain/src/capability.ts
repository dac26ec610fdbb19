/**
 * Device capability tables.
 *
 * PURE DOMAIN LOGIC - maps gateway device types to entity kinds and
 * capability classes to the position axes they expose.
 */

import type { CapabilityClass, PositionAxis, ShadeKind } from './types.js';

// ============================================================================
// AXES PER CAPABILITY CLASS
// ============================================================================

const ALL_AXES: readonly PositionAxis[] = ['primary', 'secondary', 'tilt'];

const AXES_BY_CAPABILITY: Readonly<Record<number, readonly PositionAxis[]>> = {
  0: ['primary'],
  1: ['primary', 'tilt'],
  2: ['primary', 'tilt'],
  3: ['primary'],
  4: ['primary', 'tilt'],
  5: ['tilt'],
  6: ['secondary'],
  7: ['primary', 'secondary'],
  8: ['primary', 'secondary'],
};

const TILT_CAPABLE = new Set<number>([1, 2, 4, 5, 9, 10]);
const DUOLITE = new Set<number>([8, 9, 10]);

/** Axes a device of this capability class reports. Unknown classes report all three. */
export function axesForCapability(capabilities: CapabilityClass): readonly PositionAxis[] {
  if (capabilities === null) return ALL_AXES;
  return AXES_BY_CAPABILITY[capabilities] ?? ALL_AXES;
}

export function isTiltCapable(capabilities: CapabilityClass): boolean {
  return capabilities !== null && TILT_CAPABLE.has(capabilities);
}

/** Dual-fabric shades whose front and rear rails may not both be deployed. */
export function isDuolite(capabilities: CapabilityClass): boolean {
  return capabilities !== null && DUOLITE.has(capabilities);
}

// ============================================================================
// AXES PER ENTITY KIND
// ============================================================================

export const SHADE_KIND_AXES: Readonly<Record<ShadeKind, readonly PositionAxis[]>> = {
  'shade-full': ALL_AXES,
  'shade-dual': ['primary', 'secondary'],
  'shade-primary': ['primary'],
};

// ============================================================================
// DEVICE PROFILES (controllable name -> kind + capability)
// ============================================================================

export interface DeviceProfile {
  kind: ShadeKind;
  capabilities: CapabilityClass;
  /** False when no table entry matched and the generic profile was used. */
  known: boolean;
}

interface ProfileRule {
  match: string;
  kind: ShadeKind;
  capabilities: number;
}

// Order matters: first substring match wins.
const PROFILE_RULES: readonly ProfileRule[] = [
  { match: 'VenetianBlind', kind: 'shade-full', capabilities: 2 },
  { match: 'DualRollerShutter', kind: 'shade-dual', capabilities: 7 },
  { match: 'Screen', kind: 'shade-primary', capabilities: 0 },
  { match: 'RollerShutter', kind: 'shade-primary', capabilities: 0 },
  { match: 'Awning', kind: 'shade-primary', capabilities: 0 },
  { match: 'Curtain', kind: 'shade-primary', capabilities: 3 },
];

export function resolveDeviceProfile(controllableName: string): DeviceProfile {
  const rule = PROFILE_RULES.find(r => controllableName.includes(r.match));
  if (!rule) {
    return { kind: 'shade-full', capabilities: null, known: false };
  }
  return { kind: rule.kind, capabilities: rule.capabilities, known: true };
}
