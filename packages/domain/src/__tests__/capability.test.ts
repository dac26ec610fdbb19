/**
 * Capability tables, device profiles and address derivation.
 */

import { describe, it, expect } from 'vitest';
import {
  axesForCapability,
  isTiltCapable,
  isDuolite,
  resolveDeviceProfile,
  SHADE_KIND_AXES,
} from '../capability.js';
import { deviceAddress, sceneAddress, numericIdHash, MAX_ADDRESS_LENGTH } from '../address.js';

// ---------------------------------------------------------------------------
// Axes
// ---------------------------------------------------------------------------

describe('axesForCapability', () => {
  it.each([
    [0, ['primary']],
    [3, ['primary']],
    [6, ['secondary']],
    [1, ['primary', 'tilt']],
    [4, ['primary', 'tilt']],
    [5, ['tilt']],
    [7, ['primary', 'secondary']],
    [8, ['primary', 'secondary']],
    [9, ['primary', 'secondary', 'tilt']],
    [10, ['primary', 'secondary', 'tilt']],
  ])('class %i reports %j', (capability, axes) => {
    expect(axesForCapability(capability)).toEqual(axes);
  });

  it('reports every axis when the class is unknown', () => {
    expect(axesForCapability(null)).toEqual(['primary', 'secondary', 'tilt']);
  });

  it('knows which classes tilt', () => {
    expect([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10].filter(c => isTiltCapable(c))).toEqual([1, 2, 4, 5, 9, 10]);
    expect(isTiltCapable(null)).toBe(false);
  });

  it('knows which classes are duolite', () => {
    expect([7, 8, 9, 10].filter(c => isDuolite(c))).toEqual([8, 9, 10]);
  });

  it('limits dual shades to two rails', () => {
    expect(SHADE_KIND_AXES['shade-dual']).toEqual(['primary', 'secondary']);
  });
});

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

describe('resolveDeviceProfile', () => {
  it.each([
    ['io:VenetianBlindIOComponent', 'shade-full', 2],
    ['io:DualRollerShutterIOComponent', 'shade-dual', 7],
    ['io:VerticalExteriorAwningIOComponent', 'shade-primary', 0],
    ['io:ExteriorScreenIOComponent', 'shade-primary', 0],
    ['io:RollerShutterGenericIOComponent', 'shade-primary', 0],
    ['io:HorizontalAwningIOComponent', 'shade-primary', 0],
    ['io:CurtainTrackIOComponent', 'shade-primary', 3],
  ])('%s -> %s', (name, kind, capabilities) => {
    expect(resolveDeviceProfile(name)).toEqual({ kind, capabilities, known: true });
  });

  it('matches DualRollerShutter before RollerShutter', () => {
    expect(resolveDeviceProfile('rts:DualRollerShutterRTSComponent').kind).toBe('shade-dual');
  });

  it('falls back to a full shade for unknown types', () => {
    expect(resolveDeviceProfile('io:SomethingNew')).toEqual({
      kind: 'shade-full',
      capabilities: null,
      known: false,
    });
  });
});

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

describe('deviceAddress', () => {
  it('prefixes the last URL segment', () => {
    expect(deviceAddress('io://1234-5678-9012/12345678')).toBe('sh12345678');
  });

  it('truncates to the address limit', () => {
    const address = deviceAddress('io://1234-5678-9012/123456789012345');
    expect(address).toBe('sh123456789012');
    expect(address.length).toBe(MAX_ADDRESS_LENGTH);
  });

  it('lower-cases', () => {
    expect(deviceAddress('rts://1234/ABCdef')).toBe('shabcdef');
  });
});

describe('sceneAddress', () => {
  it('prefixes the scenario id', () => {
    expect(sceneAddress('1A2B')).toBe('scene1a2b');
  });

  it('truncates long ids', () => {
    expect(sceneAddress('0123456789abcdef')).toBe('scene012345678');
  });
});

describe('numericIdHash', () => {
  it('is stable for the same id', () => {
    expect(numericIdHash('io://x/1')).toBe(numericIdHash('io://x/1'));
  });

  it('stays below one million', () => {
    expect(numericIdHash('a'.repeat(200))).toBeLessThan(1_000_000);
  });
});
