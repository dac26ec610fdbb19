/**
 * Entity address derivation.
 *
 * Addresses are what the host framework keys entities by: lower-case,
 * at most 14 characters.
 */

export const MAX_ADDRESS_LENGTH = 14;

/** Address of the controller entity. Never retired by reconciliation. */
export const CONTROLLER_ADDRESS = 'bridge';

function clamp(raw: string): string {
  return raw.slice(0, MAX_ADDRESS_LENGTH).toLowerCase();
}

/**
 * `io://1234-5678-9012/12345678` -> `sh12345678`
 */
export function deviceAddress(deviceUrl: string): string {
  const segments = deviceUrl.split('/');
  const tail = segments[segments.length - 1] ?? '';
  return clamp(`sh${tail}`);
}

export function sceneAddress(sceneId: string): string {
  return clamp(`scene${sceneId}`);
}

/**
 * Stable numeric id for display fields (GV0). Entities report a hash of
 * their gateway id because the id itself is not numeric.
 */
export function numericIdHash(id: string): number {
  let hash = 0;
  for (let i = 0; i < id.length; i++) {
    hash = (hash * 31 + id.charCodeAt(i)) % 1_000_000;
  }
  return hash;
}
