/**
 * Validation of the operator-supplied gateway credentials.
 */

export type ValidationResult = { valid: true } | { valid: false; error: string };

const PIN_PATTERN = /^\d{4}-\d{4}-\d{4}$/;

export const MIN_TOKEN_LENGTH = 20;

const PLACEHOLDER_FRAGMENTS = [
  'your-bearer-token',
  'abc123',
  'example',
  'token-here',
  'paste-token',
];

/** Gateway PIN, e.g. `2001-0001-1891`. */
export function validateGatewayPin(pin: string | undefined | null): ValidationResult {
  if (!pin || !pin.trim()) {
    return { valid: false, error: 'Gateway PIN is required' };
  }
  if (!PIN_PATTERN.test(pin.trim())) {
    return { valid: false, error: 'Gateway PIN must look like 1234-5678-9012' };
  }
  return { valid: true };
}

/** Bearer token generated by the gateway's developer mode. */
export function validateBearerToken(token: string | undefined | null): ValidationResult {
  if (!token || !token.trim()) {
    return { valid: false, error: 'Bearer token is required' };
  }
  const trimmed = token.trim();

  if (trimmed.length < MIN_TOKEN_LENGTH) {
    return {
      valid: false,
      error: `Bearer token is too short (${trimmed.length} characters, expected at least ${MIN_TOKEN_LENGTH})`,
    };
  }
  if (/\s/.test(trimmed)) {
    return { valid: false, error: 'Bearer token must not contain spaces or line breaks' };
  }

  const lower = trimmed.toLowerCase();
  const placeholder = PLACEHOLDER_FRAGMENTS.find(fragment => lower.includes(fragment));
  if (placeholder) {
    return { valid: false, error: 'Bearer token looks like placeholder text' };
  }

  return { valid: true };
}
