/**
 * Gateway failure taxonomy.
 *
 * Every transport or API failure leaves the client as a GatewayError with
 * one of these kinds; callers branch on `kind`, never on message text.
 */

export type GatewayErrorKind =
  | 'authentication-failure' // token rejected; fatal until reconfigured
  | 'listener-expired'       // event listener id no longer valid
  | 'rate-limited'
  | 'queue-full'             // gateway execution queue saturated
  | 'transient-failure';     // network, timeout, 5xx

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly status?: number;

  constructor(kind: GatewayErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'GatewayError';
    this.kind = kind;
    this.status = options.status;
  }

  /** Whether retrying the same call later can succeed without operator action. */
  get retryable(): boolean {
    return this.kind !== 'authentication-failure';
  }
}

export function isGatewayError(err: unknown, kind?: GatewayErrorKind): err is GatewayError {
  return err instanceof GatewayError && (kind === undefined || err.kind === kind);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
