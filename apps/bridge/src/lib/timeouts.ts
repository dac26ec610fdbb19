/**
 * Bounded waits on remote acknowledgement.
 */

/** Device and scenario commands. */
export const COMMAND_TIMEOUT_MS = 10_000;
/** Initial gateway connection. */
export const CONNECT_TIMEOUT_MS = 30_000;
/** Whole start-up sequence up to the first reconciliation. */
export const STARTUP_TIMEOUT_MS = 300_000;
/** Host confirmation that a created entity was added. */
export const ENTITY_CONFIRM_TIMEOUT_MS = 10_000;
/** Gateway disconnect during shutdown. */
export const DISCONNECT_TIMEOUT_MS = 10_000;

export class TimeoutError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race `work` against a timer. The underlying operation is not cancelled;
 * only the caller stops waiting for it.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
