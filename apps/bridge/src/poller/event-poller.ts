/**
 * Event Poller
 *
 * Long-lived task that keeps a gateway event listener registered, fetches
 * events about once per second, translates them and publishes the records
 * onto the shared queue.
 *
 * Failure handling:
 *   - listener expired        -> re-register, counted as a retry if that fails
 *   - rate limit / queue full / transient -> exponential backoff
 *   - authentication failure  -> fatal at once
 *   - MAX_RETRIES consecutive failures -> stop and raise the fatal signal once
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { PollerState } from '@shadebridge/contract';
import type { EventQueue } from '../events/event-queue.js';
import { GatewayError, errorMessage, isGatewayError } from '../gateway/errors.js';
import type { EventTranslator } from '../gateway/event-translator.js';
import type { GatewayClient } from '../gateway/types.js';
import type { Logger } from '../lib/logger.js';

export const MAX_RETRIES = 5;
export const BASE_BACKOFF_MS = 1_000;
export const POLL_INTERVAL_MS = 1_000;

export interface PollerFatal {
  reason: 'authentication-failure' | 'retries-exhausted';
  message: string;
}

export interface EventPollerOptions {
  gateway: GatewayClient;
  translator: EventTranslator;
  queue: EventQueue;
  logger: Logger;
  /** Called once when polling gives up. */
  onFatal?: (fatal: PollerFatal) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  pollIntervalMs?: number;
  baseBackoffMs?: number;
}

/** Backoff before retry number `retries` (1-based): base * 2^(retries - 1). */
export function backoffDelay(retries: number, baseMs: number = BASE_BACKOFF_MS): number {
  return baseMs * 2 ** Math.max(0, retries - 1);
}

export class EventPoller {
  private currentState: PollerState = 'idle';
  private stopRequested = false;
  private retries = 0;
  private fatalRaised = false;
  private loop: Promise<void> | undefined;
  private lastEvent: number | null = null;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly pollIntervalMs: number;
  private readonly baseBackoffMs: number;

  constructor(private readonly options: EventPollerOptions) {
    this.log = options.logger.child({ component: 'event-poller' });
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.now = options.now ?? Date.now;
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.baseBackoffMs = options.baseBackoffMs ?? BASE_BACKOFF_MS;
  }

  get state(): PollerState {
    return this.currentState;
  }

  get running(): boolean {
    return this.currentState === 'listening';
  }

  get consecutiveFailures(): number {
    return this.retries;
  }

  /** Time of the last fetch that returned at least one event. */
  get lastEventAt(): number | null {
    return this.lastEvent;
  }

  /** Start polling; no-op while already listening. */
  start(): void {
    if (this.currentState === 'listening') {
      this.log.debug('Poller already running');
      return;
    }
    this.currentState = 'listening';
    this.stopRequested = false;
    this.retries = 0;
    this.fatalRaised = false;
    this.loop = this.run();
  }

  /** Ask the loop to exit after the current cycle and wait for it. */
  async stop(): Promise<void> {
    this.stopRequested = true;
    await this.loop;
  }

  private async run(): Promise<void> {
    this.log.info('Event polling started');
    try {
      while (!this.stopRequested) {
        const keepGoing = await this.cycle();
        if (!keepGoing) break;
        if (this.stopRequested) break;
        await this.sleep(this.pollIntervalMs);
      }
    } finally {
      this.currentState = 'idle';
      this.log.info('Event polling stopped');
    }
  }

  /** One fetch cycle. Resolves false when polling must stop. */
  private async cycle(): Promise<boolean> {
    const { gateway, translator, queue } = this.options;

    try {
      if (!gateway.listenerId) {
        await gateway.registerListener();
      }

      const events = await gateway.fetchEvents();
      this.retries = 0;

      for (const raw of events) {
        queue.publishAll(translator.translate(raw));
      }
      if (events.length > 0) {
        this.lastEvent = this.now();
      }
      return true;
    } catch (err) {
      if (isGatewayError(err, 'listener-expired')) return this.renewListener(err);
      return this.handleFailure(err);
    }
  }

  /**
   * Register a replacement for an expired listener within the same cycle.
   * Only a failed registration counts towards MAX_RETRIES.
   */
  private async renewListener(expired: GatewayError): Promise<boolean> {
    this.log.info({ err: expired.message }, 'Event listener expired; registering a new one');
    try {
      await this.options.gateway.registerListener();
      return true;
    } catch (err) {
      return this.handleFailure(err);
    }
  }

  private async handleFailure(err: unknown): Promise<boolean> {
    if (isGatewayError(err, 'authentication-failure')) {
      this.raiseFatal({ reason: 'authentication-failure', message: err.message });
      return false;
    }

    // A listener left cleared by the client is registered again next cycle.
    const kind = err instanceof GatewayError ? err.kind : 'transient-failure';
    this.retries++;

    if (this.retries >= MAX_RETRIES) {
      this.raiseFatal({
        reason: 'retries-exhausted',
        message: `Polling failed ${this.retries} times in a row: ${errorMessage(err)}`,
      });
      return false;
    }

    const wait = backoffDelay(this.retries, this.baseBackoffMs);
    this.log.warn(
      { code: 'POLL_RETRY', kind, retries: this.retries, waitMs: wait, err: errorMessage(err) },
      'Event fetch failed; backing off',
    );
    await this.sleep(wait);
    return true;
  }

  private raiseFatal(fatal: PollerFatal): void {
    if (this.fatalRaised) return;
    this.fatalRaised = true;
    this.log.error({ code: 'POLLER_FATAL', ...fatal }, 'Event polling gave up');
    this.options.onFatal?.(fatal);
  }
}
