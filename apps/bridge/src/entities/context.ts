/**
 * Collaborators every entity consumer shares with the controller.
 */

import { EventQueue } from '../events/event-queue.js';
import { EventTranslator } from '../gateway/event-translator.js';
import type { GatewayClient } from '../gateway/types.js';
import { InMemoryEntityHost, type EntityHost } from '../host/entity-host.js';
import type { Logger } from '../lib/logger.js';
import { Signal } from '../lib/signal.js';
import { EntityRegistry } from '../registry/entity-registry.js';

export interface BridgeContext {
  queue: EventQueue;
  registry: EntityRegistry;
  host: EntityHost;
  gateway: GatewayClient;
  translator: EventTranslator;
  logger: Logger;
  /** Raised by the controller once start-up finished. */
  ready: Signal;
  /** Raised once on shutdown; consumers exit at their next wake. */
  shutdown: Signal;
}

/** Result of a command forwarded to the gateway. */
export interface CommandOutcome {
  command: string;
  executions: string[];
  /** False when the gateway asked for the command to be re-issued later. */
  accepted: boolean;
}

export interface BridgeContextOptions {
  gateway: GatewayClient;
  logger: Logger;
  host?: EntityHost;
  now?: () => number;
}

export function createBridgeContext(options: BridgeContextOptions): BridgeContext {
  const now = options.now ?? Date.now;
  return {
    queue: new EventQueue(),
    registry: new EntityRegistry(),
    host: options.host ?? new InMemoryEntityHost(now),
    gateway: options.gateway,
    translator: new EventTranslator(options.logger, now),
    logger: options.logger,
    ready: new Signal(),
    shutdown: new Signal(),
  };
}
