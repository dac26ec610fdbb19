/**
 * Entity Consumer Loop
 *
 * Each device and scene entity runs one of these: it waits for the
 * controller to become ready, then repeatedly inspects the shared queue and
 * consumes only what is addressed to it.
 *
 * Per wake:
 *   1. home-snapshot listing this entity -> refresh from the registry
 *   2. kind-specific membership records
 *   3. the earliest timestamped record, if it targets this entity and is a
 *      kind this entity handles
 */

import {
  earliestTimestamped,
  eventTargetId,
  findHomeSnapshot,
  type EntityKind,
  type EventRecord,
  type HomeSnapshotEvent,
  type TimestampedEvent,
} from '@shadebridge/domain';
import type { Logger } from '../lib/logger.js';
import type { StatusFields } from '../host/entity-host.js';
import type { BridgeContext } from './context.js';

export type ConsumerState = 'waiting-for-controller' | 'active' | 'shutting-down';

export abstract class EntityConsumer {
  private currentState: ConsumerState = 'waiting-for-controller';
  private loop: Promise<void> | undefined;
  private stopped = false;
  protected readonly log: Logger;

  protected constructor(
    protected readonly ctx: BridgeContext,
    readonly address: string,
    readonly gatewayId: string,
    readonly kind: EntityKind,
    protected name: string,
  ) {
    this.log = ctx.logger.child({ component: 'entity', address, kind });
  }

  get state(): ConsumerState {
    return this.currentState;
  }

  get displayName(): string {
    return this.name;
  }

  /** Status fields the host shows before the first update. */
  abstract initialStatus(): StatusFields;

  /** Which gateway event kinds this entity consumes. */
  protected abstract handles(record: TimestampedEvent): boolean;

  /** Apply a record addressed to this entity. It is already off the queue. */
  protected abstract handleEvent(record: TimestampedEvent): Promise<void> | void;

  /** The membership list of a home snapshot this entity belongs to. */
  protected abstract snapshotIds(snapshot: HomeSnapshotEvent): string[];

  /** Re-read this entity's record from the registry and publish it. */
  abstract refreshFromRegistry(): void;

  /** Applied when a home snapshot lists this entity. */
  protected onSnapshot(): void {
    this.refreshFromRegistry();
  }

  /** First action once the controller is ready. */
  protected onActivate(): void {
    this.refreshFromRegistry();
  }

  /** Kind-specific membership records; default none. */
  protected processMembership(_records: readonly EventRecord[]): void {}

  // ── Lifecycle ──

  start(): void {
    if (this.loop) return;
    this.loop = this.run();
  }

  /** Stop after the current step; used when the entity is retired. */
  stop(): void {
    this.stopped = true;
    this.ctx.queue.touch();
  }

  /** Resolves when the loop has exited. */
  async finished(): Promise<void> {
    await this.loop;
  }

  private async run(): Promise<void> {
    const { ready, shutdown, queue } = this.ctx;

    await Promise.race([ready.wait(), shutdown.wait()]);
    if (shutdown.set || this.stopped) {
      this.currentState = 'shutting-down';
      return;
    }

    this.currentState = 'active';
    try {
      this.onActivate();
    } catch (err) {
      this.log.error({ code: 'ENTITY_ACTIVATE_FAILED', err }, 'Entity activation failed');
    }

    let seen = -1;
    while (!this.stopped) {
      const records = await queue.consume(seen, () => this.stopped);
      if (shutdown.set || queue.closed || this.stopped) break;
      seen = queue.version;
      await this.step(records);
    }

    this.currentState = 'shutting-down';
    this.log.debug('Consumer loop exited');
  }

  private async step(records: readonly EventRecord[]): Promise<void> {
    try {
      this.processSnapshot(records);
      this.processMembership(records);
    } catch (err) {
      this.log.error({ code: 'ENTITY_MEMBERSHIP_FAILED', err }, 'Failed to process membership records');
    }

    const earliest = earliestTimestamped(records);
    if (!earliest || eventTargetId(earliest) !== this.gatewayId || !this.handles(earliest)) {
      return;
    }

    this.ctx.queue.remove(earliest);
    try {
      await this.handleEvent(earliest);
    } catch (err) {
      this.log.error({ code: 'ENTITY_EVENT_FAILED', kind: earliest.kind, err }, 'Failed to apply event');
    }
  }

  private processSnapshot(records: readonly EventRecord[]): void {
    const snapshot = findHomeSnapshot(records);
    if (!snapshot) return;

    const ids = this.snapshotIds(snapshot);
    const index = ids.indexOf(this.gatewayId);
    if (index === -1) return;

    ids.splice(index, 1);
    if (snapshot.devices.length === 0 && snapshot.scenes.length === 0) {
      this.ctx.queue.remove(snapshot);
    }
    this.onSnapshot();
  }

  // ── Shared helpers ──

  protected rename(label: string): void {
    if (!label || label === this.name) return;
    this.log.info({ from: this.name, to: label }, 'Renaming entity');
    this.name = label;
    this.ctx.host.renameEntity(this.address, label);
  }

  protected setStatus(field: string, value: number | null): void {
    this.ctx.host.setStatus(this.address, field, value);
  }

  protected report(command: string): void {
    this.ctx.host.reportCommand(this.address, command);
  }
}
