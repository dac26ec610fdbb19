/**
 * Bridge Controller
 *
 * Orchestrates start-up and shutdown, owns the poller and the reconciler,
 * and runs its own queue consumer for inventory changes:
 *
 *   device-added / device-removed / scene-removed / scene-added (new scene)
 *     -> run a reconciliation pass
 *
 * It also clears records nobody will consume: timestamped records whose
 * target has no live entity, and membership ids of retired entities.
 * Without that, an orphaned record with the earliest timestamp would stall
 * every consumer.
 *
 * The controller is itself a host entity: ST 0 stopped, 1 running,
 * 2 failed; GV0 node count.
 */

import {
  CONTROLLER_ADDRESS,
  earliestTimestamped,
  eventTargetId,
  resolveDeviceProfile,
  type EventRecord,
  type TimestampedEvent,
} from '@shadebridge/domain';
import type { BridgeStatus, CommandResult, DeviceApi, DiscoveryResult, SceneApi } from '@shadebridge/contract';
import { Reconciler, type ReconcilerOptions } from '../discovery/reconciler.js';
import type { BridgeContext } from '../entities/context.js';
import { EntityDirectory } from '../entities/entity-directory.js';
import type { ShadeCommand } from '../entities/shade-entity.js';
import { errorMessage, isGatewayError } from '../gateway/errors.js';
import { toDeviceRecord, toSceneRecord } from '../gateway/mapping.js';
import type { Logger } from '../lib/logger.js';
import {
  CONNECT_TIMEOUT_MS,
  DISCONNECT_TIMEOUT_MS,
  STARTUP_TIMEOUT_MS,
  withTimeout,
} from '../lib/timeouts.js';
import { EventPoller, type EventPollerOptions, type PollerFatal } from '../poller/event-poller.js';
import { toDeviceApi, toSceneApi } from './read-models.js';

export type ControllerStatus = 0 | 1 | 2;

export const CONTROLLER_STATUS = {
  stopped: 0,
  running: 1,
  failed: 2,
} as const satisfies Record<string, ControllerStatus>;

export const NOTICE = {
  starting: 'starting',
  connection: 'connection',
  discovery: 'discovery',
  poller: 'poller',
} as const;

export interface BridgeControllerOptions {
  name?: string;
  poller?: Pick<EventPollerOptions, 'sleep' | 'now' | 'pollIntervalMs' | 'baseBackoffMs'>;
  reconciler?: ReconcilerOptions;
  connectTimeoutMs?: number;
  startupTimeoutMs?: number;
  disconnectTimeoutMs?: number;
  /** Called after the poller gave up, once the controller recorded it. */
  onFatal?: (fatal: PollerFatal) => void;
}

export interface QueryAllResult {
  devices: number;
  scenes: number;
}

const RECONCILE_KINDS: ReadonlySet<TimestampedEvent['kind']> = new Set<TimestampedEvent['kind']>([
  'device-added',
  'device-removed',
  'scene-removed',
]);

export class BridgeController {
  readonly entities = new EntityDirectory();
  readonly poller: EventPoller;
  readonly reconciler: Reconciler;

  private currentStatus: ControllerStatus = CONTROLLER_STATUS.stopped;
  private heartbeat: 'DON' | 'DOF' | null = null;
  private idleTicks = 0;
  private lastSeenEventAt: number | null = null;
  private loop: Promise<void> | undefined;
  private readonly log: Logger;
  private readonly name: string;

  constructor(
    private readonly ctx: BridgeContext,
    private readonly options: BridgeControllerOptions = {},
  ) {
    this.log = ctx.logger.child({ component: 'controller' });
    this.name = options.name ?? 'Shade Bridge';
    this.reconciler = new Reconciler(ctx, this.entities, options.reconciler);
    this.poller = new EventPoller({
      gateway: ctx.gateway,
      translator: ctx.translator,
      queue: ctx.queue,
      logger: ctx.logger,
      onFatal: fatal => this.handlePollerFatal(fatal),
      ...options.poller,
    });
  }

  get status(): ControllerStatus {
    return this.currentStatus;
  }

  get ready(): boolean {
    return this.ctx.ready.set;
  }

  // ── Lifecycle ──

  /**
   * Connect, run the first discovery, publish the initial home snapshot
   * and release every entity. Resolves false when start-up failed; the
   * failure is visible on ST and as an operator notice.
   */
  async start(): Promise<boolean> {
    const { host, gateway, registry, queue, ready } = this.ctx;

    if (!host.hasEntity(CONTROLLER_ADDRESS)) {
      host.addEntity(
        { address: CONTROLLER_ADDRESS, name: this.name, kind: 'controller', gatewayId: null },
        { ST: CONTROLLER_STATUS.stopped, GV0: 0 },
      );
    }

    this.setControllerStatus(CONTROLLER_STATUS.running);
    host.setNotice(NOTICE.starting, 'Starting: connecting to the gateway');
    this.log.info('Starting bridge');

    try {
      await withTimeout(gateway.connect(), this.options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS, 'gateway connect');
    } catch (err) {
      const message = isGatewayError(err, 'authentication-failure')
        ? `Gateway rejected the bearer token: ${err.message}`
        : `Cannot connect to the gateway: ${errorMessage(err)}`;
      return this.failStartup(NOTICE.connection, message, err);
    }

    host.setNotice(NOTICE.starting, 'Starting: discovering devices and scenes');
    let discovery: DiscoveryResult;
    try {
      discovery = await withTimeout(
        this.reconciler.reconcile(),
        this.options.startupTimeoutMs ?? STARTUP_TIMEOUT_MS,
        'initial discovery',
      );
    } catch (err) {
      return this.failStartup(NOTICE.discovery, `Initial discovery did not finish: ${errorMessage(err)}`, err);
    }
    if (discovery.status === 'failed') {
      return this.failStartup(NOTICE.discovery, `Initial discovery failed: ${discovery.error}`);
    }
    this.updateNodeCount();

    queue.publish({ kind: 'home-snapshot', devices: registry.deviceIds(), scenes: registry.sceneIds() });
    this.poller.start();
    this.loop = this.run();

    ready.raise();
    host.clearNotice(NOTICE.starting);
    this.log.info(
      { devices: registry.deviceIds().length, scenes: registry.sceneIds().length },
      'Bridge ready',
    );
    return true;
  }

  async stop(): Promise<void> {
    const { shutdown, queue, gateway } = this.ctx;
    this.log.info('Stopping bridge');

    shutdown.raise();
    queue.close();
    await this.poller.stop();
    await Promise.all(this.entities.list().map(entity => entity.finished()));
    await this.loop;

    try {
      await withTimeout(gateway.disconnect(), this.options.disconnectTimeoutMs ?? DISCONNECT_TIMEOUT_MS, 'gateway disconnect');
    } catch (err) {
      this.log.warn({ code: 'DISCONNECT_FAILED', err: errorMessage(err) }, 'Gateway disconnect failed');
    }

    this.setControllerStatus(CONTROLLER_STATUS.stopped);
    this.log.info('Bridge stopped');
  }

  private failStartup(noticeKey: string, message: string, err?: unknown): false {
    this.log.error({ code: 'STARTUP_FAILED', err: err === undefined ? undefined : errorMessage(err) }, message);
    this.setControllerStatus(CONTROLLER_STATUS.failed);
    this.ctx.host.clearNotice(NOTICE.starting);
    this.ctx.host.setNotice(noticeKey, message);
    return false;
  }

  private handlePollerFatal(fatal: PollerFatal): void {
    if (fatal.reason === 'authentication-failure') {
      this.setControllerStatus(CONTROLLER_STATUS.failed);
      this.ctx.host.setNotice(NOTICE.poller, `Gateway rejected the bearer token: ${fatal.message}`);
    } else {
      this.ctx.host.setNotice(NOTICE.poller, fatal.message);
    }
    this.options.onFatal?.(fatal);
  }

  // ── Periodic ──

  /**
   * Short-poll tick: flip the heartbeat, track idle ticks and restart the
   * poller if it stopped. Does nothing before start-up finished or while
   * discovery runs.
   */
  shortPoll(): void {
    if (!this.ready || this.ctx.shutdown.set || this.reconciler.running) return;

    this.heartbeat = this.heartbeat === 'DON' ? 'DOF' : 'DON';
    this.ctx.host.reportCommand(CONTROLLER_ADDRESS, this.heartbeat);

    const lastEventAt = this.poller.lastEventAt;
    if (lastEventAt !== this.lastSeenEventAt) {
      this.lastSeenEventAt = lastEventAt;
      this.idleTicks = 0;
    } else {
      this.idleTicks++;
    }

    if (!this.poller.running && this.currentStatus !== CONTROLLER_STATUS.failed) {
      this.log.info({ code: 'POLLER_RESTART' }, 'Event poller not running; restarting');
      this.ctx.host.clearNotice(NOTICE.poller);
      this.poller.start();
    }
  }

  // ── Queue consumer ──

  private async run(): Promise<void> {
    const { queue, shutdown } = this.ctx;
    let seen = -1;

    while (!shutdown.set) {
      const records = await queue.consume(seen);
      if (shutdown.set || queue.closed) break;
      seen = queue.version;
      await this.step(records);
    }
    this.log.debug('Controller loop exited');
  }

  private async step(records: readonly EventRecord[]): Promise<void> {
    this.pruneMembership(records);

    const earliest = earliestTimestamped(records);
    if (!earliest) return;

    if (this.triggersReconcile(earliest)) {
      this.ctx.queue.remove(earliest);
      this.log.info({ kind: earliest.kind, target: eventTargetId(earliest) }, 'Inventory changed; reconciling');
      try {
        await this.discover();
      } catch (err) {
        this.log.error({ code: 'RECONCILE_FAILED', err }, 'Reconciliation after inventory change failed');
      }
      return;
    }

    const target = eventTargetId(earliest);
    if (target === undefined || !this.entities.hasGatewayId(target)) {
      this.log.debug({ kind: earliest.kind, target }, 'No entity for event; dropping');
      this.ctx.queue.remove(earliest);
    }
  }

  private triggersReconcile(record: TimestampedEvent): boolean {
    if (RECONCILE_KINDS.has(record.kind)) return true;
    return record.kind === 'scene-added' && !this.entities.hasGatewayId(record.sceneId);
  }

  /** Drop ids of entities that no longer exist from membership records. */
  private pruneMembership(records: readonly EventRecord[]): void {
    const { queue } = this.ctx;
    const isLive = (id: string): boolean => this.entities.hasGatewayId(id);

    for (const record of [...records]) {
      if (record.kind === 'home-snapshot') {
        retainInPlace(record.devices, isLive);
        retainInPlace(record.scenes, isLive);
        if (record.devices.length === 0 && record.scenes.length === 0) queue.remove(record);
      } else if (record.kind === 'scene-recompute') {
        retainInPlace(record.scenes, isLive);
        if (record.scenes.length === 0) queue.remove(record);
      }
    }
  }

  // ── Operations ──

  async discover(): Promise<DiscoveryResult> {
    const result = await this.reconciler.reconcile();
    if (result.status === 'ok') {
      this.updateNodeCount();
      this.ctx.host.clearNotice(NOTICE.discovery);
    } else if (result.status === 'failed') {
      this.ctx.host.setNotice(NOTICE.discovery, `Discovery failed: ${result.error}`);
    }
    return result;
  }

  /**
   * Re-read every known device and scenario from the gateway and ask every
   * entity to republish its fields.
   */
  async queryAll(): Promise<QueryAllResult> {
    const { gateway, registry, queue, host } = this.ctx;
    const devices = await gateway.listDevices();
    const scenarios = await gateway.listScenarios();

    let deviceCount = 0;
    for (const raw of devices) {
      if (!registry.getDevice(raw.deviceURL)) continue;
      registry.upsertDevice(toDeviceRecord(raw, resolveDeviceProfile(raw.controllableName)));
      deviceCount++;
    }
    let sceneCount = 0;
    for (const raw of scenarios) {
      if (!registry.getScene(raw.oid)) continue;
      registry.upsertScene(toSceneRecord(raw));
      sceneCount++;
    }

    queue.publish({ kind: 'home-snapshot', devices: registry.deviceIds(), scenes: registry.sceneIds() });
    host.reportCommand(CONTROLLER_ADDRESS, 'query');
    return { devices: deviceCount, scenes: sceneCount };
  }

  clearNotices(): void {
    this.ctx.host.clearNotices();
  }

  /** Undefined when no shade lives at `address`. */
  async executeDeviceCommand(address: string, command: ShadeCommand): Promise<CommandResult | undefined> {
    const shade = this.entities.shade(address);
    if (!shade) return undefined;
    const outcome = await shade.execute(command);
    return { address, ...outcome };
  }

  async activateScene(address: string): Promise<CommandResult | undefined> {
    const scene = this.entities.scene(address);
    if (!scene) return undefined;
    const outcome = await scene.activate();
    return { address, ...outcome };
  }

  queryDevice(address: string): DeviceApi | undefined {
    const shade = this.entities.shade(address);
    if (!shade) return undefined;
    shade.query();
    return toDeviceApi(shade, this.ctx.registry, this.ctx.host);
  }

  queryScene(address: string): SceneApi | undefined {
    const scene = this.entities.scene(address);
    if (!scene) return undefined;
    scene.query();
    return toSceneApi(scene, this.ctx.registry, this.ctx.host);
  }

  // ── Read models ──

  listDevices(): DeviceApi[] {
    const result: DeviceApi[] = [];
    for (const shade of this.entities.shades()) {
      const device = toDeviceApi(shade, this.ctx.registry, this.ctx.host);
      if (device) result.push(device);
    }
    return result;
  }

  getDevice(address: string): DeviceApi | undefined {
    const shade = this.entities.shade(address);
    return shade ? toDeviceApi(shade, this.ctx.registry, this.ctx.host) : undefined;
  }

  listScenes(): SceneApi[] {
    return this.entities.scenes().map(scene => toSceneApi(scene, this.ctx.registry, this.ctx.host));
  }

  getScene(address: string): SceneApi | undefined {
    const scene = this.entities.scene(address);
    return scene ? toSceneApi(scene, this.ctx.registry, this.ctx.host) : undefined;
  }

  statusReport(): BridgeStatus {
    return {
      ready: this.ready,
      status: this.currentStatus,
      nodeCount: this.ctx.host.listEntities().length,
      poller: this.poller.state,
      discoveryRunning: this.reconciler.running,
      heartbeat: this.heartbeat,
      idleTicks: this.idleTicks,
      notices: this.ctx.host.listNotices(),
    };
  }

  // ── Helpers ──

  private setControllerStatus(status: ControllerStatus): void {
    this.currentStatus = status;
    this.ctx.host.setStatus(CONTROLLER_ADDRESS, 'ST', status);
  }

  private updateNodeCount(): void {
    this.ctx.host.setStatus(CONTROLLER_ADDRESS, 'GV0', this.ctx.host.listEntities().length);
  }
}

function retainInPlace(ids: string[], keep: (id: string) => boolean): void {
  for (let i = ids.length - 1; i >= 0; i--) {
    if (!keep(ids[i])) ids.splice(i, 1);
  }
}
