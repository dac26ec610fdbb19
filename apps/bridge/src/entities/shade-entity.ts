/**
 * Shade entity.
 *
 * One class for every shade kind; the kind only selects which position
 * fields the entity exposes:
 *
 *   shade-full     GV2 primary, GV3 secondary, GV4 tilt
 *   shade-dual     GV2 primary, GV3 secondary
 *   shade-primary  GV2 primary
 *
 * Common fields: ST in motion, GV0 id hash, GV1 room, GV5 capability class,
 * GV6 battery, GV7 online, GV8 signal.
 */

import {
  SHADE_KIND_AXES,
  axesForCapability,
  isTiltCapable,
  numericIdHash,
  type DeviceRecord,
  type HomeSnapshotEvent,
  type PositionAxis,
  type Positions,
  type ShadeKind,
  type TimestampedEvent,
} from '@shadebridge/domain';
import type { DeviceCommand } from '../gateway/types.js';
import type { StatusFields } from '../host/entity-host.js';
import { COMMAND_TIMEOUT_MS, withTimeout } from '../lib/timeouts.js';
import type { BridgeContext, CommandOutcome } from './context.js';
import { EntityConsumer } from './entity-consumer.js';

// ---------------------------------------------------------------------------
// Fields and commands
// ---------------------------------------------------------------------------

export const AXIS_FIELD: Readonly<Record<PositionAxis, string>> = {
  primary: 'GV2',
  secondary: 'GV3',
  tilt: 'GV4',
};

export type ShadeCommand =
  | { command: 'open' | 'close' | 'stop' | 'my' | 'tilt-open' | 'tilt-close' }
  | { command: 'set-position'; positions: Positions };

const TILT_OPEN = 50;
const TILT_CLOSED = 0;

const SET_COMMAND: Readonly<Record<PositionAxis, string>> = {
  primary: 'setClosure',
  secondary: 'setDeployment',
  tilt: 'setOrientation',
};

/** Gateway commands that carry out one shade command. */
export function toGatewayCommands(command: ShadeCommand): DeviceCommand[] {
  switch (command.command) {
    case 'open':
    case 'close':
    case 'stop':
    case 'my':
      return [{ name: command.command, parameters: [] }];
    case 'tilt-open':
      return [{ name: 'setOrientation', parameters: [TILT_OPEN] }];
    case 'tilt-close':
      return [{ name: 'setOrientation', parameters: [TILT_CLOSED] }];
    case 'set-position': {
      const commands: DeviceCommand[] = [];
      for (const axis of ['primary', 'secondary', 'tilt'] as const) {
        const value = command.positions[axis];
        if (value !== undefined && value !== null) {
          commands.push({ name: SET_COMMAND[axis], parameters: [value] });
        }
      }
      return commands;
    }
  }
}

const HANDLED_KINDS: ReadonlySet<TimestampedEvent['kind']> = new Set<TimestampedEvent['kind']>([
  'device-state-changed',
  'motion-started',
  'motion-stopped',
  'device-online',
  'device-offline',
  'battery-alert',
]);

// ---------------------------------------------------------------------------
// Entity
// ---------------------------------------------------------------------------

export class ShadeEntity extends EntityConsumer {
  readonly shadeKind: ShadeKind;
  private readonly fields: readonly PositionAxis[];

  constructor(ctx: BridgeContext, address: string, device: DeviceRecord) {
    super(ctx, address, device.id, device.kind, device.label);
    this.shadeKind = device.kind;
    this.fields = SHADE_KIND_AXES[device.kind];
  }

  initialStatus(): StatusFields {
    const status: StatusFields = {
      ST: 0,
      GV0: numericIdHash(this.gatewayId),
      GV1: 0,
      GV5: null,
      GV6: 0,
      GV7: 1,
      GV8: null,
    };
    for (const axis of this.fields) status[AXIS_FIELD[axis]] = null;
    return status;
  }

  protected handles(record: TimestampedEvent): boolean {
    return HANDLED_KINDS.has(record.kind);
  }

  protected snapshotIds(snapshot: HomeSnapshotEvent): string[] {
    return snapshot.devices;
  }

  refreshFromRegistry(): void {
    const device = this.ctx.registry.getDevice(this.gatewayId);
    if (!device) {
      this.log.debug('No registry record to refresh from');
      return;
    }
    this.rename(device.label);
    this.setStatus('ST', device.moving ? 1 : 0);
    this.setStatus('GV1', device.roomId);
    this.setStatus('GV5', device.capabilities);
    this.setStatus('GV6', device.batteryStatus);
    this.setStatus('GV7', device.online ? 1 : 0);
    this.setStatus('GV8', device.signal);
    this.updatePositions(device.positions);
  }

  /**
   * Store positions and show the axes this capability class reports.
   * Tilt-capable shades without a tilt reading show 0.
   */
  updatePositions(positions: Positions): void {
    const { registry } = this.ctx;
    const current = registry.updatePositions(this.gatewayId, positions);
    if (!current) return;

    let merged = current.positions;
    if (isTiltCapable(current.capabilities) && (merged.tilt === undefined || merged.tilt === null)) {
      merged = registry.updatePositions(this.gatewayId, { tilt: 0 })?.positions ?? merged;
    }

    for (const axis of axesForCapability(current.capabilities)) {
      if (!this.fields.includes(axis)) continue;
      this.setStatus(AXIS_FIELD[axis], merged[axis] ?? null);
    }
  }

  protected handleEvent(record: TimestampedEvent): void {
    const { registry } = this.ctx;

    switch (record.kind) {
      case 'device-state-changed':
        if (record.moving !== undefined) {
          registry.mergeDevice(this.gatewayId, { moving: record.moving });
          this.setStatus('ST', record.moving ? 1 : 0);
        }
        if (record.signal !== undefined) {
          registry.mergeDevice(this.gatewayId, { signal: record.signal });
          this.setStatus('GV8', record.signal);
        }
        this.updatePositions(record.positions);
        return;

      case 'motion-started':
        registry.mergeDevice(this.gatewayId, { moving: true });
        this.setStatus('ST', 1);
        return;

      case 'motion-stopped':
        registry.mergeDevice(this.gatewayId, { moving: false });
        this.setStatus('ST', 0);
        this.requestSceneRecompute();
        return;

      case 'device-online':
      case 'device-offline': {
        const online = record.kind === 'device-online';
        registry.mergeDevice(this.gatewayId, { online });
        this.setStatus('GV7', online ? 1 : 0);
        return;
      }

      case 'battery-alert':
        registry.mergeDevice(this.gatewayId, { batteryStatus: record.batteryStatus });
        this.setStatus('GV6', record.batteryStatus);
        this.log.warn({ code: 'BATTERY_LOW', batteryStatus: record.batteryStatus }, 'Shade battery low');
        return;

      default:
        return;
    }
  }

  /** Ask every scene containing this shade to recompute its activity. */
  private requestSceneRecompute(): void {
    const scenes = this.ctx.registry.scenesContaining(this.gatewayId);
    if (scenes.length === 0) return;
    this.ctx.queue.publish({ kind: 'scene-recompute', deviceId: this.gatewayId, scenes });
  }

  // ── Commands ──

  async execute(command: ShadeCommand): Promise<CommandOutcome> {
    const executions: string[] = [];
    let accepted = true;

    for (const gatewayCommand of toGatewayCommands(command)) {
      const execId = await withTimeout(
        this.ctx.gateway.executeCommand(this.gatewayId, gatewayCommand),
        COMMAND_TIMEOUT_MS,
        `${gatewayCommand.name} on ${this.address}`,
      );
      if (execId) {
        executions.push(execId);
      } else {
        accepted = false;
      }
    }

    this.report(command.command);
    this.log.info({ command: command.command, executions, accepted }, 'Shade command sent');
    return { command: command.command, executions, accepted };
  }

  query(): void {
    this.refreshFromRegistry();
    this.report('query');
  }
}
