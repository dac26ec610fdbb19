/**
 * Event Translator
 *
 * Turns raw gateway events into queue records. Stateful: it remembers which
 * devices each execution drives so that the terminal execution event can
 * report motion-stopped per device, and which executions were scenarios.
 */

import type { BatteryStatus, EventRecord } from '@shadebridge/domain';
import type { Logger } from '../lib/logger.js';
import { readAvailability, readBattery, readMoving, readSignal, statesToPositions } from './mapping.js';
import type { RawEvent } from './types.js';

interface TrackedExecution {
  devices: string[];
  sceneId?: string;
}

const TERMINAL_EXECUTION_STATES = new Set(['COMPLETED', 'FAILED']);
const ALERT_BATTERY: ReadonlySet<BatteryStatus> = new Set<BatteryStatus>([2, 3]);

/** Executions of each kind we remember before giving up on their terminal event. */
const MAX_TRACKED_EXECUTIONS = 256;

export class EventTranslator {
  private readonly executions = new Map<string, TrackedExecution>();
  private readonly scenarioExecutions = new Map<string, string>();
  private readonly log: Logger;

  constructor(logger: Logger, private readonly now: () => number = Date.now) {
    this.log = logger.child({ component: 'event-translator' });
  }

  /** Remember that `execId` is a run of scenario `sceneId`. */
  trackScenarioExecution(execId: string, sceneId: string): void {
    remember(this.scenarioExecutions, execId, sceneId);
    const known = this.executions.get(execId);
    if (known) known.sceneId = sceneId;
  }

  get trackedExecutions(): number {
    return this.executions.size;
  }

  get trackedScenarioExecutions(): number {
    return this.scenarioExecutions.size;
  }

  /** Whether a run of `sceneId` was sent or registered and has not ended. */
  isScenarioRunning(sceneId: string): boolean {
    for (const id of this.scenarioExecutions.values()) {
      if (id === sceneId) return true;
    }
    for (const execution of this.executions.values()) {
      if (execution.sceneId === sceneId) return true;
    }
    return false;
  }

  translate(raw: RawEvent): EventRecord[] {
    const timestamp = raw.timestamp ?? this.now();

    switch (raw.name) {
      case 'DeviceStateChangedEvent':
        return this.deviceStateChanged(raw, timestamp);

      case 'DeviceAvailableEvent':
        return raw.deviceURL ? [{ kind: 'device-online', timestamp, deviceId: raw.deviceURL }] : [];

      case 'DeviceUnavailableEvent':
        return raw.deviceURL ? [{ kind: 'device-offline', timestamp, deviceId: raw.deviceURL }] : [];

      case 'ExecutionRegisteredEvent':
        return this.executionRegistered(raw, timestamp);

      case 'ExecutionStateChangedEvent':
        return this.executionStateChanged(raw, timestamp);

      case 'ScenarioAddedEvent':
      case 'ScenarioUpdatedEvent':
        return [{ kind: 'scene-added', timestamp, sceneId: raw.actionGroupOID ?? '' }];

      case 'ScenarioRemovedEvent':
        return [{ kind: 'scene-removed', timestamp, sceneId: raw.actionGroupOID ?? '' }];

      case 'DeviceCreatedEvent':
      case 'DeviceAddedEvent':
        return [{ kind: 'device-added', timestamp, deviceId: raw.deviceURL ?? '' }];

      case 'DeviceRemovedEvent':
      case 'DeviceDeletedEvent':
        return [{ kind: 'device-removed', timestamp, deviceId: raw.deviceURL ?? '' }];

      case 'GatewayAliveEvent':
        this.log.debug('Gateway alive');
        return [];

      default:
        this.log.debug({ event: raw.name }, 'Unhandled gateway event');
        return [];
    }
  }

  // ── Device state ──

  private deviceStateChanged(raw: RawEvent, timestamp: number): EventRecord[] {
    const deviceId = raw.deviceURL;
    if (!deviceId) {
      this.log.warn({ code: 'EVENT_MALFORMED', event: raw.name }, 'Device state event without deviceURL');
      return [];
    }
    const states = raw.deviceStates ?? [];
    const records: EventRecord[] = [];

    const positions = statesToPositions(states);
    const moving = readMoving(states);
    const signal = readSignal(states);
    if (Object.keys(positions).length > 0 || moving !== undefined || signal !== undefined) {
      records.push({ kind: 'device-state-changed', timestamp, deviceId, positions, moving, signal });
    }

    const battery = readBattery(states);
    if (battery !== undefined && ALERT_BATTERY.has(battery)) {
      records.push({ kind: 'battery-alert', timestamp, deviceId, batteryStatus: battery });
    }

    const available = readAvailability(states);
    if (available !== undefined) {
      records.push(available
        ? { kind: 'device-online', timestamp, deviceId }
        : { kind: 'device-offline', timestamp, deviceId });
    }

    return records;
  }

  // ── Executions ──

  private executionRegistered(raw: RawEvent, timestamp: number): EventRecord[] {
    const execId = raw.execId;
    if (!execId) return [];

    const devices = [...new Set((raw.actions ?? []).map(a => a.deviceURL))];
    const sceneId = this.scenarioExecutions.get(execId) ?? raw.actionGroupOID;
    remember(this.executions, execId, { devices, sceneId });

    const records: EventRecord[] = devices.map((deviceId): EventRecord => ({ kind: 'motion-started', timestamp, deviceId }));
    if (sceneId) {
      records.push({ kind: 'scene-activated', timestamp, sceneId });
    }
    return records;
  }

  private executionStateChanged(raw: RawEvent, timestamp: number): EventRecord[] {
    const execId = raw.execId;
    if (!execId || !raw.newState || !TERMINAL_EXECUTION_STATES.has(raw.newState)) return [];

    const tracked = this.executions.get(execId);
    this.executions.delete(execId);
    this.scenarioExecutions.delete(execId);
    if (!tracked) return [];

    const records: EventRecord[] = tracked.devices.map((deviceId): EventRecord => ({ kind: 'motion-stopped', timestamp, deviceId }));
    if (tracked.sceneId && raw.newState === 'FAILED') {
      records.push({ kind: 'scene-deactivated', timestamp, sceneId: tracked.sceneId });
    }
    return records;
  }
}

function remember<V>(tracked: Map<string, V>, execId: string, value: V): void {
  if (!tracked.has(execId) && tracked.size >= MAX_TRACKED_EXECUTIONS) {
    const oldest = tracked.keys().next();
    if (!oldest.done) tracked.delete(oldest.value);
  }
  tracked.set(execId, value);
}
