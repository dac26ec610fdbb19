/**
 * Shade Entity Tests
 *
 * Consumer loop behaviour (ordering, membership, filtering) and shade
 * field publication.
 */

import { describe, it, expect } from 'vitest';
import { deviceAddress, numericIdHash, type DeviceRecord } from '@shadebridge/domain';
import type { BridgeContext } from '../src/entities/context.js';
import { ShadeEntity, toGatewayCommands } from '../src/entities/shade-entity.js';
import { STATE, toDeviceRecord } from '../src/gateway/mapping.js';
import { HUB, rawDevice, state } from './support/fake-gateway.js';
import { createTestBridge, settle } from './support/harness.js';

const BLIND_ID = `${HUB}/1001`;
const OTHER_ID = `${HUB}/2002`;

function blindRecord(): DeviceRecord {
  return toDeviceRecord(rawDevice('1001', {
    label: 'Office blind',
    controllableName: 'io:VenetianBlindIOComponent',
    states: [state(STATE.closure, 30)],
  }));
}

async function startShade(ctx: BridgeContext, record: DeviceRecord): Promise<ShadeEntity> {
  ctx.registry.upsertDevice(record);
  const entity = new ShadeEntity(ctx, deviceAddress(record.id), record);
  ctx.host.addEntity(
    { address: entity.address, name: entity.displayName, kind: entity.kind, gatewayId: entity.gatewayId },
    entity.initialStatus(),
  );
  entity.start();
  ctx.ready.raise();
  await settle();
  return entity;
}

function status(ctx: BridgeContext, address: string) {
  return ctx.host.getEntity(address)?.status;
}

describe('ShadeEntity — activation', () => {
  it('publishes every field from the registry once the controller is ready', async () => {
    const { ctx } = createTestBridge();
    const entity = await startShade(ctx, blindRecord());

    expect(entity.state).toBe('active');
    expect(status(ctx, 'sh1001')).toEqual({
      ST: 0,
      GV0: numericIdHash(BLIND_ID),
      GV1: 0,
      GV2: 30,
      GV3: null,
      GV4: 0,
      GV5: 2,
      GV6: 0,
      GV7: 1,
      GV8: null,
    });
    expect(ctx.registry.getDevice(BLIND_ID)?.positions).toEqual({ primary: 30, tilt: 0 });
  });

  it('waits for the ready signal before consuming', async () => {
    const { ctx } = createTestBridge();
    const record = blindRecord();
    ctx.registry.upsertDevice(record);
    const entity = new ShadeEntity(ctx, 'sh1001', record);
    ctx.host.addEntity({ address: 'sh1001', name: 'Office blind', kind: 'shade-full', gatewayId: BLIND_ID }, entity.initialStatus());
    entity.start();
    ctx.queue.publish({ kind: 'device-offline', timestamp: 1, deviceId: BLIND_ID });
    await settle();

    expect(entity.state).toBe('waiting-for-controller');
    expect(ctx.queue.size).toBe(1);

    ctx.ready.raise();
    await settle();
    expect(ctx.queue.size).toBe(0);
    expect(status(ctx, 'sh1001')?.GV7).toBe(0);
  });

  it('exposes only the rails a primary-only shade has', () => {
    const { ctx } = createTestBridge();
    const record = toDeviceRecord(rawDevice('3003'));
    const entity = new ShadeEntity(ctx, 'sh3003', record);

    expect(Object.keys(entity.initialStatus()).sort()).toEqual(['GV0', 'GV1', 'GV2', 'GV5', 'GV6', 'GV7', 'GV8', 'ST']);
  });
});

describe('ShadeEntity — events', () => {
  it('applies state changes to the registry and fields', async () => {
    const { ctx } = createTestBridge();
    await startShade(ctx, blindRecord());

    ctx.queue.publish({
      kind: 'device-state-changed',
      timestamp: 10,
      deviceId: BLIND_ID,
      positions: { primary: 80 },
      moving: true,
      signal: 4,
    });
    await settle();

    expect(ctx.queue.size).toBe(0);
    expect(status(ctx, 'sh1001')).toMatchObject({ ST: 1, GV2: 80, GV4: 0, GV8: 4 });
    expect(ctx.registry.getDevice(BLIND_ID)).toMatchObject({ moving: true, signal: 4, positions: { primary: 80, tilt: 0 } });
  });

  it('tracks availability and battery alerts', async () => {
    const { ctx } = createTestBridge();
    await startShade(ctx, blindRecord());

    ctx.queue.publishAll([
      { kind: 'device-offline', timestamp: 10, deviceId: BLIND_ID },
      { kind: 'battery-alert', timestamp: 11, deviceId: BLIND_ID, batteryStatus: 2 },
    ]);
    await settle();

    expect(status(ctx, 'sh1001')).toMatchObject({ GV6: 2, GV7: 0 });
    expect(ctx.registry.getDevice(BLIND_ID)).toMatchObject({ online: false, batteryStatus: 2 });
  });

  it('processes its records in timestamp order, not queue order', async () => {
    const { ctx } = createTestBridge();
    await startShade(ctx, blindRecord());

    ctx.queue.publishAll([
      { kind: 'device-offline', timestamp: 20, deviceId: BLIND_ID },
      { kind: 'device-online', timestamp: 10, deviceId: BLIND_ID },
    ]);
    await settle();

    expect(ctx.queue.size).toBe(0);
    expect(status(ctx, 'sh1001')?.GV7).toBe(0);
  });

  it('leaves records for other devices alone, even when its own are queued behind them', async () => {
    const { ctx } = createTestBridge();
    await startShade(ctx, blindRecord());

    const foreign = { kind: 'device-offline' as const, timestamp: 5, deviceId: OTHER_ID };
    const own = { kind: 'device-offline' as const, timestamp: 10, deviceId: BLIND_ID };
    ctx.queue.publishAll([foreign, own]);
    await settle();

    expect(ctx.queue.snapshot()).toEqual([foreign, own]);
    expect(status(ctx, 'sh1001')?.GV7).toBe(1);

    ctx.queue.remove(foreign);
    await settle();
    expect(ctx.queue.size).toBe(0);
    expect(status(ctx, 'sh1001')?.GV7).toBe(0);
  });

  it('asks containing scenes to recompute when motion stops', async () => {
    const { ctx } = createTestBridge();
    await startShade(ctx, blindRecord());
    ctx.registry.upsertScene({ id: 'oid-1', label: 'Morning', members: [{ deviceId: BLIND_ID, pos: { pos1: 0 } }] });
    ctx.registry.upsertScene({ id: 'oid-2', label: 'Other', members: [{ deviceId: OTHER_ID, pos: { pos1: 0 } }] });

    ctx.queue.publish({ kind: 'motion-started', timestamp: 10, deviceId: BLIND_ID });
    await settle();
    expect(status(ctx, 'sh1001')?.ST).toBe(1);

    ctx.queue.publish({ kind: 'motion-stopped', timestamp: 11, deviceId: BLIND_ID });
    await settle();

    expect(status(ctx, 'sh1001')?.ST).toBe(0);
    expect(ctx.queue.snapshot()).toEqual([{ kind: 'scene-recompute', deviceId: BLIND_ID, scenes: ['oid-1'] }]);
  });
});

describe('ShadeEntity — home snapshot', () => {
  it('refreshes, removes its own id and drops the snapshot once empty', async () => {
    const { ctx } = createTestBridge();
    await startShade(ctx, blindRecord());
    ctx.registry.mergeDevice(BLIND_ID, { label: 'Study blind', roomId: 7 });

    const snapshot = { kind: 'home-snapshot' as const, devices: [BLIND_ID, OTHER_ID], scenes: [] };
    ctx.queue.publish(snapshot);
    await settle();

    expect(snapshot.devices).toEqual([OTHER_ID]);
    expect(ctx.queue.size).toBe(1);
    expect(ctx.host.getEntity('sh1001')?.name).toBe('Study blind');
    expect(status(ctx, 'sh1001')?.GV1).toBe(7);

    ctx.queue.remove(snapshot);
    ctx.queue.publish({ kind: 'home-snapshot', devices: [BLIND_ID], scenes: [] });
    await settle();
    expect(ctx.queue.size).toBe(0);
  });

  it('only looks at the first snapshot in the queue', async () => {
    const { ctx } = createTestBridge();
    await startShade(ctx, blindRecord());

    const first = { kind: 'home-snapshot' as const, devices: [OTHER_ID], scenes: [] };
    const second = { kind: 'home-snapshot' as const, devices: [BLIND_ID], scenes: [] };
    ctx.queue.publishAll([first, second]);
    await settle();

    expect(second.devices).toEqual([BLIND_ID]);
    expect(ctx.queue.size).toBe(2);
  });
});

describe('ShadeEntity — commands', () => {
  it('translates commands into gateway commands', () => {
    expect(toGatewayCommands({ command: 'my' })).toEqual([{ name: 'my', parameters: [] }]);
    expect(toGatewayCommands({ command: 'tilt-open' })).toEqual([{ name: 'setOrientation', parameters: [50] }]);
    expect(toGatewayCommands({ command: 'tilt-close' })).toEqual([{ name: 'setOrientation', parameters: [0] }]);
    expect(toGatewayCommands({ command: 'set-position', positions: { primary: 40, secondary: null, tilt: 10 } })).toEqual([
      { name: 'setClosure', parameters: [40] },
      { name: 'setOrientation', parameters: [10] },
    ]);
  });

  it('sends each gateway command and reports the shade command', async () => {
    const { ctx, gateway } = createTestBridge();
    const entity = await startShade(ctx, blindRecord());

    const outcome = await entity.execute({ command: 'set-position', positions: { primary: 40, tilt: 10 } });

    expect(outcome).toEqual({ command: 'set-position', executions: ['exec-1', 'exec-2'], accepted: true });
    expect(gateway.commands).toEqual([
      { deviceId: BLIND_ID, command: { name: 'setClosure', parameters: [40] } },
      { deviceId: BLIND_ID, command: { name: 'setOrientation', parameters: [10] } },
    ]);
    expect(ctx.host.getEntity('sh1001')?.reports.map(r => r.command)).toEqual(['set-position']);
  });

  it('marks the outcome unaccepted when the gateway defers', async () => {
    const { ctx, gateway } = createTestBridge();
    const entity = await startShade(ctx, blindRecord());
    gateway.execResults.push(null);

    await expect(entity.execute({ command: 'close' })).resolves.toEqual({
      command: 'close',
      executions: [],
      accepted: false,
    });
  });

  it('stops its loop on request', async () => {
    const { ctx } = createTestBridge();
    const entity = await startShade(ctx, blindRecord());

    entity.stop();
    await entity.finished();
    expect(entity.state).toBe('shutting-down');
  });
});
