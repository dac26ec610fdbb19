/**
 * HTTP Control API Tests
 *
 * Full server built with buildServer and exercised through inject; the
 * controller runs against the in-process gateway.
 */

import { afterEach, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { numericIdHash } from '@shadebridge/domain';
import { BridgeController } from '../src/controller/bridge-controller.js';
import { GatewayError } from '../src/gateway/errors.js';
import { STATE } from '../src/gateway/mapping.js';
import { buildServer } from '../src/server.js';
import { FakeGateway, HUB, rawDevice, rawScenario, state } from './support/fake-gateway.js';
import { createTestBridge, settle } from './support/harness.js';

const cleanup: Array<() => Promise<void>> = [];

afterEach(async () => {
  for (const step of cleanup.splice(0)) await step();
});

async function setup(options: { start?: boolean } = {}) {
  const gateway = new FakeGateway();
  gateway.devices = [
    rawDevice('1001', { label: 'Kitchen', states: [state(STATE.closure, 30)] }),
    rawDevice('2002', { label: 'Office blind', controllableName: 'io:VenetianBlindIOComponent' }),
  ];
  gateway.scenarios = [
    rawScenario('oid-1', 'Morning', [{ deviceURL: `${HUB}/1001`, commands: [{ name: 'setClosure', parameters: [30] }] }]),
  ];

  const { ctx } = createTestBridge(gateway);
  const controller = new BridgeController(ctx, {
    poller: {
      sleep: () => ctx.shutdown.wait(),
    },
  });
  const app: FastifyInstance = await buildServer(controller, { logger: false, corsOrigin: '*' });
  cleanup.push(async () => {
    await app.close();
    await controller.stop();
  });

  if (options.start ?? true) {
    await controller.start();
    await settle();
  }
  return { app, ctx, gateway, controller };
}

describe('Health', () => {
  it('reports readiness', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    const body = JSON.parse(res.body);
    expect(body.status).toBe('ok');
    expect(body.ready).toBe(true);
  });
});

describe('Request ids', () => {
  it('echoes an inbound X-Request-Id', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/health', headers: { 'x-request-id': 'req-123' } });
    expect(res.headers['x-request-id']).toBe('req-123');
  });

  it('generates one when none is sent', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(String(res.headers['x-request-id'])).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('Devices API', () => {
  it('lists shades', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/devices' });
    expect(res.statusCode).toBe(200);
    const devices: Array<{ address: string; kind: string }> = JSON.parse(res.body).data.devices;
    expect(devices.map(d => [d.address, d.kind])).toEqual([
      ['sh1001', 'shade-primary'],
      ['sh2002', 'shade-full'],
    ]);
  });

  it('returns one shade with its status fields', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/devices/sh1001' });
    expect(res.statusCode).toBe(200);
    const { device } = JSON.parse(res.body).data;
    expect(device.name).toBe('Kitchen');
    expect(device.positions).toEqual({ primary: 30 });
    expect(device.status.GV2).toBe(30);
  });

  it('returns 404 for an unknown address', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/devices/sh9999' });
    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body)).toEqual({ error: { code: 'NOT_FOUND', message: 'No shade at address sh9999' } });
  });

  it('forwards a position command', async () => {
    const { app, gateway } = await setup();

    const res = await app.inject({
      method: 'POST',
      url: '/api/devices/sh1001/commands',
      payload: { command: 'set-position', positions: { primary: 40 } },
    });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({
      data: { address: 'sh1001', command: 'set-position', executions: ['exec-1'], accepted: true },
    });
    expect(gateway.commands).toEqual([
      { deviceId: `${HUB}/1001`, command: { name: 'setClosure', parameters: [40] } },
    ]);
  });

  it('answers 202 when the gateway defers the command', async () => {
    const { app, gateway } = await setup();
    gateway.execResults.push(null);

    const res = await app.inject({ method: 'POST', url: '/api/devices/sh1001/commands', payload: { command: 'close' } });
    expect(res.statusCode).toBe(202);
    expect(JSON.parse(res.body).data.accepted).toBe(false);
  });

  it('rejects an unknown command', async () => {
    const { app, gateway } = await setup();

    const res = await app.inject({ method: 'POST', url: '/api/devices/sh1001/commands', payload: { command: 'spin' } });
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error.code).toBe('VALIDATION_ERROR');
    expect(gateway.commands).toEqual([]);
  });

  it('maps a gateway failure to 502', async () => {
    const { app, gateway } = await setup();
    gateway.execResults.push(new GatewayError('authentication-failure', 'Forbidden'));

    const res = await app.inject({ method: 'POST', url: '/api/devices/sh1001/commands', payload: { command: 'stop' } });
    expect(res.statusCode).toBe(502);
    expect(JSON.parse(res.body)).toEqual({
      error: { code: 'GATEWAY_COMMAND_FAILED', message: 'Forbidden', details: { kind: 'authentication-failure' } },
    });
  });

  it('refuses commands before start-up finished', async () => {
    const { app } = await setup({ start: false });

    const res = await app.inject({ method: 'POST', url: '/api/devices/sh1001/commands', payload: { command: 'open' } });
    expect(res.statusCode).toBe(503);
    expect(JSON.parse(res.body)).toEqual({
      error: { code: 'NOT_READY', message: 'Bridge is still starting or failed to start' },
    });
  });
});

describe('Scenes API', () => {
  it('returns a scene with its calculated activity', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/scenes/sceneoid-1' });
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body).data.scene).toEqual({
      address: 'sceneoid-1',
      name: 'Morning',
      sceneId: 'oid-1',
      memberCount: 1,
      active: true,
      gatewayActive: false,
      status: { ST: 1, GV0: numericIdHash('oid-1') },
    });
  });

  it('activates a scene', async () => {
    const { app, gateway } = await setup();

    const res = await app.inject({ method: 'POST', url: '/api/scenes/sceneoid-1/activate' });
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body).data).toEqual({
      address: 'sceneoid-1',
      command: 'activate',
      executions: ['exec-1'],
      accepted: true,
    });
    expect(gateway.scenarioRuns).toEqual(['oid-1']);
  });

  it('returns 404 when activating an unknown scene', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'POST', url: '/api/scenes/scenenope/activate' });
    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body).error.message).toBe('No scene at address scenenope');
  });
});

describe('Bridge API', () => {
  it('reports controller status', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/bridge/status' });
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body).data).toMatchObject({ ready: true, status: 1, nodeCount: 4, poller: 'listening' });
  });

  it('runs a discovery pass on request', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'POST', url: '/api/bridge/discover' });
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body).data).toEqual({ status: 'ok', devices: 2, scenes: 1, created: 0, retired: 0 });
  });

  it('maps a failed discovery to 502', async () => {
    const { app, gateway } = await setup();
    gateway.listFailures.push(new GatewayError('transient-failure', 'Gateway unreachable: socket hang up'));

    const res = await app.inject({ method: 'POST', url: '/api/bridge/discover' });
    expect(res.statusCode).toBe(502);
    expect(JSON.parse(res.body)).toEqual({
      error: { code: 'DISCOVERY_FAILED', message: 'Gateway unreachable: socket hang up' },
    });
  });

  it('clears operator notices', async () => {
    const { app, ctx } = await setup();
    ctx.host.setNotice('discovery', 'Discovery failed: boom');

    const res = await app.inject({ method: 'DELETE', url: '/api/bridge/notices' });
    expect(res.statusCode).toBe(204);
    expect(ctx.host.listNotices()).toEqual([]);
  });
});
