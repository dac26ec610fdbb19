/**
 * Discovery / Reconciliation
 *
 * Aligns the set of live entities with the gateway inventory:
 *   1. devices   -> registry record + shade entity for every new address
 *   2. scenarios -> registry record + scene entity for every new address
 *   3. retire every entity (except the controller) not seen in this pass
 *
 * Not re-entrant: a call while a pass is running resolves `already-running`.
 * Best effort: a failure part-way leaves what was already done in place.
 */

import {
  CONTROLLER_ADDRESS,
  deviceAddress,
  resolveDeviceProfile,
  sceneAddress,
} from '@shadebridge/domain';
import type { DiscoveryResult } from '@shadebridge/contract';
import type { BridgeContext } from '../entities/context.js';
import type { EntityConsumer } from '../entities/entity-consumer.js';
import type { EntityDirectory } from '../entities/entity-directory.js';
import { SceneEntity } from '../entities/scene-entity.js';
import { ShadeEntity } from '../entities/shade-entity.js';
import { errorMessage } from '../gateway/errors.js';
import { toDeviceRecord, toSceneRecord } from '../gateway/mapping.js';
import type { Logger } from '../lib/logger.js';
import { ENTITY_CONFIRM_TIMEOUT_MS, TimeoutError } from '../lib/timeouts.js';

export interface ReconcilerOptions {
  confirmTimeoutMs?: number;
}

export class Reconciler {
  private inProgress = false;
  private readonly log: Logger;
  private readonly confirmTimeoutMs: number;

  constructor(
    private readonly ctx: BridgeContext,
    private readonly directory: EntityDirectory,
    options: ReconcilerOptions = {},
  ) {
    this.log = ctx.logger.child({ component: 'reconciler' });
    this.confirmTimeoutMs = options.confirmTimeoutMs ?? ENTITY_CONFIRM_TIMEOUT_MS;
  }

  get running(): boolean {
    return this.inProgress;
  }

  async reconcile(): Promise<DiscoveryResult> {
    if (this.inProgress) {
      this.log.info({ code: 'DISCOVERY_ALREADY_RUNNING' }, 'Discovery already in progress');
      return { status: 'already-running' };
    }
    this.inProgress = true;

    try {
      const devices = await this.ctx.gateway.listDevices();
      const scenarios = await this.ctx.gateway.listScenarios();
      const observed = new Set<string>([CONTROLLER_ADDRESS]);
      let created = 0;

      for (const raw of devices) {
        try {
          const address = deviceAddress(raw.deviceURL);
          const profile = resolveDeviceProfile(raw.controllableName);
          if (!profile.known) {
            this.log.warn(
              { code: 'UNKNOWN_DEVICE_TYPE', controllableName: raw.controllableName, label: raw.label },
              'Unknown device type; using a full shade',
            );
          }
          const record = toDeviceRecord(raw, profile);
          this.ctx.registry.upsertDevice(record);
          observed.add(address);

          const existing = this.directory.get(address);
          if (existing && existing.gatewayId !== record.id) {
            this.log.warn(
              { code: 'ADDRESS_COLLISION', address, existing: existing.gatewayId, incoming: record.id },
              'Two devices map to the same address',
            );
          }
          if (!existing) {
            this.log.info({ address, label: record.label, kind: record.kind }, 'Adding shade entity');
            await this.addEntity(new ShadeEntity(this.ctx, address, record));
            created++;
          }
        } catch (err) {
          this.log.error({ code: 'DISCOVERY_DEVICE_FAILED', deviceURL: raw.deviceURL, err }, 'Error discovering device');
        }
      }

      for (const raw of scenarios) {
        try {
          const address = sceneAddress(raw.oid);
          const record = toSceneRecord(raw);
          this.ctx.registry.upsertScene(record);
          observed.add(address);

          if (!this.directory.has(address)) {
            this.log.info({ address, label: record.label }, 'Adding scene entity');
            await this.addEntity(new SceneEntity(this.ctx, address, record.id, record.label));
            created++;
          }
        } catch (err) {
          this.log.error({ code: 'DISCOVERY_SCENE_FAILED', oid: raw.oid, err }, 'Error discovering scenario');
        }
      }

      const retired = this.retireUnobserved(observed);

      if (created === 0 && retired === 0) {
        this.log.info('Discovery: no new activity');
      } else {
        this.log.info({ created, retired }, 'Discovery complete');
      }
      return { status: 'ok', devices: devices.length, scenes: scenarios.length, created, retired };
    } catch (err) {
      this.log.error({ code: 'DISCOVERY_FAILED', err }, 'Discovery failed');
      return { status: 'failed', error: errorMessage(err) };
    } finally {
      this.inProgress = false;
    }
  }

  /**
   * Publish the entity to the host, wait (bounded) for confirmation, then
   * start its consumer loop. A missing confirmation is logged and the pass
   * carries on.
   */
  private async addEntity(entity: EntityConsumer): Promise<void> {
    const { host } = this.ctx;
    host.addEntity(
      { address: entity.address, name: entity.displayName, kind: entity.kind, gatewayId: entity.gatewayId },
      entity.initialStatus(),
    );
    this.directory.add(entity);

    try {
      await host.waitForEntity(entity.address, this.confirmTimeoutMs);
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      this.log.warn({ code: 'ENTITY_CONFIRM_TIMEOUT', address: entity.address }, 'Host did not confirm entity in time');
    }
    entity.start();
  }

  private retireUnobserved(observed: ReadonlySet<string>): number {
    const { host, registry } = this.ctx;
    let retired = 0;

    for (const entity of this.directory.list()) {
      if (observed.has(entity.address)) continue;
      this.log.info({ address: entity.address }, 'Retiring entity no longer on the gateway');
      entity.stop();
      this.directory.remove(entity.address);
      host.retireEntity(entity.address);
      if (entity instanceof SceneEntity) {
        registry.removeScene(entity.gatewayId);
      } else {
        registry.removeDevice(entity.gatewayId);
      }
      retired++;
    }

    // Host entities with no consumer (left over from an earlier run).
    for (const hosted of host.listEntities()) {
      if (observed.has(hosted.address) || this.directory.has(hosted.address)) continue;
      this.log.info({ address: hosted.address }, 'Retiring orphaned host entity');
      host.retireEntity(hosted.address);
      retired++;
    }

    return retired;
  }
}
