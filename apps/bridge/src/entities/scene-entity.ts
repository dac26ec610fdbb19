/**
 * Scene entity.
 *
 * ST shows whether the scene is in effect, calculated from member shade
 * positions. GV0 carries a hash of the scenario id.
 */

import {
  checkGatewayAgreement,
  evaluateSceneActivity,
  numericIdHash,
  type EventRecord,
  type HomeSnapshotEvent,
  type SceneActivity,
  type SceneRecomputeEvent,
  type TimestampedEvent,
} from '@shadebridge/domain';
import { toSceneRecord } from '../gateway/mapping.js';
import type { StatusFields } from '../host/entity-host.js';
import { COMMAND_TIMEOUT_MS, withTimeout } from '../lib/timeouts.js';
import type { BridgeContext, CommandOutcome } from './context.js';
import { EntityConsumer } from './entity-consumer.js';

export class SceneEntity extends EntityConsumer {
  constructor(ctx: BridgeContext, address: string, sceneId: string, label: string) {
    super(ctx, address, sceneId, 'scene', label);
  }

  initialStatus(): StatusFields {
    return { ST: 0, GV0: numericIdHash(this.gatewayId) };
  }

  protected handles(record: TimestampedEvent): boolean {
    return record.kind === 'scene-activated'
      || record.kind === 'scene-deactivated'
      || record.kind === 'scene-added';
  }

  protected snapshotIds(snapshot: HomeSnapshotEvent): string[] {
    return snapshot.scenes;
  }

  protected onActivate(): void {
    this.refreshFromRegistry();
    this.calcActive();
  }

  /** Member positions may have moved with the snapshot. */
  protected onSnapshot(): void {
    this.refreshFromRegistry();
    this.calcActive();
  }

  refreshFromRegistry(): void {
    const scene = this.ctx.registry.getScene(this.gatewayId);
    if (scene) this.rename(scene.label);
  }

  /**
   * A member shade stopped moving: recompute if it is one of ours, then take
   * this scene off the record's list.
   */
  protected processMembership(records: readonly EventRecord[]): void {
    const pending = records.filter(
      (r): r is SceneRecomputeEvent =>
        r.kind === 'scene-recompute' && r.scenes.includes(this.gatewayId),
    );

    for (const record of pending) {
      const scene = this.ctx.registry.getScene(this.gatewayId);
      if (scene?.members.some(m => m.deviceId === record.deviceId)) {
        this.log.debug({ deviceId: record.deviceId }, 'Member shade stopped; recomputing');
        this.calcActive({ memberStopped: true });
      }

      const index = record.scenes.indexOf(this.gatewayId);
      if (index !== -1) record.scenes.splice(index, 1);
      if (record.scenes.length === 0) {
        this.ctx.queue.remove(record);
      }
    }
  }

  protected async handleEvent(record: TimestampedEvent): Promise<void> {
    const { registry } = this.ctx;

    switch (record.kind) {
      case 'scene-activated':
        registry.markGatewayActive(this.gatewayId);
        this.calcActive();
        return;

      case 'scene-deactivated':
        registry.markGatewayInactive(this.gatewayId);
        this.calcActive();
        return;

      case 'scene-added':
        // Redefined on the gateway: pull the new definition first.
        await this.reloadDefinition();
        this.calcActive();
        return;

      default:
        return;
    }
  }

  private async reloadDefinition(): Promise<void> {
    const scenarios = await this.ctx.gateway.listScenarios();
    const raw = scenarios.find(s => s.oid === this.gatewayId);
    if (!raw) {
      this.log.warn({ code: 'SCENE_DEFINITION_MISSING' }, 'Scenario no longer listed by the gateway');
      return;
    }
    const scene = toSceneRecord(raw);
    this.ctx.registry.upsertScene(scene);
    this.rename(scene.label);
    this.log.info({ members: scene.members.length }, 'Scene definition updated from gateway');
  }

  /**
   * Evaluate member positions, publish the result on ST and report DON/DOF.
   * A disagreement with the gateway-reported state is logged, not corrected.
   *
   * The gateway only reports a scenario run failing, never a completed one
   * falling out of effect. So when a member stops with no run of this scene
   * in flight and the scene is out of effect, the gateway-active mark from
   * the last run is dropped instead.
   */
  calcActive(options: { memberStopped?: boolean } = {}): SceneActivity {
    const { registry, translator } = this.ctx;
    const scene = registry.getScene(this.gatewayId);
    const activity: SceneActivity = scene
      ? evaluateSceneActivity(scene, id => registry.getDevice(id))
      : { active: false, reason: 'EVALUATION_ERROR' };

    registry.setCalculatedActive(this.gatewayId, activity.active);
    this.setStatus('ST', activity.active ? 1 : 0);
    this.report(activity.active ? 'DON' : 'DOF');

    if (activity.active) {
      this.log.debug('Scene in effect');
    } else {
      this.log.debug({ reason: activity.reason, deviceId: activity.deviceId }, 'Scene not in effect');
    }

    if (
      !activity.active
      && options.memberStopped
      && registry.isGatewayActive(this.gatewayId)
      && !translator.isScenarioRunning(this.gatewayId)
    ) {
      registry.markGatewayInactive(this.gatewayId);
      this.log.debug('Completed scenario run no longer in effect');
    }

    const agreement = checkGatewayAgreement(
      this.gatewayId,
      registry.calculatedActiveSet(),
      registry.gatewayActiveSet(),
    );
    if (!agreement.agrees) {
      this.log.warn(
        { code: 'SCENE_CALC_MISMATCH', calculated: agreement.calculated, reported: agreement.reported },
        'Calculated scene activity differs from gateway',
      );
    }
    return activity;
  }

  // ── Commands ──

  async activate(): Promise<CommandOutcome> {
    const execId = await withTimeout(
      this.ctx.gateway.executeScenario(this.gatewayId),
      COMMAND_TIMEOUT_MS,
      `activate ${this.address}`,
    );
    if (execId) {
      this.ctx.translator.trackScenarioExecution(execId, this.gatewayId);
    }
    this.report('activate');
    this.log.info({ execId }, 'Scene activation sent');
    return { command: 'activate', executions: execId ? [execId] : [], accepted: execId !== null };
  }

  query(): SceneActivity {
    this.refreshFromRegistry();
    const activity = this.calcActive();
    this.report('query');
    return activity;
  }
}
