/**
 * Live entity consumers, by address and by gateway id.
 */

import type { EntityConsumer } from './entity-consumer.js';
import { SceneEntity } from './scene-entity.js';
import { ShadeEntity } from './shade-entity.js';

export class EntityDirectory {
  private readonly byAddress = new Map<string, EntityConsumer>();

  add(entity: EntityConsumer): void {
    this.byAddress.set(entity.address, entity);
  }

  remove(address: string): EntityConsumer | undefined {
    const entity = this.byAddress.get(address);
    this.byAddress.delete(address);
    return entity;
  }

  get(address: string): EntityConsumer | undefined {
    return this.byAddress.get(address);
  }

  has(address: string): boolean {
    return this.byAddress.has(address);
  }

  hasGatewayId(gatewayId: string): boolean {
    for (const entity of this.byAddress.values()) {
      if (entity.gatewayId === gatewayId) return true;
    }
    return false;
  }

  shade(address: string): ShadeEntity | undefined {
    const entity = this.byAddress.get(address);
    return entity instanceof ShadeEntity ? entity : undefined;
  }

  scene(address: string): SceneEntity | undefined {
    const entity = this.byAddress.get(address);
    return entity instanceof SceneEntity ? entity : undefined;
  }

  list(): EntityConsumer[] {
    return [...this.byAddress.values()];
  }

  shades(): ShadeEntity[] {
    return this.list().filter((e): e is ShadeEntity => e instanceof ShadeEntity);
  }

  scenes(): SceneEntity[] {
    return this.list().filter((e): e is SceneEntity => e instanceof SceneEntity);
  }

  get size(): number {
    return this.byAddress.size;
  }
}
