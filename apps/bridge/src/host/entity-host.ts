/**
 * Entity Host
 *
 * The host framework the bridge publishes entities into: it owns entity
 * lifecycle (add, confirm, retire), their status fields, command reports
 * and operator notices. The in-memory implementation backs the HTTP read
 * models and the tests.
 */

import { EventEmitter } from 'node:events';
import type { EntityKind } from '@shadebridge/domain';
import { withTimeout } from '../lib/timeouts.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StatusValue = number | null;
export type StatusFields = Record<string, StatusValue>;

export type HostedKind = EntityKind | 'controller';

export interface EntityDescriptor {
  address: string;
  name: string;
  kind: HostedKind;
  /** Gateway id (device URL or scenario OID); null for the controller. */
  gatewayId: string | null;
}

export interface CommandReport {
  command: string;
  at: number;
}

export interface HostedEntityView extends EntityDescriptor {
  status: StatusFields;
  confirmed: boolean;
  reports: CommandReport[];
}

export interface Notice {
  key: string;
  message: string;
}

export interface EntityHost {
  /** Register an entity; confirmation arrives asynchronously. */
  addEntity(entity: EntityDescriptor, initialStatus: StatusFields): void;
  /** Resolve once `address` is confirmed; reject with TimeoutError after `timeoutMs`. */
  waitForEntity(address: string, timeoutMs: number): Promise<void>;
  hasEntity(address: string): boolean;
  getEntity(address: string): HostedEntityView | undefined;
  listEntities(): HostedEntityView[];
  retireEntity(address: string): boolean;
  renameEntity(address: string, name: string): void;
  setStatus(address: string, field: string, value: StatusValue): void;
  reportCommand(address: string, command: string): void;

  setNotice(key: string, message: string): void;
  clearNotice(key: string): void;
  clearNotices(): void;
  listNotices(): Notice[];
}

// ---------------------------------------------------------------------------
// In-memory implementation
// ---------------------------------------------------------------------------

const MAX_REPORTS = 20;

interface HostedEntity {
  descriptor: EntityDescriptor;
  status: StatusFields;
  confirmed: boolean;
  reports: CommandReport[];
}

export class InMemoryEntityHost implements EntityHost {
  private readonly entities = new Map<string, HostedEntity>();
  private readonly notices = new Map<string, string>();
  private readonly events = new EventEmitter();

  constructor(private readonly now: () => number = Date.now) {
    this.events.setMaxListeners(0);
  }

  addEntity(entity: EntityDescriptor, initialStatus: StatusFields): void {
    const hosted: HostedEntity = {
      descriptor: { ...entity },
      status: { ...initialStatus },
      confirmed: false,
      reports: [],
    };
    this.entities.set(entity.address, hosted);

    // The host acknowledges on a later tick, like a real framework would.
    setImmediate(() => {
      if (this.entities.get(entity.address) !== hosted) return;
      hosted.confirmed = true;
      this.events.emit(`added:${entity.address}`);
    });
  }

  async waitForEntity(address: string, timeoutMs: number): Promise<void> {
    if (this.entities.get(address)?.confirmed) return;

    const eventName = `added:${address}`;
    let listener: (() => void) | undefined;
    const added = new Promise<void>(resolve => {
      listener = resolve;
      this.events.once(eventName, resolve);
    });
    try {
      await withTimeout(added, timeoutMs, `confirm entity ${address}`);
    } finally {
      if (listener) this.events.off(eventName, listener);
    }
  }

  hasEntity(address: string): boolean {
    return this.entities.has(address);
  }

  getEntity(address: string): HostedEntityView | undefined {
    const hosted = this.entities.get(address);
    return hosted ? toView(hosted) : undefined;
  }

  listEntities(): HostedEntityView[] {
    return [...this.entities.values()].map(toView);
  }

  retireEntity(address: string): boolean {
    return this.entities.delete(address);
  }

  renameEntity(address: string, name: string): void {
    const hosted = this.entities.get(address);
    if (hosted) hosted.descriptor.name = name;
  }

  setStatus(address: string, field: string, value: StatusValue): void {
    const hosted = this.entities.get(address);
    if (hosted) hosted.status[field] = value;
  }

  reportCommand(address: string, command: string): void {
    const hosted = this.entities.get(address);
    if (!hosted) return;
    hosted.reports.push({ command, at: this.now() });
    if (hosted.reports.length > MAX_REPORTS) hosted.reports.shift();
  }

  setNotice(key: string, message: string): void {
    this.notices.set(key, message);
  }

  clearNotice(key: string): void {
    this.notices.delete(key);
  }

  clearNotices(): void {
    this.notices.clear();
  }

  listNotices(): Notice[] {
    return [...this.notices.entries()].map(([key, message]) => ({ key, message }));
  }
}

function toView(hosted: HostedEntity): HostedEntityView {
  return {
    ...hosted.descriptor,
    status: { ...hosted.status },
    confirmed: hosted.confirmed,
    reports: [...hosted.reports],
  };
}
