/**
 * Event Queue
 *
 * Single in-memory queue shared by the poller (producer) and every entity
 * consumer. Records are inspected in place and removed by identity by
 * whichever consumer handles them.
 *
 * Waiting is keyed on a version counter rather than on "non-empty": a
 * consumer that saw the queue at version N sleeps until something is
 * published or removed, so records addressed to other entities do not keep
 * it spinning.
 *
 * Depth is unbounded.
 */

import type { EventRecord } from '@shadebridge/domain';

type Waiter = () => void;

export class EventQueue {
  private readonly records: EventRecord[] = [];
  private waiters: Waiter[] = [];
  private currentVersion = 0;
  private isClosed = false;

  get version(): number {
    return this.currentVersion;
  }

  get size(): number {
    return this.records.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Snapshot copy, for diagnostics and tests. */
  snapshot(): EventRecord[] {
    return [...this.records];
  }

  publish(record: EventRecord): void {
    if (this.isClosed) return;
    this.records.push(record);
    this.bump();
  }

  publishAll(records: readonly EventRecord[]): void {
    if (this.isClosed || records.length === 0) return;
    this.records.push(...records);
    this.bump();
  }

  /**
   * Remove a record by identity. Removing a record that is no longer queued
   * is a no-op.
   */
  remove(record: EventRecord): boolean {
    const index = this.records.indexOf(record);
    if (index === -1) return false;
    this.records.splice(index, 1);
    this.bump();
    return true;
  }

  /**
   * Resolve with the live record list once the queue is non-empty and its
   * version differs from `afterVersion`. Resolves immediately once closed,
   * and on any wake where `cancelled()` reports true.
   *
   * The returned array is the queue itself: callers may read it and must
   * mutate it only through `remove`.
   */
  async consume(afterVersion: number, cancelled: () => boolean = () => false): Promise<readonly EventRecord[]> {
    while (
      !this.isClosed
      && !cancelled()
      && (this.records.length === 0 || this.currentVersion === afterVersion)
    ) {
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }
    return this.records;
  }

  /** Wake every waiter without changing content (e.g. after mutating a membership record in place). */
  touch(): void {
    this.bump();
  }

  /** Shutdown: wake every waiter; consumers observe `closed` and exit. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.wakeAll();
  }

  private bump(): void {
    this.currentVersion++;
    this.wakeAll();
  }

  private wakeAll(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }
}
