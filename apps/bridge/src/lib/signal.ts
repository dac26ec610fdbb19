/**
 * One-shot latch: waiters resolve once `raise()` has been called, and every
 * later `wait()` resolves immediately.
 */
export class Signal {
  private isSet = false;
  private resolveWait: () => void = () => undefined;
  private readonly waiting: Promise<void>;

  constructor() {
    this.waiting = new Promise<void>(resolve => {
      this.resolveWait = resolve;
    });
  }

  get set(): boolean {
    return this.isSet;
  }

  raise(): void {
    if (this.isSet) return;
    this.isSet = true;
    this.resolveWait();
  }

  wait(): Promise<void> {
    return this.waiting;
  }
}
