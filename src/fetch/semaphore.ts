/**
 * Counting gate. `acquire` resolves with a release function once a slot is free;
 * waiters are served in FIFO order.
 */
export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;
  private held = 0;

  constructor(readonly capacity: number) {
    this.available = Math.max(1, Math.floor(capacity));
  }

  /** Slots currently held. */
  get inUse(): number {
    return this.held;
  }

  /** Callers waiting for a slot. */
  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
      return this.grant();
    }

    return await new Promise<() => void>((resolve) => {
      this.waiters.push(() => resolve(this.grant()));
    });
  }

  /** Run `task` while holding a slot; the slot is released however `task` settles. */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private grant(): () => void {
    this.held += 1;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held -= 1;
      this.release();
    };
  }

  private release() {
    const next = this.waiters.shift();
    if (next) {
      // hand the slot straight to the next waiter
      next();
    } else {
      this.available += 1;
    }
  }
}
