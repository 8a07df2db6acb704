export type Release = () => void;

export type SemaphoreStats = {
  slots: number;
  active: number;
  waiting: number;
};

/**
 * Counting semaphore. Waiters are served in arrival order and a released slot
 * is handed straight to the next waiter, so `active` never drops while
 * someone is queued. An aborted waiter leaves the queue and its `acquire`
 * rejects with the signal's reason.
 */
export class Semaphore {
  private active = 0;
  private waiters: Array<() => void> = [];

  constructor(private readonly slots: number) {
    if (!Number.isInteger(slots) || slots < 1) {
      throw new RangeError(`slots must be a positive integer, got ${slots}`);
    }
  }

  async acquire(signal?: AbortSignal): Promise<Release> {
    signal?.throwIfAborted();
    if (this.active < this.slots) {
      this.active += 1;
      return this.releaser();
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(wake);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(signal?.reason);
      };
      const wake = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      this.waiters.push(wake);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
    return this.releaser();
  }

  get stats(): SemaphoreStats {
    return { slots: this.slots, active: this.active, waiting: this.waiters.length };
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) next();
      else this.active -= 1;
    };
  }
}
