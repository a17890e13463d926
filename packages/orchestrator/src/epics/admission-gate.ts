export type ReleasePermit = () => void;

interface Waiter {
  readonly admit: (release: ReleasePermit) => void;
}

/**
 * Counting semaphore bounding how many sub-tasks run at once.
 *
 * `acquire` resolves with a release callback once a permit is free, or with
 * `undefined` when the signal aborts first. Permits are handed directly to
 * the oldest waiter on release.
 */
export class AdmissionGate {
  readonly capacity: number;
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.available = this.capacity;
  }

  get inFlight(): number {
    return this.capacity - this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<ReleasePermit | undefined> {
    if (signal?.aborted) return Promise.resolve(undefined);

    if (this.available > 0) {
      this.available -= 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        resolve(undefined);
      };

      const waiter: Waiter = {
        admit: (release) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(release);
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private createRelease(): ReleasePermit {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      next.admit(this.createRelease());
      return;
    }
    this.available += 1;
  }
}
