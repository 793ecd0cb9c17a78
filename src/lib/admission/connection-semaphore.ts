/**
 * A held slot. `release()` is idempotent and reports whether this call
 * actually returned the slot.
 */
export interface SemaphorePermit {
  readonly released: boolean;
  release(): boolean;
}

/**
 * Process-local counting semaphore for persistent connections.
 *
 * Non-blocking only: a caller that cannot get a slot is rejected at once
 * instead of queueing behind one that already waits.
 */
export class ConnectionSemaphore {
  private held = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
  }

  tryAcquire(): SemaphorePermit | null {
    if (this.held >= this.capacity) {
      return null;
    }
    this.held++;

    let released = false;
    return {
      get released() {
        return released;
      },
      release: () => {
        if (released) return false;
        released = true;
        this.held--;
        return true;
      },
    };
  }

  get inUse(): number {
    return this.held;
  }

  get available(): number {
    return this.capacity - this.held;
  }
}
