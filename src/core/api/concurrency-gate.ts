/**
 * Bounds the number of API calls on the wire at once.
 *
 * Slots are handed to waiters in FIFO order. The limit is the same K the
 * engine uses for its worker pool.
 */

export class ConcurrencyGate {
  readonly limit: number;
  private active = 0;
  private peakActive = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error('concurrency limit must be a positive integer');
    }
    this.limit = limit;
  }

  /** Calls currently holding a slot. */
  get inFlight(): number {
    return this.active;
  }

  /** Highest number of slots held at once since construction. */
  get peak(): number {
    return this.peakActive;
  }

  /** Wait for a slot; resolves with an idempotent release function. */
  async acquire(): Promise<() => void> {
    if (this.active < this.limit) {
      this.take();
    } else {
      // release() hands the slot over directly, so active stays counted.
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private take(): void {
    this.active += 1;
    this.peakActive = Math.max(this.peakActive, this.active);
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.active -= 1;
  }
}
