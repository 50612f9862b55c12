/**
 * Minimum-interval rate limiter.
 *
 * Spaces the *start* of consecutive requests by at least `intervalMs`. Callers
 * queue on a shared promise chain, so concurrent workers using one limiter
 * wait in turn and the interval holds globally, not per worker.
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class RateLimiter {
  private tail: Promise<void> = Promise.resolve();
  private lastStart = Number.NEGATIVE_INFINITY;

  constructor(
    readonly intervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /** Resolve when the caller may start its request. */
  acquire(): Promise<void> {
    const turn = this.tail.then(async () => {
      const wait = this.lastStart + this.intervalMs - this.clock.now();
      if (wait > 0) await this.clock.sleep(wait);
      this.lastStart = this.clock.now();
    });
    this.tail = turn;
    return turn;
  }

  /** Wait for a slot, then run the task. */
  async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    return task();
  }
}
