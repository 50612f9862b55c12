/**
 * Tests for the minimum-interval rate limiter.
 */

import { describe, expect, it } from "vitest";
import { type Clock, RateLimiter } from "./rate-limiter.js";

class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

describe("RateLimiter", () => {
  it("lets the first request start immediately", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1000, clock);

    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
  });

  it("spaces concurrent callers by the interval", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1000, clock);
    const starts: number[] = [];

    await Promise.all(
      [1, 2, 3].map(() => limiter.schedule(async () => starts.push(clock.now())))
    );

    expect(clock.sleeps).toEqual([1000, 1000]);
    expect(starts).toEqual([0, 1000, 2000]);
  });

  it("only waits for the remainder of the interval", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1000, clock);

    await limiter.acquire();
    clock.time = 400;
    await limiter.acquire();

    expect(clock.sleeps).toEqual([600]);
  });

  it("does not wait once the interval has passed", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1000, clock);

    await limiter.acquire();
    clock.time = 5000;
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
  });

  it("never waits with a zero interval", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(0, clock);

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.sleeps).toEqual([]);
  });

  it("returns the task result", async () => {
    const limiter = new RateLimiter(0, new FakeClock());
    await expect(limiter.schedule(async () => "done")).resolves.toBe("done");
  });
});
