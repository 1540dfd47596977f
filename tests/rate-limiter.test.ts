import { describe, it, expect } from "vitest";
import { SlidingWindowRateLimiter } from "../src/services/rate-limiter.js";
import { FakeClock } from "./helpers/fakes.js";

describe("SlidingWindowRateLimiter", () => {
  it("admits up to the limit without waiting", async () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter(3, clock);
    await limiter.admit();
    await limiter.admit();
    await limiter.admit();
    expect(clock.sleeps).toEqual([]);
    expect(limiter.inWindow()).toBe(3);
  });

  it("holds the (max+1)-th admission until the first leaves the window", async () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter(3, clock);
    for (let i = 0; i < 3; i++) await limiter.admit();

    await limiter.admit();

    expect(clock.sleeps).toEqual([60_050]);
    expect(clock.now()).toBeGreaterThanOrEqual(60_000);
    expect(limiter.inWindow()).toBe(1);
  });

  it("waits only for the oldest entry to expire", async () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter(3, clock);
    await limiter.admit();
    clock.advance(30_000);
    await limiter.admit();
    await limiter.admit();
    clock.advance(10_000);

    await limiter.admit();

    expect(clock.sleeps).toEqual([20_050]);
    expect(limiter.inWindow()).toBe(3);
  });

  it("does not wait once old entries have aged out", async () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter(2, clock);
    await limiter.admit();
    await limiter.admit();
    clock.advance(60_000);
    await limiter.admit();
    expect(clock.sleeps).toEqual([]);
    expect(limiter.inWindow()).toBe(1);
  });

  it("serializes concurrent callers", async () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter(2, clock);

    await Promise.all([1, 2, 3, 4, 5].map(() => limiter.admit()));

    expect(clock.sleeps).toEqual([60_050, 60_050]);
    expect(clock.now()).toBe(120_100);
    expect(limiter.inWindow()).toBe(1);
  });

  it("honours a custom safety margin", async () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter(1, clock, 0);
    await limiter.admit();
    await limiter.admit();
    expect(clock.sleeps).toEqual([60_000]);
  });

  it("rejects a limit below one", () => {
    expect(() => new SlidingWindowRateLimiter(0, new FakeClock())).toThrow(RangeError);
  });
});
