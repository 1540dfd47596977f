import { setTimeout as sleep } from "node:timers/promises";
import { log } from "../log.js";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleep(ms);
  },
};

const WINDOW_MS = 60_000;

/**
 * Sliding 60-second window of admissions. Callers are served one at a time,
 * so concurrent chunks of a batch never read the window at the same moment.
 */
export class SlidingWindowRateLimiter {
  private timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly maxPerMinute: number,
    private readonly clock: Clock = systemClock,
    private readonly safetyMarginMs = 50,
  ) {
    if (maxPerMinute < 1) throw new RangeError("maxPerMinute must be at least 1");
  }

  admit(): Promise<void> {
    const turn = this.tail.then(() => this.acquire());
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /** Admissions currently inside the window. */
  inWindow(): number {
    this.prune(this.clock.now());
    return this.timestamps.length;
  }

  private async acquire(): Promise<void> {
    this.prune(this.clock.now());

    if (this.timestamps.length >= this.maxPerMinute) {
      const oldest = this.timestamps[0] ?? this.clock.now();
      const wait = WINDOW_MS - (this.clock.now() - oldest) + this.safetyMarginMs;
      log.debug(`Rate limit reached, waiting ${(wait / 1000).toFixed(1)}s`);
      await this.clock.sleep(wait);
      this.prune(this.clock.now());
    }

    this.timestamps.push(this.clock.now());
  }

  private prune(now: number): void {
    while (this.timestamps.length > 0 && now - (this.timestamps[0] ?? now) >= WINDOW_MS) {
      this.timestamps.shift();
    }
  }
}
