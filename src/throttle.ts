/**
 * Spaces polling ticks by a fixed interval.
 *
 * The first `skips` ticks start immediately so that a consumer gets its
 * first values without waiting. After that, the first throttled tick waits
 * one full interval and every later tick starts no sooner than one interval
 * after the previous tick completed. Deadlines are taken from the monotonic
 * clock.
 */

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TickThrottle {
  public readonly intervalMs: number;

  private skipsRemaining: number;
  private nextAllowed: number | null = null;

  constructor(intervalMs: number, skips = 0) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`Invalid poll interval: ${intervalMs}`);
    }
    if (!Number.isInteger(skips) || skips < 0) {
      throw new RangeError(`Invalid skip count: ${skips}`);
    }
    this.intervalMs = intervalMs;
    this.skipsRemaining = skips;
  }

  /** Ticks still exempt from throttling */
  get skips(): number {
    return this.skipsRemaining;
  }

  /** Resolve once the next tick may start */
  async wait(): Promise<void> {
    if (this.skipsRemaining > 0) {
      this.skipsRemaining--;
      return;
    }
    const now = performance.now();
    if (this.nextAllowed === null) {
      this.nextAllowed = now + this.intervalMs;
    }
    const delay = this.nextAllowed - now;
    if (delay > 0) {
      await sleep(delay);
    }
  }

  /** Record that a tick produced its result */
  complete(): void {
    this.nextAllowed = performance.now() + this.intervalMs;
  }
}
