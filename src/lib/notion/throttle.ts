type SleepFn = (ms: number) => Promise<void>;

interface RateThrottleOptions {
  minIntervalSeconds: number;
  now?: () => number;
  sleep?: SleepFn;
}

const defaultSleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Spaces outbound calls at least `minIntervalSeconds` apart, measured from the
 * start of the previous call. Waiters queue on a single promise chain, so
 * concurrent callers are released one at a time.
 */
export class RateThrottle {
  private readonly minIntervalMs: number;

  private readonly now: () => number;

  private readonly sleep: SleepFn;

  private lastCallAt: number | null = null;

  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateThrottleOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalSeconds * 1000);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  wait(): Promise<void> {
    const turn = this.tail.then(() => this.acquire());
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private async acquire(): Promise<void> {
    if (this.lastCallAt !== null) {
      const elapsed = this.now() - this.lastCallAt;
      const remaining = this.minIntervalMs - elapsed;
      if (remaining > 0) {
        await this.sleep(remaining);
      }
    }
    this.lastCallAt = this.now();
  }
}
