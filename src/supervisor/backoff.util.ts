export interface BackoffOptions {
  initialMs: number;
  multiplier: number;
  /** Ceiling on a single delay. Attempts and total time stay unbounded. */
  maxMs: number;
}

/**
 * Exponential delay sequence: `initialMs * multiplier^n`, capped at `maxMs`.
 * Never resets, so growth continues across reconnects for the lifetime of
 * the instance.
 */
export class ExponentialBackoff {
  private attempts = 0;

  constructor(private readonly options: BackoffOptions) {}

  /** Number of delays handed out so far. */
  get attempt(): number {
    return this.attempts;
  }

  next(): number {
    const { initialMs, multiplier, maxMs } = this.options;
    const delayMs = Math.min(initialMs * multiplier ** this.attempts, maxMs);
    this.attempts++;
    return delayMs;
  }
}
