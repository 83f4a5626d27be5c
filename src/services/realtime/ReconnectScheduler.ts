export interface ReconnectPolicy {
  baseIntervalMs: number;
  maxIntervalMs: number;
  decay: number;
  maxAttempts: number;
}

/**
 * Exponential backoff for one channel.  Each scheduled retry waits the
 * current interval, then the interval grows by `decay` up to the ceiling
 * for the next attempt.  At most one retry timer is pending at a time.
 */
export class ReconnectScheduler {
  private attempts = 0;
  private intervalMs: number;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly policy: ReconnectPolicy) {
    this.intervalMs = policy.baseIntervalMs;
  }

  getAttempts(): number {
    return this.attempts;
  }

  /** Delay the next retry will wait. */
  getIntervalMs(): number {
    return this.intervalMs;
  }

  isExhausted(): boolean {
    return this.attempts >= this.policy.maxAttempts;
  }

  isPending(): boolean {
    return this.timer !== null;
  }

  /**
   * Returns the delay used, or null when the attempt budget is spent and
   * nothing was scheduled.
   */
  schedule(task: () => void): number | null {
    this.cancel();

    if (this.isExhausted()) {
      return null;
    }

    this.attempts++;
    const delayMs = this.intervalMs;
    this.intervalMs = Math.min(this.intervalMs * this.policy.decay, this.policy.maxIntervalMs);

    this.timer = setTimeout(() => {
      this.timer = null;
      task();
    }, delayMs);

    return delayMs;
  }

  cancel(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  reset(): void {
    this.cancel();
    this.attempts = 0;
    this.intervalMs = this.policy.baseIntervalMs;
  }
}
