import type { Clock } from './clock.js';

/**
 * Request gate shared by every Collector worker.
 *
 * Pacing is a token bucket refilled at `ratePerSecond`. On a 429 any worker
 * can call pauseFor(): the cooldown applies to the whole gate, so all
 * in-flight workers wait out the same Retry-After window before their next
 * request.
 */
export class RateGate {
  private tokens: number;
  private lastRefill: number;
  private cooldownUntil = 0;

  constructor(
    private readonly ratePerSecond: number,
    private readonly clock: Clock,
    private readonly burst = 1,
  ) {
    if (!(ratePerSecond > 0)) throw new RangeError('ratePerSecond must be > 0');
    this.tokens = burst;
    this.lastRefill = clock.now();
  }

  private refill(now: number): void {
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.burst, this.tokens + (elapsed * this.ratePerSecond) / 1000);
    this.lastRefill = now;
  }

  /** Resolves when the caller may send one request. */
  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      signal?.throwIfAborted();
      const now = this.clock.now();
      this.refill(now);
      const cooldown = this.cooldownUntil - now;
      if (cooldown <= 0 && this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const refillWait = this.tokens >= 1 ? 0 : ((1 - this.tokens) * 1000) / this.ratePerSecond;
      await this.clock.sleep(Math.max(cooldown, refillWait), signal);
    }
  }

  /** Hold every worker for `ms` from now. Overlapping pauses keep the later deadline. */
  pauseFor(ms: number): void {
    this.cooldownUntil = Math.max(this.cooldownUntil, this.clock.now() + ms);
  }

  /** ms left in the current cooldown, 0 when none. */
  cooldownRemaining(): number {
    return Math.max(0, this.cooldownUntil - this.clock.now());
  }
}
