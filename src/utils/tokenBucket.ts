/**
 * Token bucket used to cap how many broadcasts per second are processed for a
 * single unit. `consume` never waits: a datagram that finds the bucket empty is
 * dropped.
 */
export class TokenBucket {
  private readonly capacity: number;
  private readonly refillRatePerSec: number;
  private readonly now: () => number;
  private tokens: number;
  private last: number;

  constructor(ratePerSec = 10, capacity = ratePerSec, now: () => number = Date.now) {
    this.capacity = Math.max(1, capacity);
    this.refillRatePerSec = ratePerSec;
    this.now = now;
    this.tokens = this.capacity;
    this.last = now();
  }

  consume(count = 1): boolean {
    const current = this.now();
    const elapsed = (current - this.last) / 1000;
    this.last = current;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRatePerSec);

    if (this.tokens >= count) {
      this.tokens -= count;
      return true;
    }
    return false;
  }
}
