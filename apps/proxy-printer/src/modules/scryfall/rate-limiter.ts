/**
 * Token-bucket rate limiter for the Scryfall API.
 *
 * Scryfall asks for 50-100ms between requests (10-20 req/sec).
 * Callers are served strictly one after another, in call order.
 */

export interface RateLimiterOptions {
  /** Maximum requests per second (default: 10) */
  maxPerSecond?: number;
  /** Minimum milliseconds between requests (default: 100) */
  minIntervalMs?: number;
}

export class RateLimiter {
  private readonly maxPerSecond: number;
  private readonly minIntervalMs: number;
  private tokens: number;
  private lastRefill: number;
  private lastRequest: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.maxPerSecond = options.maxPerSecond ?? 10;
    this.minIntervalMs = options.minIntervalMs ?? 100;
    this.tokens = this.maxPerSecond;
    this.lastRefill = Date.now();
    this.lastRequest = 0;
  }

  /** Wait until a request slot is available, then consume it. */
  acquire(): Promise<void> {
    const slot = this.tail.then(() => this.waitForSlot());
    this.tail = slot;
    return slot;
  }

  private async waitForSlot(): Promise<void> {
    this.refillTokens();

    const timeSinceLast = Date.now() - this.lastRequest;

    if (timeSinceLast < this.minIntervalMs) {
      await this.sleep(this.minIntervalMs - timeSinceLast);
      this.refillTokens();
    }

    if (this.tokens < 1) {
      const msUntilRefill = 1000 - (Date.now() - this.lastRefill);
      if (msUntilRefill > 0) {
        await this.sleep(msUntilRefill);
      }
      this.refillTokens();
    }

    this.tokens -= 1;
    this.lastRequest = Date.now();
  }

  private refillTokens(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    const refill = (elapsed / 1000) * this.maxPerSecond;
    this.tokens = Math.min(this.maxPerSecond, this.tokens + refill);
    this.lastRefill = now;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
