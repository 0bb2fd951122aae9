import { sleep } from "./retry.js";

/**
 * Token bucket shared by every caller of a rate-limited service.
 * `acquire` suspends only its caller.
 */
export class TokenBucket {
  private tokens: number;
  private last: number;
  private readonly ratePerMs: number;

  constructor(
    private readonly ratePerSecond: number,
    private readonly capacity = Math.max(1, ratePerSecond),
    private readonly now: () => number = Date.now
  ) {
    if (!(ratePerSecond > 0)) throw new RangeError("rate must be positive");
    this.tokens = this.capacity;
    this.last = this.now();
    this.ratePerMs = ratePerSecond / 1000;
  }

  private refill() {
    const t = this.now();
    this.tokens = Math.min(this.capacity, this.tokens + (t - this.last) * this.ratePerMs);
    this.last = t;
  }

  /** Take a token if one is available right now. */
  tryTake(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Wait for a token. Resolves false without taking one when the wait
   * would exceed `timeoutMs` or the signal aborts.
   */
  async acquire(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    const deadline = this.now() + timeoutMs;
    for (;;) {
      if (signal?.aborted) return false;
      if (this.tryTake()) return true;
      const wait = Math.ceil((1 - this.tokens) / this.ratePerMs);
      if (this.now() + wait > deadline) return false;
      await sleep(wait, signal);
    }
  }

  available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }
}
