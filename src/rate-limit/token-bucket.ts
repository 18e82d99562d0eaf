/**
 * Token Bucket
 *
 * Fixed-capacity bucket refilled continuously at `refillPerSecond`. Each
 * admitted frame takes one token.
 */

export interface TokenBucketConfig {
  capacity: number;
  refillPerSecond: number;
  /** Defaults to a full bucket */
  initialTokens?: number;
}

export interface TokenBucketState {
  tokens: number;
  lastRefill: number;
  capacity: number;
  refillPerSecond: number;
}

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly capacity: number;
  private readonly refillPerSecond: number;

  constructor(
    config: TokenBucketConfig,
    private readonly now: () => number = Date.now,
  ) {
    if (config.capacity <= 0 || config.refillPerSecond <= 0) {
      throw new RangeError('Token bucket capacity and refill rate must be positive');
    }
    this.capacity = config.capacity;
    this.refillPerSecond = config.refillPerSecond;
    this.tokens = Math.min(config.initialTokens ?? config.capacity, config.capacity);
    this.lastRefill = this.now();
  }

  /**
   * Take `count` tokens if available; never waits
   */
  tryTake(count = 1): boolean {
    if (count <= 0 || count > this.capacity) {
      throw new RangeError(`Cannot take ${String(count)} tokens from a bucket of ${String(this.capacity)}`);
    }
    this.refill();
    if (this.tokens < count) return false;
    this.tokens -= count;
    return true;
  }

  /**
   * Milliseconds until `count` tokens are available
   */
  msUntilAvailable(count = 1): number {
    this.refill();
    if (this.tokens >= count) return 0;
    return Math.ceil(((count - this.tokens) / this.refillPerSecond) * 1000);
  }

  getState(): TokenBucketState {
    this.refill();
    return {
      tokens: this.tokens,
      lastRefill: this.lastRefill,
      capacity: this.capacity,
      refillPerSecond: this.refillPerSecond,
    };
  }

  reset(): void {
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    if (elapsedSeconds <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillPerSecond);
    this.lastRefill = now;
  }
}
