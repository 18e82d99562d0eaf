/**
 * Connection Rate Limiter
 *
 * One token bucket per WebSocket session for chat `message` frames. Buckets
 * live in an LRU so abandoned sessions do not accumulate.
 */

import { LRUCache } from 'lru-cache';
import type { RateLimitConfig } from '../types/config.js';
import { TokenBucket } from './token-bucket.js';

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  capacity: 20,
  refillPerSecond: 2,
};

const MAX_TRACKED_CONNECTIONS = 10000;
const IDLE_BUCKET_TTL_MS = 60 * 60 * 1000;

export interface RateLimitDecision {
  allowed: boolean;
  tokensRemaining: number;
  /** Whole seconds until the next frame would be admitted; 0 when allowed */
  retryAfterSeconds: number;
}

export class ConnectionRateLimiter {
  private readonly config: RateLimitConfig;
  private readonly buckets: LRUCache<string, TokenBucket>;

  constructor(
    config: Partial<RateLimitConfig> = {},
    private readonly now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config };
    this.buckets = new LRUCache<string, TokenBucket>({
      max: MAX_TRACKED_CONNECTIONS,
      ttl: IDLE_BUCKET_TTL_MS,
      updateAgeOnGet: true,
    });
  }

  /**
   * Spend one token for the connection
   */
  consume(connectionId: string): RateLimitDecision {
    const bucket = this.getBucket(connectionId);
    const allowed = bucket.tryTake();
    return {
      allowed,
      tokensRemaining: Math.floor(bucket.getState().tokens),
      retryAfterSeconds: allowed ? 0 : Math.max(1, Math.ceil(bucket.msUntilAvailable() / 1000)),
    };
  }

  release(connectionId: string): void {
    this.buckets.delete(connectionId);
  }

  getTrackedConnections(): number {
    return this.buckets.size;
  }

  getConfig(): Readonly<RateLimitConfig> {
    return { ...this.config };
  }

  private getBucket(connectionId: string): TokenBucket {
    let bucket = this.buckets.get(connectionId);
    if (!bucket) {
      bucket = new TokenBucket(
        { capacity: this.config.capacity, refillPerSecond: this.config.refillPerSecond },
        this.now,
      );
      this.buckets.set(connectionId, bucket);
    }
    return bucket;
  }
}
