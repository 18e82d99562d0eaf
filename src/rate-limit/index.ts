/**
 * Rate limiting
 */

export { TokenBucket } from './token-bucket.js';
export type { TokenBucketConfig, TokenBucketState } from './token-bucket.js';

export { ConnectionRateLimiter, DEFAULT_RATE_LIMIT_CONFIG } from './rate-limiter.js';
export type { RateLimitDecision } from './rate-limiter.js';
