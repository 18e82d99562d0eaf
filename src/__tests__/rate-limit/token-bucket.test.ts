/**
 * Token Bucket Tests
 */

import { describe, expect, it } from 'vitest';

import { TokenBucket } from '../../rate-limit/token-bucket.js';

function clock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('TokenBucket', () => {
  describe('constructor', () => {
    it('should start full', () => {
      const bucket = new TokenBucket({ capacity: 10, refillPerSecond: 1 }, clock().now);
      expect(bucket.getState().tokens).toBe(10);
    });

    it('should honour initial tokens but never exceed capacity', () => {
      const time = clock();
      expect(new TokenBucket({ capacity: 10, refillPerSecond: 1, initialTokens: 5 }, time.now).getState().tokens).toBe(5);
      expect(new TokenBucket({ capacity: 10, refillPerSecond: 1, initialTokens: 50 }, time.now).getState().tokens).toBe(10);
    });

    it('should reject non-positive settings', () => {
      expect(() => new TokenBucket({ capacity: 0, refillPerSecond: 1 })).toThrow(RangeError);
      expect(() => new TokenBucket({ capacity: 5, refillPerSecond: 0 })).toThrow(RangeError);
    });
  });

  describe('tryTake', () => {
    it('should take until empty', () => {
      const bucket = new TokenBucket({ capacity: 3, refillPerSecond: 1 }, clock().now);
      expect([bucket.tryTake(), bucket.tryTake(), bucket.tryTake(), bucket.tryTake()]).toEqual([
        true,
        true,
        true,
        false,
      ]);
    });

    it('should take several tokens at once', () => {
      const bucket = new TokenBucket({ capacity: 10, refillPerSecond: 1 }, clock().now);
      expect(bucket.tryTake(4)).toBe(true);
      expect(bucket.getState().tokens).toBe(6);
    });

    it('should reject counts the bucket can never hold', () => {
      const bucket = new TokenBucket({ capacity: 2, refillPerSecond: 1 }, clock().now);
      expect(() => bucket.tryTake(3)).toThrow(RangeError);
      expect(() => bucket.tryTake(0)).toThrow(RangeError);
    });
  });

  describe('refill', () => {
    it('should refill proportionally to elapsed time', () => {
      const time = clock();
      const bucket = new TokenBucket({ capacity: 10, refillPerSecond: 2, initialTokens: 0 }, time.now);

      time.advance(1500);

      expect(bucket.getState().tokens).toBe(3);
    });

    it('should cap refill at capacity', () => {
      const time = clock();
      const bucket = new TokenBucket({ capacity: 4, refillPerSecond: 2, initialTokens: 0 }, time.now);

      time.advance(60000);

      expect(bucket.getState().tokens).toBe(4);
    });
  });

  describe('msUntilAvailable', () => {
    it('should be zero with tokens left', () => {
      const bucket = new TokenBucket({ capacity: 2, refillPerSecond: 1 }, clock().now);
      expect(bucket.msUntilAvailable()).toBe(0);
    });

    it('should report the time to the next token', () => {
      const time = clock();
      const bucket = new TokenBucket({ capacity: 2, refillPerSecond: 4, initialTokens: 0 }, time.now);
      expect(bucket.msUntilAvailable()).toBe(250);
      expect(bucket.msUntilAvailable(2)).toBe(500);

      time.advance(100);
      expect(bucket.msUntilAvailable()).toBe(150);
    });
  });

  it('should refill completely on reset', () => {
    const bucket = new TokenBucket({ capacity: 5, refillPerSecond: 1 }, clock().now);
    bucket.tryTake(5);
    bucket.reset();
    expect(bucket.getState()).toEqual({ tokens: 5, lastRefill: 0, capacity: 5, refillPerSecond: 1 });
  });
});
