/**
 * CategoryCircuitBreaker Tests
 */

import { describe, expect, it, vi } from 'vitest';
import { CategoryCircuitBreaker, CircuitState } from '../../errors/circuit-breaker.js';

const options = { failureThreshold: 3, recoveryTimeoutMs: 1000, halfOpenMaxCalls: 2, trackingWindowMs: 5000 };

function openBreaker(breaker: CategoryCircuitBreaker, at: number): void {
  breaker.recordFailure(at);
  breaker.recordFailure(at);
  breaker.recordFailure(at);
}

describe('CategoryCircuitBreaker', () => {
  it('should open after the failure threshold', () => {
    const breaker = new CategoryCircuitBreaker('k', options);

    expect(breaker.recordFailure(0)).toBe('failure_recorded');
    expect(breaker.recordFailure(0)).toBe('failure_recorded');
    expect(breaker.recordFailure(0)).toBe('circuit_opened');
    expect(breaker.getState(10)).toBe(CircuitState.OPEN);
    expect(breaker.tryAcquire(10)).toBe(false);
    expect(breaker.recordFailure(10)).toBe('circuit_open');
  });

  it('should restart the count once the tracking window has passed', () => {
    const breaker = new CategoryCircuitBreaker('k', options);
    breaker.recordFailure(0);
    breaker.recordFailure(0);

    expect(breaker.recordFailure(6000)).toBe('failure_recorded');
    expect(breaker.getStatus(6000).failureCount).toBe(1);
  });

  it('should reset the count on success while closed', () => {
    const breaker = new CategoryCircuitBreaker('k', options);
    breaker.recordFailure(0);
    breaker.recordFailure(0);

    breaker.recordSuccess(0);

    expect(breaker.recordFailure(0)).toBe('failure_recorded');
  });

  it('should go half-open once the recovery timeout has passed', () => {
    const breaker = new CategoryCircuitBreaker('k', options);
    openBreaker(breaker, 0);

    expect(breaker.getState(999)).toBe(CircuitState.OPEN);
    expect(breaker.getState(1000)).toBe(CircuitState.HALF_OPEN);
  });

  it('should admit a limited number of trial calls while half-open', () => {
    const breaker = new CategoryCircuitBreaker('k', options);
    openBreaker(breaker, 0);

    expect(breaker.tryAcquire(1000)).toBe(true);
    expect(breaker.tryAcquire(1000)).toBe(true);
    expect(breaker.tryAcquire(1000)).toBe(false);
  });

  it('should close after consecutive half-open successes', () => {
    const breaker = new CategoryCircuitBreaker('k', options);
    openBreaker(breaker, 0);

    expect(breaker.recordSuccess(1000)).toBe('half_open_success');
    expect(breaker.recordSuccess(1000)).toBe('circuit_closed');
    expect(breaker.getStatus(1000)).toMatchObject({ state: CircuitState.CLOSED, failureCount: 0, lastFailureTime: null });
  });

  it('should reopen on a half-open failure', () => {
    const breaker = new CategoryCircuitBreaker('k', options);
    openBreaker(breaker, 0);

    expect(breaker.recordFailure(1000)).toBe('circuit_reopened');
    expect(breaker.getState(1500)).toBe(CircuitState.OPEN);
  });

  it('should report each transition once', () => {
    const onTransition = vi.fn();
    const breaker = new CategoryCircuitBreaker('room', options, onTransition);
    openBreaker(breaker, 0);
    breaker.getState(1000);
    breaker.reset();

    expect(onTransition.mock.calls).toEqual([
      ['room', CircuitState.CLOSED, CircuitState.OPEN],
      ['room', CircuitState.OPEN, CircuitState.HALF_OPEN],
      ['room', CircuitState.HALF_OPEN, CircuitState.CLOSED],
    ]);
  });
});
