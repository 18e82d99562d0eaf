/**
 * Count-based circuit breaker
 *
 * One breaker guards one failure domain (a room, a store operation, an
 * endpoint). CLOSED opens after `failureThreshold` consecutive failures
 * inside the tracking window; OPEN reports HALF_OPEN once `recoveryTimeoutMs`
 * has passed since the last failure; HALF_OPEN admits `halfOpenMaxCalls`
 * trial calls, reopens on any failure and closes after that many consecutive
 * successes.
 */

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half_open',
}

export type CircuitAction =
  | 'failure_recorded'
  | 'circuit_opened'
  | 'circuit_reopened'
  | 'circuit_open'
  | 'success_recorded'
  | 'half_open_success'
  | 'circuit_closed';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  recoveryTimeoutMs: number;
  halfOpenMaxCalls: number;
  trackingWindowMs: number;
}

export interface CircuitBreakerStatus {
  key: string;
  state: CircuitState;
  failureCount: number;
  lastFailureTime: string | null;
  halfOpenAttempts: number;
  consecutiveSuccesses: number;
}

export type TransitionListener = (key: string, from: CircuitState, to: CircuitState) => void;

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 10,
  recoveryTimeoutMs: 60000,
  halfOpenMaxCalls: 3,
  trackingWindowMs: 300000,
};

export class CategoryCircuitBreaker {
  private state = CircuitState.CLOSED;
  private failureCount = 0;
  private lastFailureTime: number | null = null;
  private halfOpenAttempts = 0;
  private consecutiveSuccesses = 0;
  private options: CircuitBreakerOptions;

  constructor(
    readonly key: string,
    options: Partial<CircuitBreakerOptions> = {},
    private onTransition?: TransitionListener,
  ) {
    this.options = { ...DEFAULT_CIRCUIT_BREAKER_OPTIONS, ...options };
  }

  /**
   * Current state; an expired OPEN period moves the breaker to HALF_OPEN
   */
  getState(now = Date.now()): CircuitState {
    if (
      this.state === CircuitState.OPEN &&
      this.lastFailureTime !== null &&
      now - this.lastFailureTime >= this.options.recoveryTimeoutMs
    ) {
      this.transition(CircuitState.HALF_OPEN);
    }
    return this.state;
  }

  isOpen(now = Date.now()): boolean {
    return this.getState(now) === CircuitState.OPEN;
  }

  /**
   * Admission check before a guarded call; consumes a trial slot in HALF_OPEN
   */
  tryAcquire(now = Date.now()): boolean {
    switch (this.getState(now)) {
      case CircuitState.CLOSED:
        return true;
      case CircuitState.OPEN:
        return false;
      case CircuitState.HALF_OPEN:
        if (this.halfOpenAttempts >= this.options.halfOpenMaxCalls) return false;
        this.halfOpenAttempts++;
        return true;
    }
  }

  recordFailure(now = Date.now()): CircuitAction {
    switch (this.getState(now)) {
      case CircuitState.CLOSED: {
        const windowExpired =
          this.lastFailureTime !== null && now - this.lastFailureTime > this.options.trackingWindowMs;
        this.failureCount = windowExpired ? 1 : this.failureCount + 1;
        this.lastFailureTime = now;
        if (this.failureCount >= this.options.failureThreshold) {
          this.transition(CircuitState.OPEN);
          return 'circuit_opened';
        }
        return 'failure_recorded';
      }
      case CircuitState.HALF_OPEN:
        this.failureCount++;
        this.lastFailureTime = now;
        this.transition(CircuitState.OPEN);
        return 'circuit_reopened';
      case CircuitState.OPEN:
        return 'circuit_open';
    }
  }

  recordSuccess(now = Date.now()): CircuitAction {
    switch (this.getState(now)) {
      case CircuitState.CLOSED:
        this.failureCount = 0;
        return 'success_recorded';
      case CircuitState.HALF_OPEN:
        this.consecutiveSuccesses++;
        if (this.consecutiveSuccesses >= this.options.halfOpenMaxCalls) {
          this.failureCount = 0;
          this.lastFailureTime = null;
          this.transition(CircuitState.CLOSED);
          return 'circuit_closed';
        }
        return 'half_open_success';
      case CircuitState.OPEN:
        return 'circuit_open';
    }
  }

  reset(): void {
    this.failureCount = 0;
    this.lastFailureTime = null;
    this.transition(CircuitState.CLOSED);
  }

  getStatus(now = Date.now()): CircuitBreakerStatus {
    return {
      key: this.key,
      state: this.getState(now),
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime === null ? null : new Date(this.lastFailureTime).toISOString(),
      halfOpenAttempts: this.halfOpenAttempts,
      consecutiveSuccesses: this.consecutiveSuccesses,
    };
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    this.state = to;
    this.halfOpenAttempts = 0;
    this.consecutiveSuccesses = 0;
    if (from !== to) {
      this.onTransition?.(this.key, from, to);
    }
  }
}
