/**
 * Messaging Error Handler
 *
 * Central sink for every failure raised while serving a connection:
 * - classifies into category and severity
 * - feeds one circuit breaker per failure domain
 * - builds a non-technical user message with suggested actions
 * - keeps rolling per-minute counters and raises rate alerts
 * - appends high and critical errors to the audit log
 */

import { randomBytes } from 'node:crypto';
import { LRUCache } from 'lru-cache';
import {
  ErrorCategory,
  ErrorSeverity,
  SEVERITY_RANK,
  getErrorMetadata,
} from './hierarchy.js';
import {
  CategoryCircuitBreaker,
  CircuitState,
  type CircuitAction,
  type CircuitBreakerStatus,
} from './circuit-breaker.js';
import type { ErrorHandlingConfig } from '../types/config.js';
import type { MessagingStore, StructuredLogger, UserId } from '../types/index.js';
import { MessagingError, NullLogger, RateLimitError, toError } from '../types/index.js';
import { circuitBreakerTransitionsCounter, errorsCounter } from '../metrics/index.js';

export interface SuggestedAction {
  type: string;
  label: string;
  /** Seconds to wait, for `wait` actions */
  duration?: number;
}

export interface HandleErrorOptions {
  context?: Record<string, unknown>;
  severity?: ErrorSeverity;
  category?: ErrorCategory;
  userId?: UserId | null;
  /** Invoked unless the circuit is open; resolves true when recovery worked */
  recoveryCallback?: () => boolean | Promise<boolean>;
}

export interface HandledError {
  errorId: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  suggestedActions: SuggestedAction[];
  retryAfterSeconds?: number;
  recoveryAttempted: boolean;
  recoverySucceeded: boolean;
  circuitBreaker: { key: string; state: CircuitState; action: CircuitAction };
  timestamp: string;
}

export interface RecentError {
  errorId: string;
  timestamp: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
}

export interface ErrorStatistics {
  windowMinutes: number;
  currentTime: string;
  totalErrors: number;
  categories: Record<ErrorCategory, number>;
  severities: Record<ErrorSeverity, number>;
  circuitBreakers: Record<string, CircuitBreakerStatus>;
  userRecentErrors?: RecentError[];
}

interface MinuteBucket {
  total: number;
  categories: Map<ErrorCategory, number>;
  severities: Map<ErrorSeverity, number>;
}

export const DEFAULT_ERROR_HANDLING_CONFIG: ErrorHandlingConfig = {
  failureThreshold: 10,
  recoveryTimeoutSeconds: 60,
  halfOpenMaxCalls: 3,
  trackingWindowMinutes: 5,
  statisticsWindowMinutes: 60,
  warningThreshold: 50,
  criticalThreshold: 100,
  userHistoryLimit: 20,
  userHistoryMaxUsers: 10000,
  userHistoryTtlMinutes: 60,
};

const MINUTE_MS = 60000;

function contextString(context: Record<string, unknown>, field: string): string {
  const value = context[field];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : 'default';
}

/**
 * Breaker key for a failure: rooms for transmission, operations for the
 * database, endpoints for the network, one shared key otherwise
 */
export function getCircuitKey(category: ErrorCategory, context: Record<string, unknown> = {}): string {
  switch (category) {
    case ErrorCategory.WEBSOCKET:
      return `circuit_websocket_${contextString(context, 'room')}`;
    case ErrorCategory.DATABASE:
      return `circuit_database_${contextString(context, 'operation')}`;
    case ErrorCategory.NETWORK:
      return `circuit_network_${contextString(context, 'endpoint')}`;
    default:
      return `circuit_${category}_default`;
  }
}

function emptyCategoryCounts(): Record<ErrorCategory, number> {
  return {
    [ErrorCategory.WEBSOCKET]: 0,
    [ErrorCategory.DATABASE]: 0,
    [ErrorCategory.NETWORK]: 0,
    [ErrorCategory.VALIDATION]: 0,
    [ErrorCategory.AUTHENTICATION]: 0,
    [ErrorCategory.RATE_LIMIT]: 0,
    [ErrorCategory.SYSTEM]: 0,
    [ErrorCategory.USER_INPUT]: 0,
  };
}

function emptySeverityCounts(): Record<ErrorSeverity, number> {
  return {
    [ErrorSeverity.LOW]: 0,
    [ErrorSeverity.MEDIUM]: 0,
    [ErrorSeverity.HIGH]: 0,
    [ErrorSeverity.CRITICAL]: 0,
  };
}

export class MessagingErrorHandler {
  private config: ErrorHandlingConfig;
  private logger: StructuredLogger;
  private store: MessagingStore | null;
  private breakers = new Map<string, CategoryCircuitBreaker>();
  private buckets = new Map<number, MinuteBucket>();
  private recentErrors: LRUCache<string, RecentError[]>;

  constructor(
    config: Partial<ErrorHandlingConfig> = {},
    options: { logger?: StructuredLogger; store?: MessagingStore } = {},
  ) {
    this.config = { ...DEFAULT_ERROR_HANDLING_CONFIG, ...config };
    this.logger = options.logger ?? new NullLogger();
    this.store = options.store ?? null;
    this.recentErrors = new LRUCache<string, RecentError[]>({
      max: this.config.userHistoryMaxUsers,
      ttl: this.config.userHistoryTtlMinutes * MINUTE_MS,
    });
  }

  /**
   * Classify, count and answer a failure; never throws
   */
  async handleError(error: unknown, options: HandleErrorOptions = {}): Promise<HandledError> {
    const cause = toError(error);
    const context = options.context ?? {};
    const { category, severity } = this.classify(cause, options);
    const errorId = `err_${randomBytes(6).toString('hex')}`;
    const now = Date.now();
    const userId = options.userId ?? null;

    this.logError(errorId, cause, category, severity, context, userId);
    errorsCounter.inc({ category, severity });
    this.recordOccurrence(now, category, severity);

    const breaker = this.getBreaker(getCircuitKey(category, context));
    const action = breaker.recordFailure(now);

    let recoveryAttempted = false;
    let recoverySucceeded = false;
    if (options.recoveryCallback && action !== 'circuit_open') {
      recoveryAttempted = true;
      try {
        recoverySucceeded = (await options.recoveryCallback()) === true;
      } catch (recoveryError) {
        this.logger.error('Recovery callback failed', recoveryError, {
          errorId,
          action: 'error_recovery_failed',
        });
      }
    }

    this.rememberForUser(userId, {
      errorId,
      timestamp: new Date(now).toISOString(),
      category,
      severity,
      message: cause.message,
    });
    this.checkAlertConditions(now, category, severity);
    await this.appendToAuditLog(cause, category, severity, context, userId, errorId);

    const response = this.buildUserResponse(cause, category, severity, action);
    return {
      errorId,
      category,
      severity,
      userMessage: response.message,
      suggestedActions: response.actions,
      ...(response.retryAfterSeconds === undefined ? {} : { retryAfterSeconds: response.retryAfterSeconds }),
      recoveryAttempted,
      recoverySucceeded,
      circuitBreaker: { key: breaker.key, state: breaker.getState(now), action },
      timestamp: new Date(now).toISOString(),
    };
  }

  /**
   * Report a successful guarded call so HALF_OPEN breakers can close
   */
  recordSuccess(category: ErrorCategory, context: Record<string, unknown> = {}): CircuitAction {
    return this.breakers.get(getCircuitKey(category, context))?.recordSuccess() ?? 'success_recorded';
  }

  /**
   * Count a failed guarded call without classifying or reporting it
   */
  recordFailure(category: ErrorCategory, context: Record<string, unknown> = {}): CircuitAction {
    return this.getBreaker(getCircuitKey(category, context)).recordFailure();
  }

  /**
   * Admission check for a guarded call
   */
  allowRequest(category: ErrorCategory, context: Record<string, unknown> = {}): boolean {
    const key = getCircuitKey(category, context);
    const breaker = this.breakers.get(key);
    return breaker ? breaker.tryAcquire() : true;
  }

  isCircuitBreakerOpen(circuitKey: string): boolean {
    return this.breakers.get(circuitKey)?.isOpen() ?? false;
  }

  /** Keys of every circuit currently open */
  getOpenCircuits(): string[] {
    return [...this.breakers.values()].filter((breaker) => breaker.isOpen()).map((breaker) => breaker.key);
  }

  getCircuitBreakerStatus(circuitKey: string): CircuitBreakerStatus {
    const breaker = this.breakers.get(circuitKey);
    if (!breaker) {
      return {
        key: circuitKey,
        state: CircuitState.CLOSED,
        failureCount: 0,
        lastFailureTime: null,
        halfOpenAttempts: 0,
        consecutiveSuccesses: 0,
      };
    }
    return breaker.getStatus();
  }

  resetCircuitBreaker(circuitKey: string): boolean {
    const breaker = this.breakers.get(circuitKey);
    if (!breaker) return false;
    breaker.reset();
    this.logger.info('Circuit breaker manually reset', { circuitKey, action: 'circuit_breaker_reset' });
    return true;
  }

  getUserRecentErrors(userId: UserId | null): RecentError[] {
    return [...(this.recentErrors.get(this.historyKey(userId)) ?? [])];
  }

  getErrorStatistics(windowMinutes = this.config.statisticsWindowMinutes, userId?: UserId): ErrorStatistics {
    const now = Date.now();
    const categories = emptyCategoryCounts();
    const severities = emptySeverityCounts();
    let totalErrors = 0;

    for (const [, bucket] of this.bucketsInWindow(now, windowMinutes)) {
      totalErrors += bucket.total;
      for (const [category, count] of bucket.categories) categories[category] += count;
      for (const [severity, count] of bucket.severities) severities[severity] += count;
    }

    const circuitBreakers: Record<string, CircuitBreakerStatus> = {};
    for (const [key, breaker] of this.breakers) {
      circuitBreakers[key] = breaker.getStatus(now);
    }

    const stats: ErrorStatistics = {
      windowMinutes,
      currentTime: new Date(now).toISOString(),
      totalErrors,
      categories,
      severities,
      circuitBreakers,
    };
    if (userId !== undefined) {
      stats.userRecentErrors = this.getUserRecentErrors(userId);
    }
    return stats;
  }

  /**
   * Mark an audit record as resolved
   */
  async resolveError(recordId: number, notes: string): Promise<boolean> {
    if (!this.store) return false;
    return this.store.resolveErrorRecord(recordId, notes, new Date());
  }

  private classify(
    error: Error,
    options: HandleErrorOptions,
  ): { category: ErrorCategory; severity: ErrorSeverity } {
    if (error instanceof MessagingError) {
      const metadata = getErrorMetadata(error.code);
      return {
        category: options.category ?? metadata.category,
        severity: options.severity ?? metadata.severity,
      };
    }
    return {
      category: options.category ?? ErrorCategory.SYSTEM,
      severity: options.severity ?? ErrorSeverity.MEDIUM,
    };
  }

  private getBreaker(key: string): CategoryCircuitBreaker {
    let breaker = this.breakers.get(key);
    if (!breaker) {
      breaker = new CategoryCircuitBreaker(
        key,
        {
          failureThreshold: this.config.failureThreshold,
          recoveryTimeoutMs: this.config.recoveryTimeoutSeconds * 1000,
          halfOpenMaxCalls: this.config.halfOpenMaxCalls,
          trackingWindowMs: this.config.trackingWindowMinutes * MINUTE_MS,
        },
        (circuitKey, from, to) => {
          circuitBreakerTransitionsCounter.inc({ to_state: to });
          const logContext = { circuitKey, from, to, action: 'circuit_breaker_transition' };
          if (to === CircuitState.OPEN) {
            this.logger.warn(`Circuit breaker ${circuitKey} OPENED`, logContext);
          } else {
            this.logger.info(`Circuit breaker ${circuitKey} moved to ${to}`, logContext);
          }
        },
      );
      this.breakers.set(key, breaker);
    }
    return breaker;
  }

  private logError(
    errorId: string,
    error: Error,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: Record<string, unknown>,
    userId: UserId | null,
  ): void {
    const logContext = {
      errorId,
      errorType: error.name,
      category,
      severity,
      userId,
      ...context,
      action: 'error_handled',
    };
    const message = `Error ${errorId}: ${error.message} [${category}]`;

    if (SEVERITY_RANK[severity] >= SEVERITY_RANK[ErrorSeverity.HIGH]) {
      this.logger.error(message, error, logContext);
    } else if (severity === ErrorSeverity.MEDIUM) {
      this.logger.warn(message, logContext);
    } else {
      this.logger.info(message, logContext);
    }
  }

  private recordOccurrence(now: number, category: ErrorCategory, severity: ErrorSeverity): void {
    const minute = Math.floor(now / MINUTE_MS);
    let bucket = this.buckets.get(minute);
    if (!bucket) {
      bucket = { total: 0, categories: new Map(), severities: new Map() };
      this.buckets.set(minute, bucket);
    }
    bucket.total++;
    bucket.categories.set(category, (bucket.categories.get(category) ?? 0) + 1);
    bucket.severities.set(severity, (bucket.severities.get(severity) ?? 0) + 1);

    const retainMinutes = Math.max(this.config.statisticsWindowMinutes, this.config.trackingWindowMinutes);
    for (const key of this.buckets.keys()) {
      if (key <= minute - retainMinutes) this.buckets.delete(key);
    }
  }

  private bucketsInWindow(now: number, windowMinutes: number): [number, MinuteBucket][] {
    const current = Math.floor(now / MINUTE_MS);
    return [...this.buckets].filter(([minute]) => minute > current - windowMinutes);
  }

  private checkAlertConditions(now: number, category: ErrorCategory, severity: ErrorSeverity): void {
    const window = this.config.trackingWindowMinutes;
    const total = this.bucketsInWindow(now, window).reduce((sum, [, bucket]) => sum + bucket.total, 0);
    const context = { totalErrors: total, windowMinutes: window, category, severity };

    // Alert once per threshold crossing
    if (total === this.config.criticalThreshold) {
      this.logger.error(
        `CRITICAL: Error rate exceeded threshold - ${String(total)} errors in ${String(window)} minutes`,
        undefined,
        { ...context, action: 'error_rate_critical' },
      );
    } else if (total === this.config.warningThreshold) {
      this.logger.warn(`WARNING: High error rate - ${String(total)} errors in ${String(window)} minutes`, {
        ...context,
        action: 'error_rate_warning',
      });
    }
  }

  private historyKey(userId: UserId | null): string {
    return userId === null ? 'system' : String(userId);
  }

  private rememberForUser(userId: UserId | null, entry: RecentError): void {
    const key = this.historyKey(userId);
    const history = this.recentErrors.get(key) ?? [];
    history.push(entry);
    while (history.length > this.config.userHistoryLimit) history.shift();
    this.recentErrors.set(key, history);
  }

  private async appendToAuditLog(
    error: Error,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: Record<string, unknown>,
    userId: UserId | null,
    errorId: string,
  ): Promise<void> {
    if (!this.store || SEVERITY_RANK[severity] < SEVERITY_RANK[ErrorSeverity.HIGH]) return;
    try {
      await this.store.createErrorRecord({
        errorType: error.name,
        message: error.message,
        severity,
        context: { ...context, category, errorId, stack: error.stack ?? null },
        userId,
      });
    } catch (auditError) {
      this.logger.error('Failed to write error audit record', auditError, {
        errorId,
        action: 'error_audit_failed',
      });
    }
  }

  private buildUserResponse(
    error: Error,
    category: ErrorCategory,
    severity: ErrorSeverity,
    action: CircuitAction,
  ): { message: string; actions: SuggestedAction[]; retryAfterSeconds?: number } {
    if (severity === ErrorSeverity.CRITICAL) {
      return {
        message: 'A critical error occurred. Please refresh the page or contact support.',
        actions: [
          { type: 'refresh', label: 'Refresh page' },
          { type: 'contact_support', label: 'Contact support' },
        ],
      };
    }

    switch (category) {
      case ErrorCategory.WEBSOCKET:
        if (action === 'circuit_open') {
          return {
            message: 'Connection issues detected. Please wait a moment before trying again.',
            actions: [
              { type: 'wait', duration: 60, label: 'Wait 1 minute' },
              { type: 'refresh', label: 'Refresh page' },
              { type: 'retry', label: 'Try again' },
            ],
            retryAfterSeconds: 60,
          };
        }
        return {
          message: 'Connection temporarily unavailable. Your message will be sent automatically.',
          actions: [
            { type: 'retry', label: 'Retry now' },
            { type: 'refresh', label: 'Refresh connection' },
          ],
        };
      case ErrorCategory.DATABASE:
        return {
          message: 'Data synchronization issue. Your messages are safe and will be delivered.',
          actions: [
            { type: 'sync', label: 'Sync messages' },
            { type: 'retry', label: 'Try again' },
          ],
        };
      case ErrorCategory.NETWORK:
        return {
          message: 'Network connectivity issue. Check your internet connection.',
          actions: [
            { type: 'check_connection', label: 'Check connection' },
            { type: 'retry', label: 'Retry' },
            { type: 'offline_mode', label: 'Continue offline' },
          ],
        };
      case ErrorCategory.VALIDATION:
      case ErrorCategory.USER_INPUT:
        return {
          message: 'Invalid input. Please check your message and try again.',
          actions: [
            { type: 'edit', label: 'Edit message' },
            { type: 'clear', label: 'Clear and start over' },
          ],
        };
      case ErrorCategory.RATE_LIMIT: {
        const wait = error instanceof RateLimitError ? error.retryAfterSeconds : 30;
        return {
          message: 'Too many requests. Please wait a moment before sending more messages.',
          actions: [
            { type: 'wait', duration: wait, label: `Wait ${String(wait)} seconds` },
            { type: 'queue', label: 'Queue message for later' },
          ],
          retryAfterSeconds: wait,
        };
      }
      case ErrorCategory.AUTHENTICATION:
        return {
          message: 'Your session has expired. Please sign in again.',
          actions: [{ type: 'login', label: 'Sign in' }],
        };
      case ErrorCategory.SYSTEM:
        return {
          message: 'Something went wrong. Please try again.',
          actions: [
            { type: 'retry', label: 'Try again' },
            { type: 'refresh', label: 'Refresh' },
          ],
        };
    }
  }
}
