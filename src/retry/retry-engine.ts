/**
 * Retry Engine
 *
 * Re-runs fallible async operations with a configurable delay strategy.
 * Attempts are tracked per operation id while the operation is in flight.
 * When an error handler is attached, the circuit guarding the operation is
 * consulted before every attempt and fed with its outcome.
 */

import type { RetryConfig } from '../types/config.js';
import type { Message, MessagingStore, StructuredLogger, UserRef } from '../types/index.js';
import { CircuitOpenError, NullLogger, toError } from '../types/index.js';
import { ErrorCategory } from '../errors/hierarchy.js';
import { getCircuitKey, type MessagingErrorHandler } from '../errors/error-handler.js';
import { retryAttemptsCounter } from '../metrics/index.js';

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  strategy: 'exponential',
};

export interface RetryEngineOptions {
  logger?: StructuredLogger;
  errorHandler?: MessagingErrorHandler;
  /** Used by retryMessageCreation */
  store?: MessagingStore;
  sleep?: Sleep;
}

/**
 * Circuit consulted around each attempt
 */
export interface CircuitGuard {
  category: ErrorCategory;
  context: Record<string, unknown>;
}

export interface RetryOperationOptions {
  maxAttempts?: number;
  circuit?: CircuitGuard;
}

export interface OperationAttempts {
  operationId: string;
  attempts: number;
  startedAt: Date;
  lastError: string | null;
}

export type MessageCreationOutcome =
  | { ok: true; message: Message; created: boolean }
  | { ok: false; shouldQueue: true; error: Error };

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryEngine {
  private config: RetryConfig;
  private logger: StructuredLogger;
  private errorHandler: MessagingErrorHandler | null;
  private store: MessagingStore | null;
  private sleep: Sleep;
  private activeOperations = new Map<string, OperationAttempts>();
  private operationSequence = 0;

  constructor(config: Partial<RetryConfig> = {}, options: RetryEngineOptions = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.logger = options.logger ?? new NullLogger();
    this.errorHandler = options.errorHandler ?? null;
    this.store = options.store ?? null;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Delay in milliseconds after the failed attempt with the given 0-based index
   */
  calculateDelay(attempt: number): number {
    const { initialDelayMs, maxDelayMs, backoffMultiplier } = this.config;
    switch (this.config.strategy) {
      case 'exponential':
        return Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs);
      case 'linear':
        return Math.min(initialDelayMs * (attempt + 1), maxDelayMs);
      case 'fixed':
        return initialDelayMs;
    }
  }

  /**
   * Run an operation until it succeeds or the attempts are exhausted;
   * rethrows the last error. An open circuit fails fast with CircuitOpenError.
   */
  async retryAsyncOperation<T>(
    operation: () => Promise<T>,
    operationId: string,
    options: RetryOperationOptions = {},
  ): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.config.maxAttempts);
    const tracking: OperationAttempts = {
      operationId,
      attempts: 0,
      startedAt: new Date(),
      lastError: null,
    };
    this.activeOperations.set(operationId, tracking);

    try {
      let lastError: Error | null = null;
      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        this.assertCircuitAllows(options.circuit, operationId);
        tracking.attempts = attempt + 1;

        try {
          const result = await operation();
          this.recordOutcome(options.circuit, true);
          retryAttemptsCounter.inc({ outcome: 'success' });
          if (attempt > 0) {
            this.logger.info('Operation succeeded after retry', {
              operationId,
              attempts: tracking.attempts,
              action: 'retry_succeeded',
            });
          }
          return result;
        } catch (error) {
          lastError = toError(error);
          tracking.lastError = lastError.message;
          this.recordOutcome(options.circuit, false);
          retryAttemptsCounter.inc({ outcome: 'failure' });

          if (attempt < maxAttempts - 1) {
            const delayMs = this.calculateDelay(attempt);
            this.logger.warn('Operation failed, retrying', {
              operationId,
              attempt: attempt + 1,
              maxAttempts,
              delayMs,
              error: lastError.message,
              action: 'retry_scheduled',
            });
            await this.sleep(delayMs);
          }
        }
      }

      retryAttemptsCounter.inc({ outcome: 'exhausted' });
      this.logger.error('Operation failed after all retry attempts', lastError, {
        operationId,
        maxAttempts,
        action: 'retry_exhausted',
      });
      throw lastError ?? new Error(`Operation ${operationId} made no attempt`);
    } finally {
      this.activeOperations.delete(operationId);
    }
  }

  /**
   * Persist a chat message with retries. Never throws: on exhaustion the
   * caller receives a sentinel asking it to queue the message instead.
   */
  async retryMessageCreation(
    sender: UserRef,
    recipient: UserRef,
    content: string,
    clientId: string | null = null,
  ): Promise<MessageCreationOutcome> {
    const store = this.store;
    if (!store) {
      return { ok: false, shouldQueue: true, error: new Error('No message store attached') };
    }

    const operationId = this.nextOperationId(`create_message_${String(sender.id)}_${String(recipient.id)}`);
    try {
      const result = await this.retryAsyncOperation(
        () => store.createMessage({ sender, recipient, content, clientId }),
        operationId,
        { circuit: { category: ErrorCategory.DATABASE, context: { operation: 'create_message' } } },
      );
      return { ok: true, message: result.message, created: result.created };
    } catch (error) {
      const cause = toError(error);
      this.logger.warn('Message creation failed, message should be queued', {
        senderId: sender.id,
        recipientId: recipient.id,
        clientId,
        operationId,
        error: cause.message,
        action: 'message_creation_exhausted',
      });
      return { ok: false, shouldQueue: true, error: cause };
    }
  }

  /**
   * Retry only the broadcast step; the message may already be stored
   */
  async retryWebsocketTransmission(send: () => Promise<void>, room: string): Promise<boolean> {
    const operationId = this.nextOperationId(`transmit_${room}`);
    try {
      await this.retryAsyncOperation(send, operationId, {
        circuit: { category: ErrorCategory.WEBSOCKET, context: { room } },
      });
      return true;
    } catch (error) {
      this.logger.error('WebSocket transmission failed', error, {
        room,
        operationId,
        action: 'transmission_failed',
      });
      return false;
    }
  }

  getActiveOperations(): OperationAttempts[] {
    return [...this.activeOperations.values()].map((entry) => ({ ...entry }));
  }

  /**
   * Attempts made so far by an in-flight operation; 0 when unknown
   */
  getOperationAttempts(operationId: string): number {
    return this.activeOperations.get(operationId)?.attempts ?? 0;
  }

  getConfig(): RetryConfig {
    return { ...this.config };
  }

  private nextOperationId(prefix: string): string {
    this.operationSequence++;
    return `${prefix}_${String(Date.now())}_${String(this.operationSequence)}`;
  }

  private assertCircuitAllows(circuit: CircuitGuard | undefined, operationId: string): void {
    if (!circuit || !this.errorHandler) return;
    if (!this.errorHandler.allowRequest(circuit.category, circuit.context)) {
      const key = getCircuitKey(circuit.category, circuit.context);
      this.logger.warn('Circuit open, skipping attempt', {
        operationId,
        circuitKey: key,
        action: 'retry_circuit_open',
      });
      throw new CircuitOpenError(key);
    }
  }

  private recordOutcome(circuit: CircuitGuard | undefined, success: boolean): void {
    if (!circuit || !this.errorHandler) return;
    if (success) {
      this.errorHandler.recordSuccess(circuit.category, circuit.context);
    } else {
      this.errorHandler.recordFailure(circuit.category, circuit.context);
    }
  }
}
