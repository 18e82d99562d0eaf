/**
 * Custom errors
 *
 * Every error raised by the messaging core carries a stable ErrorCode so the
 * error handler can classify it without inspecting messages.
 */

import { ErrorCode } from '../errors/hierarchy.js';

export class MessagingError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'MessagingError';
  }
}

export class StorageError extends MessagingError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: Error,
  ) {
    super(message, ErrorCode.ERR_STORAGE_OPERATION, cause);
    this.name = 'StorageError';
  }
}

export class NotFoundError extends MessagingError {
  constructor(
    public readonly entity: string,
    public readonly entityId: string | number,
  ) {
    super(`${entity} ${String(entityId)} not found`, ErrorCode.ERR_NOT_FOUND);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends MessagingError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, ErrorCode.ERR_INVALID_FRAME);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends MessagingError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, ErrorCode.ERR_INVALID_CONFIG);
    this.name = 'ConfigError';
  }
}

export class TransmissionError extends MessagingError {
  constructor(
    message: string,
    public readonly group: string,
    cause?: Error,
  ) {
    super(message, ErrorCode.ERR_TRANSMISSION_FAILED, cause);
    this.name = 'TransmissionError';
  }
}

export class AuthenticationError extends MessagingError {
  constructor(message = 'Authentication required') {
    super(message, ErrorCode.ERR_UNAUTHENTICATED);
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends MessagingError {
  constructor(public readonly retryAfterSeconds: number) {
    super(`Rate limit exceeded, retry after ${String(retryAfterSeconds)}s`, ErrorCode.ERR_RATE_LIMITED);
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends MessagingError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(message, ErrorCode.ERR_TIMEOUT);
    this.name = 'TimeoutError';
  }
}

export class CircuitOpenError extends MessagingError {
  constructor(public readonly circuitKey: string) {
    super(`Circuit ${circuitKey} is open`, ErrorCode.ERR_CIRCUIT_BREAKER_OPEN);
    this.name = 'CircuitOpenError';
  }
}

export class MaxRetriesExceededError extends MessagingError {
  constructor(
    public readonly operationId: string,
    public readonly attempts: number,
    cause?: Error,
  ) {
    super(
      `Operation ${operationId} failed after ${String(attempts)} attempts`,
      ErrorCode.ERR_MAX_RETRIES_EXCEEDED,
      cause,
    );
    this.name = 'MaxRetriesExceededError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
