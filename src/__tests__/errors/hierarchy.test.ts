/**
 * Error taxonomy
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ErrorCategory,
  ErrorCode,
  ErrorSeverity,
  getErrorMetadata,
  getRetryDelay,
  isRetryable,
} from '../../errors/hierarchy.js';
import { CircuitOpenError, RateLimitError, StorageError } from '../../types/index.js';

describe('error metadata', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should describe storage failures as retryable database errors', () => {
    expect(getErrorMetadata(ErrorCode.ERR_STORAGE_OPERATION)).toEqual({
      code: ErrorCode.ERR_STORAGE_OPERATION,
      category: ErrorCategory.DATABASE,
      severity: ErrorSeverity.HIGH,
      retryable: true,
      statusCode: 503,
    });
  });

  it('should not retry invalid frames', () => {
    expect(isRetryable(ErrorCode.ERR_INVALID_FRAME)).toBe(false);
    expect(getRetryDelay(ErrorCode.ERR_INVALID_FRAME, 3)).toBe(0);
  });

  it('should double the delay per attempt', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);

    expect(getRetryDelay(ErrorCode.ERR_TIMEOUT, 0, 500)).toBe(500);
    expect(getRetryDelay(ErrorCode.ERR_TIMEOUT, 3, 500)).toBe(4000);
  });

  it('should add at most 30% jitter', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);

    expect(getRetryDelay(ErrorCode.ERR_CONNECTION_LOST, 1, 1000)).toBe(2300);
  });

  it('should attach codes to the error classes', () => {
    expect(new StorageError('write failed', 'createMessage').code).toBe(ErrorCode.ERR_STORAGE_OPERATION);
    expect(new RateLimitError(5).code).toBe(ErrorCode.ERR_RATE_LIMITED);
    expect(new CircuitOpenError('store').code).toBe(ErrorCode.ERR_CIRCUIT_BREAKER_OPEN);
  });
});
