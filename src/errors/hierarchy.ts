/**
 * Error Hierarchy - Centralized error classification system
 *
 * Defines the error taxonomy for the messaging core: failure categories,
 * severities, stable error codes and the metadata attached to each code.
 */

export enum ErrorCategory {
  WEBSOCKET = 'websocket',
  DATABASE = 'database',
  NETWORK = 'network',
  VALIDATION = 'validation',
  AUTHENTICATION = 'authentication',
  RATE_LIMIT = 'rate_limit',
  SYSTEM = 'system',
  USER_INPUT = 'user_input',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export enum ErrorCode {
  // Persistence
  ERR_STORAGE_OPERATION = 'ERR_STORAGE_OPERATION',
  ERR_STORAGE_UNAVAILABLE = 'ERR_STORAGE_UNAVAILABLE',
  ERR_NOT_FOUND = 'ERR_NOT_FOUND',

  // Transport
  ERR_TRANSMISSION_FAILED = 'ERR_TRANSMISSION_FAILED',
  ERR_CONNECTION_LOST = 'ERR_CONNECTION_LOST',

  // Client input
  ERR_INVALID_FRAME = 'ERR_INVALID_FRAME',
  ERR_INVALID_CONFIG = 'ERR_INVALID_CONFIG',
  ERR_UNAUTHENTICATED = 'ERR_UNAUTHENTICATED',
  ERR_RATE_LIMITED = 'ERR_RATE_LIMITED',

  // Resilience
  ERR_TIMEOUT = 'ERR_TIMEOUT',
  ERR_CIRCUIT_BREAKER_OPEN = 'ERR_CIRCUIT_BREAKER_OPEN',
  ERR_MAX_RETRIES_EXCEEDED = 'ERR_MAX_RETRIES_EXCEEDED',
}

export interface ErrorMetadata {
  code: ErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  statusCode: number;
}

const ERROR_METADATA: Record<ErrorCode, Omit<ErrorMetadata, 'code'>> = {
  [ErrorCode.ERR_STORAGE_OPERATION]: {
    category: ErrorCategory.DATABASE,
    severity: ErrorSeverity.HIGH,
    retryable: true,
    statusCode: 503,
  },
  [ErrorCode.ERR_STORAGE_UNAVAILABLE]: {
    category: ErrorCategory.DATABASE,
    severity: ErrorSeverity.CRITICAL,
    retryable: true,
    statusCode: 503,
  },
  [ErrorCode.ERR_NOT_FOUND]: {
    category: ErrorCategory.USER_INPUT,
    severity: ErrorSeverity.LOW,
    retryable: false,
    statusCode: 404,
  },
  [ErrorCode.ERR_TRANSMISSION_FAILED]: {
    category: ErrorCategory.WEBSOCKET,
    severity: ErrorSeverity.MEDIUM,
    retryable: true,
    statusCode: 502,
  },
  [ErrorCode.ERR_CONNECTION_LOST]: {
    category: ErrorCategory.NETWORK,
    severity: ErrorSeverity.MEDIUM,
    retryable: true,
    statusCode: 503,
  },
  [ErrorCode.ERR_INVALID_FRAME]: {
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.LOW,
    retryable: false,
    statusCode: 400,
  },
  [ErrorCode.ERR_INVALID_CONFIG]: {
    category: ErrorCategory.SYSTEM,
    severity: ErrorSeverity.CRITICAL,
    retryable: false,
    statusCode: 500,
  },
  [ErrorCode.ERR_UNAUTHENTICATED]: {
    category: ErrorCategory.AUTHENTICATION,
    severity: ErrorSeverity.MEDIUM,
    retryable: false,
    statusCode: 401,
  },
  [ErrorCode.ERR_RATE_LIMITED]: {
    category: ErrorCategory.RATE_LIMIT,
    severity: ErrorSeverity.LOW,
    retryable: true,
    statusCode: 429,
  },
  [ErrorCode.ERR_TIMEOUT]: {
    category: ErrorCategory.NETWORK,
    severity: ErrorSeverity.MEDIUM,
    retryable: true,
    statusCode: 408,
  },
  [ErrorCode.ERR_CIRCUIT_BREAKER_OPEN]: {
    category: ErrorCategory.SYSTEM,
    severity: ErrorSeverity.HIGH,
    retryable: true,
    statusCode: 503,
  },
  [ErrorCode.ERR_MAX_RETRIES_EXCEEDED]: {
    category: ErrorCategory.SYSTEM,
    severity: ErrorSeverity.HIGH,
    retryable: false,
    statusCode: 503,
  },
};

/**
 * Get error metadata for a given error code
 */
export function getErrorMetadata(code: ErrorCode): ErrorMetadata {
  return { code, ...ERROR_METADATA[code] };
}

/**
 * Check if an error code is retryable
 */
export function isRetryable(code: ErrorCode): boolean {
  return ERROR_METADATA[code].retryable;
}

/**
 * Backoff for a retryable code: doubles per attempt with up to 30% jitter; 0 when not retryable
 */
export function getRetryDelay(code: ErrorCode, attempt: number, baseDelayMs = 1000): number {
  if (!isRetryable(code)) return 0;
  const exponential = baseDelayMs * Math.pow(2, attempt);
  return Math.floor(exponential + Math.random() * 0.3 * exponential);
}

/**
 * Severity ordering, lowest first
 */
export const SEVERITY_RANK: Record<ErrorSeverity, number> = {
  [ErrorSeverity.LOW]: 0,
  [ErrorSeverity.MEDIUM]: 1,
  [ErrorSeverity.HIGH]: 2,
  [ErrorSeverity.CRITICAL]: 3,
};
