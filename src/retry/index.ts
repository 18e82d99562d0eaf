/**
 * Retry
 *
 * Exports:
 * - RetryEngine (backoff executor, message creation and transmission retries)
 */

export {
  DEFAULT_RETRY_CONFIG,
  RetryEngine,
  type CircuitGuard,
  type MessageCreationOutcome,
  type OperationAttempts,
  type RetryEngineOptions,
  type RetryOperationOptions,
  type Sleep,
} from './retry-engine.js';
