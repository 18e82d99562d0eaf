/**
 * Messaging configuration
 *
 * One section per subsystem. Durations carry their unit in the field name.
 */

import type { LogEnvironment } from '../logger/index.js';

export type DelayStrategy = 'exponential' | 'linear' | 'fixed';

/**
 * Retry engine configuration
 */
export interface RetryConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  strategy: DelayStrategy;
}

/**
 * Offline queue configuration
 */
export interface QueueConfig {
  /** Lifetime of outgoing/incoming entries */
  offlineExpiryDays: number;
  /** Lifetime of retry entries */
  retryExpiryDays: number;
  maxRetries: number;
  baseDelaySeconds: number;
  backoffMultiplier: number;
  maxDelaySeconds: number;
  /** Entries handled per retry sweep */
  retryBatchSize: number;
  /** Interval of the cleanup and retry sweeper */
  sweepIntervalMs: number;
}

export interface PresenceConfig {
  /** A status without a ping for this long is forced offline */
  staleTimeoutSeconds: number;
}

export interface TypingConfig {
  staleTimeoutSeconds: number;
}

export interface ReceiptsConfig {
  cacheTtlMs: number;
  cacheMaxSize: number;
}

export interface RecoveryConfig {
  /** Reconnect delays indexed by attempt; the last value repeats */
  retryDelaysSeconds: number[];
  maxRetries: number;
  reconnectTimeoutMs: number;
  staleTimeoutMinutes: number;
}

export interface SyncConfig {
  maxSyncWindowDays: number;
  batchSize: number;
  /** Rows read per category in one sync */
  fetchLimit: number;
}

export interface ErrorHandlingConfig {
  failureThreshold: number;
  /** OPEN becomes HALF_OPEN this long after the last failure */
  recoveryTimeoutSeconds: number;
  halfOpenMaxCalls: number;
  /** Failures older than this no longer count towards opening */
  trackingWindowMinutes: number;
  statisticsWindowMinutes: number;
  warningThreshold: number;
  criticalThreshold: number;
  userHistoryLimit: number;
  /** Users whose recent errors are kept; least recently seen are dropped */
  userHistoryMaxUsers: number;
  userHistoryTtlMinutes: number;
}

export interface NotificationsConfig {
  /** Grouping window for types without a dedicated rule */
  defaultGroupWindowMinutes: number;
  retentionDays: number;
}

export type StorageBackend = 'memory' | 'mongodb';

export interface StorageConfig {
  backend: StorageBackend;
  mongoUrl?: string;
  mongoDatabase: string;
  /** Circuit breaker around the store executor */
  operationTimeoutMs: number;
  errorThresholdPercentage: number;
  resetTimeoutMs: number;
  volumeThreshold: number;
}

export interface RateLimitConfig {
  /** Burst size per connection */
  capacity: number;
  refillPerSecond: number;
}

export interface ServerConfig {
  host: string;
  port: number;
  /** Protocol-level ping interval for dead socket detection */
  heartbeatIntervalMs: number;
  /** Stale presence, typing and recovery sweep */
  maintenanceIntervalMs: number;
  /** Enables the Redis channel layer when set */
  redisUrl?: string;
  rateLimit: RateLimitConfig;
}

export interface ObservabilityConfig {
  environment: LogEnvironment;
  logLevel?: string;
  enableMetrics: boolean;
}

export interface MessagingConfig {
  retry: RetryConfig;
  queue: QueueConfig;
  presence: PresenceConfig;
  typing: TypingConfig;
  receipts: ReceiptsConfig;
  recovery: RecoveryConfig;
  sync: SyncConfig;
  errors: ErrorHandlingConfig;
  notifications: NotificationsConfig;
  storage: StorageConfig;
  server: ServerConfig;
  observability: ObservabilityConfig;
}
