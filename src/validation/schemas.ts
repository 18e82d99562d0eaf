/**
 * Zod Validation Schemas
 *
 * Runtime validation for every MessagingConfig section
 */

import { z } from 'zod';

const positiveInt = (field: string) => z.number().int().min(1, `${field} must be at least 1`);
const nonNegativeInt = (field: string) => z.number().int().min(0, `${field} must be non-negative`);

/**
 * Retry Engine Schema
 */
export const RetryConfigSchema = z
  .object({
    maxAttempts: positiveInt('maxAttempts')
      .max(10, 'maxAttempts should not exceed 10')
      .describe('Total attempts including the first one'),
    initialDelayMs: nonNegativeInt('initialDelayMs').describe('Delay before the second attempt (milliseconds)'),
    maxDelayMs: nonNegativeInt('maxDelayMs').describe('Upper bound for any single delay (milliseconds)'),
    backoffMultiplier: z.number().min(1, 'backoffMultiplier must be at least 1'),
    strategy: z.enum(['exponential', 'linear', 'fixed'], {
      errorMap: () => ({ message: 'strategy must be "exponential", "linear", or "fixed"' }),
    }),
  })
  .refine((data) => data.maxDelayMs >= data.initialDelayMs, {
    message: 'maxDelayMs must not be lower than initialDelayMs',
    path: ['maxDelayMs'],
  });

/**
 * Offline Queue Schema
 */
export const QueueConfigSchema = z.object({
  offlineExpiryDays: positiveInt('offlineExpiryDays'),
  retryExpiryDays: positiveInt('retryExpiryDays'),
  maxRetries: nonNegativeInt('maxRetries').max(20, 'maxRetries should not exceed 20'),
  baseDelaySeconds: nonNegativeInt('baseDelaySeconds'),
  backoffMultiplier: z.number().min(1, 'backoffMultiplier must be at least 1'),
  maxDelaySeconds: positiveInt('maxDelaySeconds'),
  retryBatchSize: positiveInt('retryBatchSize'),
  sweepIntervalMs: z.number().int().min(1000, 'sweepIntervalMs must be at least 1 second'),
});

export const PresenceConfigSchema = z.object({
  staleTimeoutSeconds: positiveInt('staleTimeoutSeconds'),
});

export const TypingConfigSchema = z.object({
  staleTimeoutSeconds: positiveInt('staleTimeoutSeconds'),
});

export const ReceiptsConfigSchema = z.object({
  cacheTtlMs: positiveInt('cacheTtlMs'),
  cacheMaxSize: positiveInt('cacheMaxSize'),
});

/**
 * Connection Recovery Schema
 */
export const RecoveryConfigSchema = z.object({
  retryDelaysSeconds: z
    .array(z.number().min(0, 'retry delays must be non-negative'))
    .min(1, 'retryDelaysSeconds needs at least one delay'),
  maxRetries: nonNegativeInt('maxRetries'),
  reconnectTimeoutMs: z.number().int().min(100, 'reconnectTimeoutMs must be at least 100ms'),
  staleTimeoutMinutes: positiveInt('staleTimeoutMinutes'),
});

export const SyncConfigSchema = z.object({
  maxSyncWindowDays: positiveInt('maxSyncWindowDays'),
  batchSize: positiveInt('batchSize').max(1000, 'batchSize should not exceed 1000'),
  fetchLimit: positiveInt('fetchLimit'),
});

/**
 * Error Handler Schema
 */
export const ErrorHandlingConfigSchema = z
  .object({
    failureThreshold: positiveInt('failureThreshold'),
    recoveryTimeoutSeconds: positiveInt('recoveryTimeoutSeconds'),
    halfOpenMaxCalls: positiveInt('halfOpenMaxCalls'),
    trackingWindowMinutes: positiveInt('trackingWindowMinutes'),
    statisticsWindowMinutes: positiveInt('statisticsWindowMinutes'),
    warningThreshold: positiveInt('warningThreshold'),
    criticalThreshold: positiveInt('criticalThreshold'),
    userHistoryLimit: positiveInt('userHistoryLimit'),
    userHistoryMaxUsers: positiveInt('userHistoryMaxUsers'),
    userHistoryTtlMinutes: positiveInt('userHistoryTtlMinutes'),
  })
  .refine((data) => data.criticalThreshold >= data.warningThreshold, {
    message: 'criticalThreshold must not be lower than warningThreshold',
    path: ['criticalThreshold'],
  });

export const NotificationsConfigSchema = z.object({
  defaultGroupWindowMinutes: positiveInt('defaultGroupWindowMinutes'),
  retentionDays: positiveInt('retentionDays'),
});

/**
 * Storage Schema
 */
export const StorageConfigSchema = z
  .object({
    backend: z.enum(['memory', 'mongodb'], {
      errorMap: () => ({ message: 'backend must be "memory" or "mongodb"' }),
    }),
    mongoUrl: z.string().min(1, 'mongoUrl must not be empty').optional(),
    mongoDatabase: z.string().min(1, 'mongoDatabase is required'),
    operationTimeoutMs: z
      .number()
      .int()
      .min(100, 'operationTimeoutMs must be at least 100ms')
      .max(60000, 'operationTimeoutMs should not exceed 60s'),
    errorThresholdPercentage: z
      .number()
      .min(1, 'errorThresholdPercentage must be at least 1')
      .max(100, 'errorThresholdPercentage must not exceed 100'),
    resetTimeoutMs: z.number().int().min(100, 'resetTimeoutMs must be at least 100ms'),
    volumeThreshold: positiveInt('volumeThreshold'),
  })
  .refine((data) => data.backend !== 'mongodb' || Boolean(data.mongoUrl), {
    message: 'mongoUrl is required when backend is "mongodb"',
    path: ['mongoUrl'],
  });

export const RateLimitConfigSchema = z.object({
  capacity: positiveInt('capacity'),
  refillPerSecond: z.number().positive('refillPerSecond must be positive'),
});

/**
 * Server Schema
 */
export const ServerConfigSchema = z.object({
  host: z.string().min(1, 'host is required'),
  port: nonNegativeInt('port').max(65535, 'port must not exceed 65535'),
  heartbeatIntervalMs: z.number().int().min(1000, 'heartbeatIntervalMs must be at least 1 second'),
  maintenanceIntervalMs: z.number().int().min(1000, 'maintenanceIntervalMs must be at least 1 second'),
  redisUrl: z.string().min(1, 'redisUrl must not be empty').optional(),
  rateLimit: RateLimitConfigSchema,
});

export const ObservabilityConfigSchema = z.object({
  environment: z.enum(['development', 'production', 'test'], {
    errorMap: () => ({ message: 'environment must be "development", "production", or "test"' }),
  }),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).optional(),
  enableMetrics: z.boolean(),
});

/**
 * Complete Messaging Configuration Schema
 */
export const MessagingConfigSchema = z.object({
  retry: RetryConfigSchema,
  queue: QueueConfigSchema,
  presence: PresenceConfigSchema,
  typing: TypingConfigSchema,
  receipts: ReceiptsConfigSchema,
  recovery: RecoveryConfigSchema,
  sync: SyncConfigSchema,
  errors: ErrorHandlingConfigSchema,
  notifications: NotificationsConfigSchema,
  storage: StorageConfigSchema,
  server: ServerConfigSchema,
  observability: ObservabilityConfigSchema,
});

export type ValidatedMessagingConfig = z.infer<typeof MessagingConfigSchema>;
