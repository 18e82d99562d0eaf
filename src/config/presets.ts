/**
 * Configuration Presets
 *
 * Pre-configured presets for different environments
 */

import type { MessagingConfig } from '../types/config.js';

/**
 * Configuration Preset
 * A complete configuration tuned for one environment
 */
export type ConfigPreset = MessagingConfig;

const RECONNECT_DELAYS_SECONDS = [2, 4, 8, 16, 32];

/**
 * DEVELOPMENT Preset
 *
 * - Long store timeouts for debugging
 * - Detailed logging
 * - In-memory storage
 *
 * Use Case: Development, debugging, local testing
 */
export const DEVELOPMENT: ConfigPreset = {
  retry: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    backoffMultiplier: 2,
    strategy: 'exponential',
  },
  queue: {
    offlineExpiryDays: 7,
    retryExpiryDays: 1,
    maxRetries: 3,
    baseDelaySeconds: 2,
    backoffMultiplier: 2,
    maxDelaySeconds: 300,
    retryBatchSize: 50,
    sweepIntervalMs: 60000,
  },
  presence: {
    staleTimeoutSeconds: 30,
  },
  typing: {
    staleTimeoutSeconds: 5,
  },
  receipts: {
    cacheTtlMs: 300000, // 5 minutes
    cacheMaxSize: 10000,
  },
  recovery: {
    retryDelaysSeconds: RECONNECT_DELAYS_SECONDS,
    maxRetries: 5,
    reconnectTimeoutMs: 10000,
    staleTimeoutMinutes: 5,
  },
  sync: {
    maxSyncWindowDays: 7,
    batchSize: 50,
    fetchLimit: 5000,
  },
  errors: {
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
  },
  notifications: {
    defaultGroupWindowMinutes: 60,
    retentionDays: 30,
  },
  storage: {
    backend: 'memory',
    mongoDatabase: 'messaging_dev',
    operationTimeoutMs: 10000, // longer timeout for debugging
    errorThresholdPercentage: 50,
    resetTimeoutMs: 30000,
    volumeThreshold: 10,
  },
  server: {
    host: '127.0.0.1',
    port: 8000,
    heartbeatIntervalMs: 30000,
    maintenanceIntervalMs: 30000,
    rateLimit: {
      capacity: 30,
      refillPerSecond: 5,
    },
  },
  observability: {
    environment: 'development',
    enableMetrics: true,
  },
};

/**
 * PRODUCTION Preset
 *
 * - Aggressive store timeouts for fast failures
 * - MongoDB storage
 * - Minimal logging
 *
 * Use Case: Production deployments
 */
export const PRODUCTION: ConfigPreset = {
  ...DEVELOPMENT,
  storage: {
    backend: 'mongodb',
    mongoDatabase: 'messaging',
    operationTimeoutMs: 3000,
    errorThresholdPercentage: 50,
    resetTimeoutMs: 30000,
    volumeThreshold: 10,
  },
  server: {
    host: '0.0.0.0',
    port: 8000,
    heartbeatIntervalMs: 30000,
    maintenanceIntervalMs: 30000,
    rateLimit: {
      capacity: 20,
      refillPerSecond: 2,
    },
  },
  observability: {
    environment: 'production',
    enableMetrics: true,
  },
};

/**
 * TESTING Preset
 *
 * - Millisecond retry delays
 * - Small breaker volume so tests can trip it
 * - Quiet logs
 *
 * Use Case: Unit and integration tests
 */
export const TESTING: ConfigPreset = {
  ...DEVELOPMENT,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 1,
    maxDelayMs: 10,
    backoffMultiplier: 2,
    strategy: 'exponential',
  },
  storage: {
    backend: 'memory',
    mongoDatabase: 'messaging_test',
    operationTimeoutMs: 2000,
    errorThresholdPercentage: 50,
    resetTimeoutMs: 1000,
    volumeThreshold: 5,
  },
  server: {
    host: '127.0.0.1',
    port: 0,
    heartbeatIntervalMs: 30000,
    maintenanceIntervalMs: 30000,
    rateLimit: {
      capacity: 100,
      refillPerSecond: 100,
    },
  },
  observability: {
    environment: 'test',
    enableMetrics: false,
  },
};

/**
 * Preset Registry
 */
export const PRESETS = {
  DEVELOPMENT,
  PRODUCTION,
  TESTING,
} as const;

export type PresetName = keyof typeof PRESETS;

export function isPresetName(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, name);
}

/**
 * Get preset by name
 */
export function getPreset(name: PresetName): ConfigPreset {
  return PRESETS[name];
}

type SectionOverrides = {
  [K in keyof MessagingConfig]?: Partial<MessagingConfig[K]>;
};

/**
 * Create a MessagingConfig from a preset with per-section overrides
 *
 * @example
 * ```typescript
 * const config = createConfigFromPreset('PRODUCTION', {
 *   storage: { mongoUrl: 'mongodb://localhost:27017' },
 *   server: { port: 9000 },
 * });
 * ```
 */
export function createConfigFromPreset(
  presetName: PresetName,
  overrides: SectionOverrides = {},
): MessagingConfig {
  const preset = PRESETS[presetName];
  return {
    retry: { ...preset.retry, ...overrides.retry },
    queue: { ...preset.queue, ...overrides.queue },
    presence: { ...preset.presence, ...overrides.presence },
    typing: { ...preset.typing, ...overrides.typing },
    receipts: { ...preset.receipts, ...overrides.receipts },
    recovery: { ...preset.recovery, ...overrides.recovery },
    sync: { ...preset.sync, ...overrides.sync },
    errors: { ...preset.errors, ...overrides.errors },
    notifications: { ...preset.notifications, ...overrides.notifications },
    storage: { ...preset.storage, ...overrides.storage },
    server: { ...preset.server, ...overrides.server },
    observability: { ...preset.observability, ...overrides.observability },
  };
}
