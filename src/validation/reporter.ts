/**
 * Configuration Validation Reporter
 *
 * Provides detailed validation reports with:
 * - Error severity and suggested fixes
 * - Performance scoring
 * - Operational warnings
 */

import type { MessagingConfig } from '../types/config.js';
import { PRESETS, type PresetName } from '../config/presets.js';
import { MessagingConfigSchema } from './schemas.js';

/**
 * Validation issue with severity and suggested fix
 */
export interface ConfigIssue {
  /** Path to the invalid field (e.g., 'queue.maxRetries') */
  path: string;
  message: string;
  severity: 'error' | 'warning';
  suggestedFix?: string;
}

/**
 * Configuration validation report
 */
export interface ValidationReport {
  valid: boolean;
  errors?: ConfigIssue[];
  /** Non-blocking warnings */
  warnings?: string[];
  /** Performance score (0-100), only for valid configurations */
  performanceScore?: number;
  /** Settings that are risky in production */
  operationalWarnings?: string[];
}

/**
 * Validate and report on a configuration
 *
 * @example
 * ```typescript
 * const report = validateAndReportConfig(config);
 * if (!report.valid) {
 *   logger.error('Invalid configuration', undefined, { errors: report.errors });
 * }
 * ```
 */
export function validateAndReportConfig(config: unknown): ValidationReport {
  const result = MessagingConfigSchema.safeParse(config);

  if (!result.success) {
    return {
      valid: false,
      errors: result.error.errors.map((issue) => {
        const path = issue.path.join('.');
        return {
          path,
          message: issue.message,
          severity: calculateSeverity(issue.code, path),
          suggestedFix: generateFix(path),
        };
      }),
    };
  }

  const validated = result.data;
  return {
    valid: true,
    warnings: generateOptimizationWarnings(validated),
    performanceScore: analyzeConfigPerformance(validated),
    operationalWarnings: scanOperationalRisks(validated),
  };
}

/**
 * Validate one of the bundled presets
 */
export function validatePreset(name: PresetName): ValidationReport {
  return validateAndReportConfig(PRESETS[name]);
}

function calculateSeverity(code: string, path: string): 'error' | 'warning' {
  // Connection settings are always errors
  if (path.includes('Url') || path.includes('Database') || path.startsWith('server.')) {
    return 'error';
  }

  switch (code) {
    case 'invalid_type':
    case 'invalid_enum_value':
    case 'custom':
      return 'error';
    default:
      return 'warning';
  }
}

function generateFix(path: string): string | undefined {
  if (path === 'storage.mongoUrl') {
    return 'Set MESSAGING_MONGO_URL (e.g., mongodb://localhost:27017) or use the memory backend';
  }
  if (path.endsWith('operationTimeoutMs')) {
    return 'Use a value between 100ms and 60000ms (e.g., 3000 for 3 seconds)';
  }
  if (path === 'server.port') {
    return 'Use a port between 0 and 65535 (0 picks a free port)';
  }
  if (path.startsWith('recovery.retryDelaysSeconds')) {
    return 'Provide at least one non-negative delay, e.g. [2, 4, 8, 16, 32]';
  }
  if (path.endsWith('criticalThreshold')) {
    return 'Keep criticalThreshold at or above warningThreshold (e.g., 50 and 100)';
  }
  if (path.endsWith('strategy')) {
    return 'Use "exponential", "linear", or "fixed"';
  }
  return undefined;
}

/**
 * Score a configuration from 0 to 100:
 * - 90-100: production-ready
 * - 70-89: acceptable
 * - 50-69: needs tuning
 * - 0-49: not recommended
 */
export function analyzeConfigPerformance(config: MessagingConfig): number {
  let score = 100;

  // Timeouts that trip the store breaker on ordinary latency
  if (config.storage.operationTimeoutMs < 1000) {
    score -= 15;
  } else if (config.storage.operationTimeoutMs < 2000) {
    score -= 5;
  }

  // Long retry chains hold the sender's frame handler
  if (config.retry.maxAttempts > 5) {
    score -= 10;
  }

  if (config.sync.batchSize > 200) {
    score -= 10;
  }

  if (config.receipts.cacheMaxSize < 1000) {
    score -= 5;
  }

  // Single-process fan-out only
  if (config.observability.environment === 'production' && !config.server.redisUrl) {
    score -= 10;
  }

  if (config.retry.maxAttempts === 1 && config.observability.environment === 'production') {
    score -= 20;
  }

  return Math.max(0, Math.min(100, score));
}

export function scanOperationalRisks(config: MessagingConfig): string[] {
  const warnings: string[] = [];
  if (config.observability.environment !== 'production') return warnings;

  if (config.storage.backend === 'memory') {
    warnings.push('In-memory storage in production loses every message on restart');
  }
  if (config.observability.logLevel === 'debug' || config.observability.logLevel === 'trace') {
    warnings.push('Verbose logging in production, consider "warn"');
  }
  if (!config.observability.enableMetrics) {
    warnings.push('Metrics are disabled in production');
  }
  return warnings;
}

function generateOptimizationWarnings(config: MessagingConfig): string[] {
  const warnings: string[] = [];

  if (config.storage.operationTimeoutMs > 10000) {
    warnings.push(
      'Consider reducing operationTimeoutMs for faster failure detection (current: ' +
        String(config.storage.operationTimeoutMs) +
        'ms, recommended: 3000-5000ms)',
    );
  }

  if (config.presence.staleTimeoutSeconds * 1000 < config.server.maintenanceIntervalMs) {
    warnings.push('Presence timeout is shorter than the maintenance interval, stale users linger until the next sweep');
  }

  if (config.queue.maxDelaySeconds < config.queue.baseDelaySeconds) {
    warnings.push('queue.maxDelaySeconds is below baseDelaySeconds, every retry uses the cap');
  }

  return warnings;
}
