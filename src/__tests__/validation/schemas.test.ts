/**
 * Validation Schemas and Reporter Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorHandlingConfigSchema,
  MessagingConfigSchema,
  RecoveryConfigSchema,
  RetryConfigSchema,
  StorageConfigSchema,
} from '../../validation/schemas.js';
import {
  analyzeConfigPerformance,
  scanOperationalRisks,
  validateAndReportConfig,
  validatePreset,
} from '../../validation/reporter.js';
import { DEVELOPMENT, TESTING, createConfigFromPreset } from '../../config/presets.js';

describe('Validation Schemas', () => {
  describe('RetryConfigSchema', () => {
    it('should accept the preset values', () => {
      expect(RetryConfigSchema.safeParse(DEVELOPMENT.retry).success).toBe(true);
    });

    it('should reject a cap below the initial delay', () => {
      const result = RetryConfigSchema.safeParse({ ...DEVELOPMENT.retry, initialDelayMs: 5000, maxDelayMs: 100 });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.path).toEqual(['maxDelayMs']);
      }
    });

    it('should reject unknown strategies', () => {
      const result = RetryConfigSchema.safeParse({ ...DEVELOPMENT.retry, strategy: 'random' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.message).toBe('strategy must be "exponential", "linear", or "fixed"');
      }
    });
  });

  describe('RecoveryConfigSchema', () => {
    it('should require at least one retry delay', () => {
      expect(RecoveryConfigSchema.safeParse({ ...DEVELOPMENT.recovery, retryDelaysSeconds: [] }).success).toBe(false);
    });
  });

  describe('ErrorHandlingConfigSchema', () => {
    it('should keep the critical threshold above the warning threshold', () => {
      const result = ErrorHandlingConfigSchema.safeParse({
        ...DEVELOPMENT.errors,
        warningThreshold: 100,
        criticalThreshold: 50,
      });
      expect(result.success).toBe(false);
    });
  });

  describe('StorageConfigSchema', () => {
    it('should require a URL for MongoDB', () => {
      const result = StorageConfigSchema.safeParse({ ...DEVELOPMENT.storage, backend: 'mongodb' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.message).toBe('mongoUrl is required when backend is "mongodb"');
      }
    });
  });

  it('should validate a complete configuration', () => {
    expect(MessagingConfigSchema.safeParse(TESTING).success).toBe(true);
    expect(MessagingConfigSchema.safeParse({ ...TESTING, sync: undefined }).success).toBe(false);
  });
});

describe('validateAndReportConfig', () => {
  it('should report a valid configuration with a score', () => {
    const report = validateAndReportConfig(DEVELOPMENT);

    expect(report.valid).toBe(true);
    expect(report.errors).toBeUndefined();
    expect(report.operationalWarnings).toEqual([]);
    expect(report.performanceScore).toBe(100);
  });

  it('should report errors with severity and fix', () => {
    const report = validateAndReportConfig({
      ...DEVELOPMENT,
      server: { ...DEVELOPMENT.server, port: 70000 },
    });

    expect(report.valid).toBe(false);
    expect(report.errors).toEqual([
      {
        path: 'server.port',
        message: 'port must not exceed 65535',
        severity: 'error',
        suggestedFix: 'Use a port between 0 and 65535 (0 picks a free port)',
      },
    ]);
  });

  it('should grade non-connection range issues as warnings', () => {
    const report = validateAndReportConfig({
      ...DEVELOPMENT,
      sync: { maxSyncWindowDays: 7, batchSize: 0, fetchLimit: 5000 },
    });

    expect(report.errors?.[0]).toMatchObject({ path: 'sync.batchSize', severity: 'warning' });
  });

  it('should warn about slow store timeouts', () => {
    const report = validateAndReportConfig(
      createConfigFromPreset('DEVELOPMENT', { storage: { operationTimeoutMs: 20000 } }),
    );

    expect(report.warnings).toEqual([
      'Consider reducing operationTimeoutMs for faster failure detection (current: 20000ms, recommended: 3000-5000ms)',
    ]);
  });

  it('should validate presets by name', () => {
    expect(validatePreset('TESTING').valid).toBe(true);
    expect(validatePreset('PRODUCTION').errors?.[0]).toMatchObject({
      path: 'storage.mongoUrl',
      severity: 'error',
    });
  });
});

describe('analyzeConfigPerformance', () => {
  it('should penalise a single-process production deployment', () => {
    const config = createConfigFromPreset('PRODUCTION', { storage: { mongoUrl: 'mongodb://localhost:27017' } });

    expect(analyzeConfigPerformance(config)).toBe(90);
  });

  it('should penalise aggressive timeouts and long retry chains', () => {
    const config = createConfigFromPreset('DEVELOPMENT', {
      storage: { operationTimeoutMs: 500 },
      retry: { maxAttempts: 8 },
    });

    expect(analyzeConfigPerformance(config)).toBe(75);
  });
});

describe('scanOperationalRisks', () => {
  it('should only flag production settings', () => {
    const development = createConfigFromPreset('DEVELOPMENT', { observability: { logLevel: 'debug' } });
    const production = createConfigFromPreset('PRODUCTION', {
      storage: { backend: 'memory' },
      observability: { logLevel: 'debug', enableMetrics: false },
    });

    expect(scanOperationalRisks(development)).toEqual([]);
    expect(scanOperationalRisks(production)).toEqual([
      'In-memory storage in production loses every message on restart',
      'Verbose logging in production, consider "warn"',
      'Metrics are disabled in production',
    ]);
  });
});
