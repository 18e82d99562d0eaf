/**
 * Environment configuration
 *
 * Picks a preset by MESSAGING_PRESET and applies the deployment overrides.
 */

import { z } from 'zod';
import type { MessagingConfig } from '../types/config.js';
import { ConfigError } from '../types/errors.js';
import { MessagingConfigSchema } from '../validation/schemas.js';
import { createConfigFromPreset, isPresetName, type PresetName } from './presets.js';

export type ConfigEnv = Record<string, string | undefined>;

const EnvSchema = z.object({
  MESSAGING_PRESET: z
    .string()
    .transform((value) => value.toUpperCase())
    .refine(isPresetName, { message: 'MESSAGING_PRESET must be DEVELOPMENT, PRODUCTION, or TESTING' })
    .optional(),
  MESSAGING_HOST: z.string().min(1).optional(),
  MESSAGING_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  MESSAGING_MONGO_URL: z.string().min(1).optional(),
  MESSAGING_MONGO_DATABASE: z.string().min(1).optional(),
  MESSAGING_REDIS_URL: z.string().min(1).optional(),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']))
    .optional(),
});

function presetFor(value: string | undefined, env: ConfigEnv): PresetName {
  if (value !== undefined && isPresetName(value)) return value;
  switch (env['NODE_ENV']) {
    case 'production':
      return 'PRODUCTION';
    case 'test':
      return 'TESTING';
    default:
      return 'DEVELOPMENT';
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Build the configuration from environment variables; empty strings count as unset
 *
 * @throws ConfigError listing every invalid variable or setting
 */
export function loadConfigFromEnv(env: ConfigEnv = process.env): MessagingConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsedEnv = EnvSchema.safeParse(present);
  if (!parsedEnv.success) {
    const issues = describeIssues(parsedEnv.error);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }
  const vars = parsedEnv.data;
  const preset = presetFor(vars.MESSAGING_PRESET, env);

  const storage: Partial<MessagingConfig['storage']> = {};
  if (vars.MESSAGING_MONGO_URL) {
    storage.mongoUrl = vars.MESSAGING_MONGO_URL;
    storage.backend = 'mongodb';
  }
  if (vars.MESSAGING_MONGO_DATABASE) storage.mongoDatabase = vars.MESSAGING_MONGO_DATABASE;

  const server: Partial<MessagingConfig['server']> = {};
  if (vars.MESSAGING_HOST) server.host = vars.MESSAGING_HOST;
  if (vars.MESSAGING_PORT !== undefined) server.port = vars.MESSAGING_PORT;
  if (vars.MESSAGING_REDIS_URL) server.redisUrl = vars.MESSAGING_REDIS_URL;

  const observability: Partial<MessagingConfig['observability']> = {};
  if (vars.LOG_LEVEL) observability.logLevel = vars.LOG_LEVEL;

  const config = createConfigFromPreset(preset, { storage, server, observability });
  const validated = MessagingConfigSchema.safeParse(config);
  if (!validated.success) {
    const issues = describeIssues(validated.error);
    throw new ConfigError(`Invalid configuration for preset ${preset}: ${issues.join('; ')}`, issues);
  }
  return config;
}
