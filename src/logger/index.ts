/**
 * Structured logging for the messaging core
 *
 * Log calls pass a context object whose `action` field names the event in
 * snake_case; connection and correlation ids come from the execution context.
 */

import { getContext } from '../context/execution-context.js';

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  SILENT = 5,
}

export interface LogContext {
  [key: string]: unknown;
}

export interface StructuredLogger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | unknown, context?: LogContext): void;
}

export type LogEnvironment = 'development' | 'production' | 'test';

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'apiKey', 'authorization', 'cookie'];

const METADATA_KEYS = [
  'correlationId',
  'requestId',
  'connectionId',
  'userId',
  'timestamp',
  'level',
  'message',
  'environment',
  'duration',
];

const LEVEL_NAMES: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.TRACE]: 'TRACE',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const DEFAULT_LEVELS: Record<LogEnvironment, LogLevel> = {
  development: LogLevel.DEBUG,
  production: LogLevel.WARN,
  test: LogLevel.SILENT,
};

/**
 * Console logger: JSON lines in production, indented text elsewhere
 *
 * Every line carries the ids of the innermost execution context, so frames
 * handled for one connection can be grepped by `connectionId`.
 */
export class ConsoleStructuredLogger implements StructuredLogger {
  private level: LogLevel;

  constructor(
    private environment: LogEnvironment,
    options?: { level?: LogLevel },
  ) {
    this.level = options?.level ?? DEFAULT_LEVELS[environment];
  }

  trace(message: string, context?: LogContext): void {
    this.write(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, { ...context, error: serializeError(error) });
  }

  private write(level: Exclude<LogLevel, LogLevel.SILENT>, message: string, context?: LogContext): void {
    if (level < this.level) return;

    const scope = getContext();
    const entry: Record<string, unknown> = {
      level: LEVEL_NAMES[level],
      timestamp: new Date().toISOString(),
      message,
      correlationId: scope?.correlationId,
      requestId: scope?.requestId,
      connectionId: scope?.connectionId,
      userId: scope?.userId,
      duration: scope ? Date.now() - scope.startTime : undefined,
      environment: this.environment,
      ...sanitize(context),
    };

    const output = this.environment === 'production' ? JSON.stringify(entry) : formatPretty(entry);
    if (level === LogLevel.ERROR) console.error(output);
    else if (level === LogLevel.WARN) console.warn(output);
    else console.log(output);
  }
}

function formatPretty(entry: Record<string, unknown>): string {
  const lines = [`${String(entry.timestamp)} [${String(entry.level)}] ${String(entry.message)}`];

  for (const key of ['connectionId', 'userId']) {
    if (entry[key] !== undefined) lines.push(`  ${key}: ${String(entry[key])}`);
  }

  const fields = Object.fromEntries(
    Object.entries(entry).filter(([key, value]) => !METADATA_KEYS.includes(key) && value !== undefined),
  );
  if (Object.keys(fields).length > 0) {
    lines.push(`  context: ${JSON.stringify(fields, null, 2)}`);
  }

  return lines.join('\n');
}

/**
 * Replace values of credential-like keys with a marker
 */
export function sanitize(data: LogContext | undefined): LogContext {
  if (!data) return {};

  const sanitized: LogContext = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_FIELDS.some((field) => key.toLowerCase().includes(field.toLowerCase()))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    // Messaging errors and driver errors carry a machine-readable code
    if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
      serialized.code = error.code;
    }

    if (error.cause !== undefined) {
      serialized.cause = serializeError(error.cause);
    }

    return serialized;
  }
  return error;
}

export class NullLogger implements StructuredLogger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Build a logger for an environment, honouring an optional level name
 */
export function createLogger(environment: LogEnvironment, levelName?: string): StructuredLogger {
  const level = parseLogLevel(levelName);
  return new ConsoleStructuredLogger(environment, level === undefined ? undefined : { level });
}

export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.toLowerCase()) {
    case 'trace':
      return LogLevel.TRACE;
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}
